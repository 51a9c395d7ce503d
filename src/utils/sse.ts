// src/utils/sse.ts
import type { Response } from 'express';
import type { ProgressChannel, ResponsePayload } from '@/types/core';
import { logger } from '@/services/logger';
import { errorMessage } from './errors';

export class SSE {
  private initialized = false;
  private closed = false;

  constructor(private readonly res: Response) {}

  /** Send headers and flush them so the client sees the stream open. */
  init(): void {
    if (this.initialized) return;
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.flushHeaders();
    this.initialized = true;
  }

  send(event: string, data: unknown): void {
    if (this.closed) return;
    if (!this.initialized) this.init();
    this.res.write(`event: ${event}\n`);
    this.res.write(`data: ${JSON.stringify(data)}\n\n`);
  }

  markClosed(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.res.end();
    } catch (err) {
      logger.warn('sse:close_failed', { error: errorMessage(err) });
    }
  }
}

/** Progress channel over one SSE response: `status_update` events, then one `final_response`. */
export class SseProgressChannel implements ProgressChannel {
  constructor(private readonly sse: SSE) {}

  statusUpdate(message: string): void {
    this.sse.send('status_update', { message });
  }

  finalResponse(payload: ResponsePayload): void {
    this.sse.send('final_response', payload);
    this.sse.close();
  }
}
