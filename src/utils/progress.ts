// src/utils/progress.ts
import type { ProgressChannel, ResponsePayload } from '@/types/core';

/** Buffers events in memory; used by the JSON route. */
export class CollectingProgressChannel implements ProgressChannel {
  readonly statusUpdates: string[] = [];
  readonly finalResponses: ResponsePayload[] = [];

  statusUpdate(message: string): void {
    this.statusUpdates.push(message);
  }

  finalResponse(payload: ResponsePayload): void {
    this.finalResponses.push(payload);
  }
}
