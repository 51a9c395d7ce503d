// src/stability/requestQueue.ts — bounded worker pool for pipeline runs

import { QueueFullError } from '@/utils/errors';
import { logger } from '@/services/logger';

interface QueuedTask {
  start: () => void;
}

export interface RequestQueueOptions {
  maxConcurrent: number;
  maxQueueSize: number;
}

/**
 * At most `maxConcurrent` tasks run at once; up to `maxQueueSize` wait in FIFO order.
 * `run` rejects with QueueFullError beyond that.
 */
export class RequestQueue {
  private processingCount = 0;
  private readonly waiting: QueuedTask[] = [];

  constructor(private readonly options: RequestQueueOptions) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.processingCount < this.options.maxConcurrent) {
      return this.execute(task);
    }
    if (this.waiting.length >= this.options.maxQueueSize) {
      logger.warn('queue:full', { waiting: this.waiting.length });
      return Promise.reject(new QueueFullError(this.waiting.length));
    }
    return new Promise<T>((resolve, reject) => {
      this.waiting.push({
        start: () => {
          this.execute(task).then(resolve, reject);
        },
      });
    });
  }

  getProcessingCount(): number {
    return this.processingCount;
  }

  getQueueLength(): number {
    return this.waiting.length;
  }

  private async execute<T>(task: () => Promise<T>): Promise<T> {
    this.processingCount++;
    try {
      return await task();
    } finally {
      this.processingCount--;
      this.waiting.shift()?.start();
    }
  }
}
