// src/utils/errors.ts — error taxonomy shared by the pipeline components

export class ExternalServiceError extends Error {
  constructor(
    readonly service: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${service}: ${message}`, options);
    this.name = 'ExternalServiceError';
  }
}

export class ClassificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
  }
}

export class ToolExecutionError extends Error {
  constructor(
    readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolExecutionError';
  }
}

export class SpecialistPathError extends Error {
  constructor(
    readonly agentName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SpecialistPathError';
  }
}

export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheError';
  }
}

/** Thrown by RequestQueue when both the worker slots and the wait queue are full. */
export class QueueFullError extends Error {
  constructor(readonly queueSize: number) {
    super(`Request queue is full (${queueSize} waiting)`);
    this.name = 'QueueFullError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
