// src/stability/circuitBreaker.ts — trips after repeated upstream failures and bounds each call with a timeout
import { logger } from '@/services/logger';
import { ExternalServiceError } from '@/utils/errors';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  successThreshold: number;
  /** Per-call timeout (ms). */
  timeout: number;
  /** Time in OPEN before a trial call is let through (ms). */
  resetTimeout: number;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  timeout: 30000,
  resetTimeout: 30000,
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    private readonly service: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Run `fn` under the breaker. A rejection caused by the caller's own abort
   * is passed through without counting against the upstream.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.now() - this.lastFailureTime > this.config.resetTimeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        logger.info('circuit:half_open', { service: this.service });
      } else {
        throw new ExternalServiceError(this.service, 'circuit breaker is OPEN');
      }
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      const result = await Promise.race([
        fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new ExternalServiceError(this.service, `timed out after ${this.config.timeout}ms`)),
            this.config.timeout,
          );
        }),
      ]);
      this.onSuccess();
      return result;
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw err;
      this.onFailure();
      throw err;
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private onSuccess(): void {
    this.failureCount = 0;
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        logger.info('circuit:closed', { service: this.service });
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      logger.warn('circuit:open', { service: this.service, failures: this.failureCount });
    }
  }
}
