// src/stability/errorHandlers.ts — process-level handlers and graceful shutdown
import type { Server } from 'http';
import { logger } from '@/services/logger';
import { errorMessage } from '@/utils/errors';

type CleanupHook = () => Promise<void> | void;

let serverInstance: Server | null = null;
const cleanupHooks: CleanupHook[] = [];
let shuttingDown = false;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs during graceful shutdown, in registration order. */
export function onShutdown(hook: CleanupHook): void {
  cleanupHooks.push(hook);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  }
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown');
    process.exit(1);
  }, 15000);

  if (serverInstance) {
    serverInstance.close(() => logger.info('process:http_closed'));
  }

  let code = exitCode;
  for (const hook of cleanupHooks) {
    try {
      await hook();
    } catch (err) {
      logger.error('process:cleanup_failed', { error: errorMessage(err) });
      code = 1;
    }
  }

  clearTimeout(forced);
  process.exit(code);
}
