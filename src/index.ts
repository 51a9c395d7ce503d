// Load environment variables FIRST
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createApp } from '@/app';
import { logger } from '@/services/logger';
import { createPipelineDeps } from '@/services/pipeline-deps';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { startMaintenanceScheduler } from '@/stability/maintenance';
import { errorMessage } from '@/utils/errors';

async function main(): Promise<void> {
  const config = loadConfig();

  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const deps = await createPipelineDeps(config);
  const app = createApp(config, deps);

  const stopMaintenance = startMaintenanceScheduler({ cache: deps.cache, analytics: deps.analytics });
  onShutdown(stopMaintenance);
  onShutdown(() => deps.close());

  const server = app.listen(config.port, () => {
    logger.info('server:listening', {
      port: config.port,
      env: config.nodeEnv,
      tools: deps.tools.names(),
    });
  });
  setServerInstance(server);
}

main().catch((err: unknown) => {
  logger.fatal('server:startup_failed', { error: errorMessage(err) });
  process.exit(1);
});
