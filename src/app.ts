// src/app.ts — express application: middleware stack and routes
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from '@/config/app.config';
import { errorMiddleware, notFoundMiddleware } from '@/middleware/error.middleware';
import { createHealthRouter } from '@/routes/health';
import { createQueryRouter } from '@/routes/query';
import type { PipelineDeps } from '@/services/pipeline-deps';

export function createApp(config: AppConfig, deps: PipelineDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(','),
      credentials: true,
    }),
  );

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(express.json({ limit: '1mb' }));
  // compression buffers event-stream writes, so the SSE route is excluded
  app.use(compression({ filter: (req, res) => !req.path.endsWith('/stream') && compression.filter(req, res) }));
  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined'));
  }

  app.use('/health', createHealthRouter(deps));
  app.use('/api/query', createQueryRouter(deps));

  app.use(notFoundMiddleware);
  app.use(errorMiddleware);
  return app;
}
