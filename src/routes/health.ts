// src/routes/health.ts
import express from 'express';
import type { PipelineDeps } from '@/services/pipeline-deps';

export function healthSnapshot(deps: PipelineDeps, uptimeSeconds = process.uptime()) {
  return {
    status: 'healthy' as const,
    activeDataStreams: deps.streams.activeCount(),
    cachePerformance: deps.cache.stats(),
    discoveredTools: deps.discovery.discoveredCount(),
    streamsInitialized: deps.driver.isStreamsInitialized(),
    queue: {
      processing: deps.queue.getProcessingCount(),
      waiting: deps.queue.getQueueLength(),
    },
    uptime: Math.round(uptimeSeconds),
    timestamp: new Date().toISOString(),
  };
}

export function createHealthRouter(deps: PipelineDeps): express.Router {
  const router = express.Router();
  router.get('/', (_req, res) => {
    res.json(healthSnapshot(deps));
  });
  return router;
}
