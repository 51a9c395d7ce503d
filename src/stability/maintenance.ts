// src/stability/maintenance.ts — periodic purge of expired cache entries and old analytics

import type { AnalyticsRecorder } from '@/services/analytics';
import type { RequestCache } from '@/services/cache';
import { logger } from '@/services/logger';

const ANALYTICS_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceTargets {
  cache: Pick<RequestCache<unknown>, 'purgeExpired'>;
  analytics: Pick<AnalyticsRecorder, 'prune'>;
}

export function runMaintenance(targets: MaintenanceTargets): { cacheEntries: number; patterns: number } {
  const cacheEntries = targets.cache.purgeExpired();
  const patterns = targets.analytics.prune(ANALYTICS_MAX_AGE_MS);
  if (cacheEntries > 0 || patterns > 0) {
    logger.info('maintenance:flushed', { cacheEntries, patterns });
  }
  return { cacheEntries, patterns };
}

/** Runs every 30 minutes until the returned stop function is called. */
export function startMaintenanceScheduler(targets: MaintenanceTargets, intervalMs = 30 * 60 * 1000): () => void {
  const timer = setInterval(() => runMaintenance(targets), intervalMs);
  timer.unref();
  logger.info('maintenance:scheduler_started', { intervalMs });
  return () => clearInterval(timer);
}
