import { Env, envInt, envList } from './env';
import { loadRateLimits, RateLimitTable } from './rateLimits';
import { HOUR_MS } from '../utils/dateUtils';

export interface AutoBroadcastConfig {
  /** Live-account count at or above which a broadcast is queued. */
  threshold: number;
  cooldownMs: number;
  /** `{count}` is replaced with the live-account count. */
  messageTemplate: string;
}

export interface WorkerConfig {
  pollIntervalMs: number;
  retryCeiling: number;
  slowJobThresholdMs: number;
  periodicIntervalMs: number;
  /** 0 disables stale-processing recovery. */
  processingLeaseMs: number;
  /** How often a running job refreshes its lease; 0 when leases are off. */
  heartbeatIntervalMs: number;
  excludedJobTypes: string[];
  runOnceEmptyRetries: number;
  runOnceRetryDelayMs: number;
  autoBroadcast: AutoBroadcastConfig;
  rateLimits: RateLimitTable;
}

export const DEFAULT_AUTO_BROADCAST_MESSAGE =
  '{count} streams are live right now. Open the bot to watch!';

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const processingLeaseMs = envInt(env, 'JOB_PROCESSING_LEASE_SECONDS', 15 * 60) * 1000;

  return {
    pollIntervalMs: envInt(env, 'JOBS_POLL_INTERVAL_MS', 2000),
    retryCeiling: envInt(env, 'JOB_RETRY_CEILING', 3),
    slowJobThresholdMs: envInt(env, 'JOB_SLOW_THRESHOLD_MS', 5000),
    periodicIntervalMs: envInt(env, 'JOBS_PERIODIC_INTERVAL_MS', 5 * 60 * 1000),
    processingLeaseMs,
    heartbeatIntervalMs: Math.floor(processingLeaseMs / 3),
    excludedJobTypes: envList(env, 'JOBS_EXCLUDED_TYPES', ['send_to_groups']),
    runOnceEmptyRetries: 2,
    runOnceRetryDelayMs: 1000,
    autoBroadcast: {
      threshold: envInt(env, 'AUTO_BROADCAST_THRESHOLD', 10),
      cooldownMs: envInt(env, 'AUTO_BROADCAST_COOLDOWN_HOURS', 24) * HOUR_MS,
      messageTemplate: env.AUTO_BROADCAST_MESSAGE || DEFAULT_AUTO_BROADCAST_MESSAGE
    },
    rateLimits: loadRateLimits(env)
  };
}
