// src/services/autoBroadcast.ts
import { Knex } from 'knex';
import { AutoBroadcastConfig } from '../config/workerConfig';
import { JobsRepository } from '../db/repositories/jobsRepository';
import { SettingsRepository } from '../db/repositories/settingsRepository';
import { LiveMetricSource } from '../db/repositories/trackedAccountsRepository';
import { BroadcastPayload } from '../schemas/jobPayloads';
import { Clock, systemClock } from '../utils/dateUtils';
import { logInfo } from '../utils/logger';

export const AUTO_BROADCAST_MARKER_KEY = 'auto_broadcast:last_triggered_at';

export type AutoBroadcastResult =
  | { triggered: true; jobId: number; count: number }
  | { triggered: false; reason: 'below_threshold' | 'cooldown'; count: number };

export interface AutoBroadcastDeps {
  db: Knex;
  metric: LiveMetricSource;
  jobs: JobsRepository;
  settings: SettingsRepository;
  config: AutoBroadcastConfig;
  clock?: Clock;
}

export function renderAutoBroadcastMessage(template: string, count: number): string {
  return template.replace(/\{count\}/g, String(count));
}

/**
 * Queues one broadcast when enough accounts are live, at most once per
 * cooldown. The marker row is created if missing, then read under lock
 * and written in the same transaction as the job insert, so concurrent
 * workers queue one broadcast between them.
 */
export class AutoBroadcastTrigger {
  private readonly clock: Clock;

  constructor(private readonly deps: AutoBroadcastDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async check(ctx: string): Promise<AutoBroadcastResult> {
    const { db, metric, jobs, settings, config } = this.deps;
    const count = await metric.countLive();

    if (count < config.threshold) {
      return { triggered: false, reason: 'below_threshold', count };
    }

    const result = await db.transaction(async (trx): Promise<AutoBroadcastResult> => {
      const now = this.clock();
      await settings.ensureKey(AUTO_BROADCAST_MARKER_KEY, trx);
      const marker = await settings.get(AUTO_BROADCAST_MARKER_KEY, { trx, lock: true });

      if (marker) {
        const last = Date.parse(marker);
        if (!Number.isNaN(last) && now.getTime() - last < config.cooldownMs) {
          return { triggered: false, reason: 'cooldown', count };
        }
      }

      const payload: BroadcastPayload = {
        message: renderAutoBroadcastMessage(config.messageTemplate, count),
        target: 'all',
        source: 'auto'
      };
      const jobId = await jobs.enqueue('broadcast_message', payload, trx);
      await settings.set(AUTO_BROADCAST_MARKER_KEY, now.toISOString(), trx);

      return { triggered: true, jobId, count };
    });

    if (result.triggered) {
      logInfo(ctx, 'Auto-broadcast queued', {
        jobId: result.jobId,
        liveCount: count,
        threshold: config.threshold
      });
    }
    return result;
  }
}
