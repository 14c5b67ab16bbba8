// src/workers/periodicTasks.ts
import { PeriodicTask } from './jobsWorker';
import { AutoBroadcastTrigger } from '../services/autoBroadcast';
import { JobsRepository } from '../db/repositories/jobsRepository';
import { LiveNotificationsRepository } from '../db/repositories/liveNotificationsRepository';
import { MESSAGE_DELETION_WINDOW_MS } from '../services/liveNotifier';
import { Clock, systemClock } from '../utils/dateUtils';
import { logInfo, logWarn } from '../utils/logger';

export interface PeriodicTaskDeps {
  autoBroadcast: AutoBroadcastTrigger;
  jobs: JobsRepository;
  liveNotifications: LiveNotificationsRepository;
  /** 0 disables stale-processing recovery. */
  processingLeaseMs: number;
  clock?: Clock;
}

export function createPeriodicTasks(deps: PeriodicTaskDeps): PeriodicTask[] {
  const clock = deps.clock ?? systemClock;

  const tasks: PeriodicTask[] = [
    {
      name: 'auto-broadcast',
      async run(ctx) {
        await deps.autoBroadcast.check(ctx);
      }
    }
  ];

  if (deps.processingLeaseMs > 0) {
    tasks.push({
      name: 'stale-job-recovery',
      async run(ctx) {
        const { requeued, failed } = await deps.jobs.recoverStale(deps.processingLeaseMs);
        if (requeued.length || failed.length) {
          logWarn(ctx, 'Recovered jobs stuck in processing', {
            requeued,
            failed,
            leaseMs: deps.processingLeaseMs
          });
        }
      }
    });
  }

  tasks.push({
    name: 'live-notification-prune',
    async run(ctx) {
      const cutoff = new Date(clock().getTime() - MESSAGE_DELETION_WINDOW_MS);
      const removed = await deps.liveNotifications.pruneOlderThan(cutoff);
      if (removed) {
        logInfo(ctx, 'Pruned expired live notification records', { removed });
      }
    }
  });

  return tasks;
}
