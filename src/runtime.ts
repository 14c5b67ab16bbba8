// src/runtime.ts
import { Knex } from 'knex';
import { BotConfig } from './config/botConfig';
import { WorkerConfig } from './config/workerConfig';
import { JobsRepository } from './db/repositories/jobsRepository';
import { LiveNotificationsRepository } from './db/repositories/liveNotificationsRepository';
import { PaymentsRepository } from './db/repositories/paymentsRepository';
import { SettingsRepository } from './db/repositories/settingsRepository';
import { TrackedAccountsRepository } from './db/repositories/trackedAccountsRepository';
import { UsersRepository } from './db/repositories/usersRepository';
import { createJobHandlers } from './handlers';
import { AutoBroadcastTrigger } from './services/autoBroadcast';
import { Messenger } from './services/botApiClient';
import { Dispatcher } from './services/dispatcher';
import { LiveNotifier } from './services/liveNotifier';
import { RateLimiter } from './services/rateLimiter';
import { Clock, systemClock } from './utils/dateUtils';
import { WorkerDeps } from './workers/jobsWorker';
import { createPeriodicTasks } from './workers/periodicTasks';

export interface RuntimeOptions {
  db: Knex;
  messenger: Messenger;
  bot: BotConfig;
  worker: WorkerConfig;
  clock?: Clock;
  /** Pause between recipients of a broadcast or live alert. */
  sendIntervalMs?: number;
}

export interface Runtime {
  jobs: JobsRepository;
  dispatcher: Dispatcher;
  rateLimiter: RateLimiter;
  autoBroadcast: AutoBroadcastTrigger;
  workerDeps: WorkerDeps;
}

/**
 * Wires repositories, services and handlers around one knex handle.
 * The rate limiter lives here, once per process.
 */
export function createRuntime(opts: RuntimeOptions): Runtime {
  const clock = opts.clock ?? systemClock;
  const sendIntervalMs = opts.sendIntervalMs ?? 50;
  const { db, messenger, bot, worker } = opts;

  const jobs = new JobsRepository(db, { retryCeiling: worker.retryCeiling, clock });
  const settings = new SettingsRepository(db, clock);
  const liveNotifications = new LiveNotificationsRepository(db);
  const users = new UsersRepository(db, clock);
  const payments = new PaymentsRepository(db, clock);
  const trackedAccounts = new TrackedAccountsRepository(db);

  const rateLimiter = new RateLimiter({
    limits: worker.rateLimits,
    now: () => clock().getTime()
  });

  const liveNotifier = new LiveNotifier(messenger, liveNotifications, {
    clock,
    sendIntervalMs
  });

  const handlers = createJobHandlers({
    messenger,
    users,
    payments,
    trackedAccounts,
    jobs,
    liveNotifier,
    rateLimiter,
    bot,
    clock,
    broadcastIntervalMs: sendIntervalMs
  });

  const dispatcher = new Dispatcher({ handlers, rateLimiter });

  const autoBroadcast = new AutoBroadcastTrigger({
    db,
    metric: trackedAccounts,
    jobs,
    settings,
    config: worker.autoBroadcast,
    clock
  });

  const periodicTasks = createPeriodicTasks({
    autoBroadcast,
    jobs,
    liveNotifications,
    processingLeaseMs: worker.processingLeaseMs,
    clock
  });

  return {
    jobs,
    dispatcher,
    rateLimiter,
    autoBroadcast,
    workerDeps: {
      jobs,
      dispatcher,
      periodicTasks,
      config: worker,
      now: () => clock().getTime()
    }
  };
}
