import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JobStore } from '../../src/db/repositories/jobsRepository';
import { LiveNotificationsRepository } from '../../src/db/repositories/liveNotificationsRepository';
import { PaymentsRepository } from '../../src/db/repositories/paymentsRepository';
import { UsersRepository } from '../../src/db/repositories/usersRepository';
import { TABLES } from '../../src/db/schema';
import { Job } from '../../src/types/job';
import { ok, retryable } from '../../src/types/outcome';
import {
  processNextJob,
  runWorkerLoop,
  WorkerDeps,
  WorkerLoopConfig
} from '../../src/workers/jobsWorker';
import { sleep } from '../../src/utils/dateUtils';
import { createTestDb, manualClock, ManualClock, TestDbHarness } from '../helpers/testDb';
import { createTestRuntime, TestRuntime } from '../helpers/testRuntime';

const fastLoop = {
  pollIntervalMs: 5,
  runOnceRetryDelayMs: 5
};

const loopConfig: WorkerLoopConfig = {
  ...fastLoop,
  slowJobThresholdMs: 5000,
  periodicIntervalMs: 60_000,
  excludedJobTypes: [],
  runOnceEmptyRetries: 2
};

const sampleJob: Job = {
  job_id: 1,
  job_type: 'notify_live',
  payload: '{}',
  status: 'processing',
  retries: 0,
  created_at: new Date('2024-05-01T12:00:00.000Z'),
  updated_at: new Date('2024-05-01T12:00:00.000Z')
};

describe('worker loop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stops in run-once mode after three empty polls', async () => {
    const claimNext = vi.fn(async () => null);
    const periodic = vi.fn(async () => undefined);

    const stats = await runWorkerLoop(
      {
        jobs: { claimNext, finish: vi.fn(async () => null) },
        dispatcher: { dispatch: vi.fn(async () => ok()) },
        periodicTasks: [{ name: 'counter', run: periodic }],
        config: loopConfig
      },
      { runOnce: true }
    );

    expect(claimNext).toHaveBeenCalledTimes(3);
    expect(stats.cycles).toBe(3);
    expect(stats.processed).toBe(0);
    expect(periodic).toHaveBeenCalledTimes(1);
  });

  it('survives crashing iterations and backs off', async () => {
    const jobs: JobStore = {
      claimNext: vi.fn(async () => {
        throw new Error('connection refused');
      }),
      finish: vi.fn(async () => null)
    };

    const started = Date.now();
    const stats = await runWorkerLoop(
      { jobs, dispatcher: { dispatch: vi.fn(async () => ok()) }, periodicTasks: [], config: loopConfig },
      { runOnce: true }
    );

    expect(stats.loopErrors).toBe(3);
    expect(Date.now() - started).toBeGreaterThanOrEqual(9);
  });

  it('keeps going when a periodic task fails', async () => {
    const claimNext = vi.fn(async () => null);

    const stats = await runWorkerLoop(
      {
        jobs: { claimNext, finish: vi.fn(async () => null) },
        dispatcher: { dispatch: vi.fn(async () => ok()) },
        periodicTasks: [
          {
            name: 'broken',
            run: async () => {
              throw new Error('boom');
            }
          }
        ],
        config: loopConfig
      },
      { runOnce: true }
    );

    expect(stats.loopErrors).toBe(0);
    expect(stats.periodicRuns).toBe(1);
    expect(claimNext).toHaveBeenCalledTimes(3);
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    let handed = false;
    const deps: WorkerDeps = {
      jobs: {
        claimNext: async () => {
          if (handed) return null;
          handed = true;
          return sampleJob;
        },
        finish: async () => 'completed'
      },
      dispatcher: {
        dispatch: async () => {
          controller.abort();
          return ok();
        }
      },
      periodicTasks: [],
      config: loopConfig
    };

    const stats = await runWorkerLoop(deps, { signal: controller.signal });

    expect(stats).toMatchObject({ cycles: 1, processed: 1, completed: 1 });
  });

  it('records the outcome and reports slow jobs', async () => {
    let now = 0;
    const finish = vi.fn(async () => 'pending' as const);
    const deps: WorkerDeps = {
      jobs: { claimNext: async () => ({ ...sampleJob, retries: 1 }), finish },
      dispatcher: {
        dispatch: async () => {
          now += 6000;
          return retryable('upstream down');
        }
      },
      periodicTasks: [],
      config: loopConfig,
      now: () => now
    };

    const processed = await processNextJob(deps, 'worker:test');

    expect(finish).toHaveBeenCalledWith(1, false, 1);
    expect(processed?.status).toBe('pending');
    expect(processed?.elapsedMs).toBe(6000);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('"msg":"Slow job"'));
  });
});

describe('worker loop against the database', () => {
  let harness: TestDbHarness;
  let time: ManualClock;
  let rt: TestRuntime;
  let users: UsersRepository;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    harness = await createTestDb();
    time = manualClock();
    rt = createTestRuntime(harness.db, time, { worker: fastLoop });
    users = new UsersRepository(harness.db, time.clock);

    await users.register({ id: 42, firstName: 'Ada', language: 'en', startingPoints: 3 });
    await new PaymentsRepository(harness.db, time.clock).recordPayment({
      userId: 42,
      chargeId: 'c1',
      amount: 150,
      packageId: 'premium_7d'
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await harness.cleanup();
  });

  it('delivers a queued live alert and completes the job', async () => {
    const jobId = await rt.jobs.enqueue('notify_live', {
      entity: 'acct1',
      link: 'https://live.test/acct1'
    });

    const stats = await runWorkerLoop(rt.workerDeps, { runOnce: true });

    expect(stats).toMatchObject({ processed: 1, completed: 1, requeued: 0, failed: 0 });
    expect((await rt.jobs.get(jobId))?.status).toBe('completed');
    expect(rt.messenger.callsTo('sendMessage').map((c) => [c.chatId, c.text])).toEqual([
      [42, '🔴 *LIVE NOW!*\n\n*acct1* started streaming!\n\n[Watch Now](https://live.test/acct1)']
    ]);
    expect(
      await new LiveNotificationsRepository(harness.db).countFor('acct1', '42')
    ).toBe(1);
  });

  it('processes at most one job per run-once call', async () => {
    const ids = [
      await rt.jobs.enqueue('notify_live', { entity: 'acct1', link: 'https://live.test/acct1' }),
      await rt.jobs.enqueue('notify_live', { entity: 'acct2', link: 'https://live.test/acct2' }),
      await rt.jobs.enqueue('notify_live', { entity: 'acct3', link: 'https://live.test/acct3' })
    ];

    const stats = await runWorkerLoop(rt.workerDeps, { runOnce: true });

    expect(stats).toMatchObject({ cycles: 1, processed: 1, completed: 1 });
    const statuses = await Promise.all(ids.map(async (id) => (await rt.jobs.get(id))?.status));
    expect(statuses).toEqual(['completed', 'pending', 'pending']);
  });

  it('retries a failing job up to the ceiling and then fails it', async () => {
    rt.messenger.failAlways('sendMessage', new Error('socket hang up'));
    const jobId = await rt.jobs.enqueue('notify_live', { entity: 'acct1', link: 'https://live.test/acct1' });

    const outcomes: Array<[number, number, number]> = [];
    for (let attempt = 0; attempt < 4; attempt++) {
      const stats = await runWorkerLoop(rt.workerDeps, { runOnce: true });
      outcomes.push([stats.processed, stats.requeued, stats.failed]);
    }

    expect(outcomes).toEqual([
      [1, 1, 0],
      [1, 1, 0],
      [1, 1, 0],
      [1, 0, 1]
    ]);
    const job = await rt.jobs.get(jobId);
    expect(job?.status).toBe('failed');
    expect(job?.retries).toBe(4);
  });

  it('keeps the lease of a job that runs longer than the lease', async () => {
    const jobId = await rt.jobs.enqueue('notify_live', { entity: 'acct1', link: 'https://live.test/acct1' });
    const lease = 15 * 60 * 1000;
    const seen: { recovered?: unknown; secondClaim?: unknown } = {};

    const processed = await processNextJob(
      {
        ...rt.workerDeps,
        config: { ...loopConfig, heartbeatIntervalMs: 5 },
        dispatcher: {
          dispatch: async () => {
            time.advance(lease + 60_000);
            await sleep(40);
            seen.recovered = await rt.jobs.recoverStale(lease);
            seen.secondClaim = await rt.jobs.claimNext([]);
            return ok();
          }
        }
      },
      'worker:test'
    );

    expect(seen.recovered).toEqual({ requeued: [], failed: [] });
    expect(seen.secondClaim).toBeNull();
    expect(processed?.status).toBe('completed');
    expect((await rt.jobs.get(jobId))?.retries).toBe(0);
  });

  it('leaves excluded job types in the queue', async () => {
    const jobId = await rt.jobs.enqueue('send_to_groups', { text: 'hi' });

    const stats = await runWorkerLoop(rt.workerDeps, { runOnce: true });

    expect(stats.processed).toBe(0);
    expect((await rt.jobs.get(jobId))?.status).toBe('pending');
  });

  it('queues and delivers an auto-broadcast once enough accounts are live', async () => {
    await harness.db(TABLES.trackedAccounts).insert(
      Array.from({ length: 10 }, (_, i) => ({
        username: `acct${i}`,
        link: `https://live.test/acct${i}`,
        is_live: true,
        total_lives: 1,
        last_live_at: '2024-05-01T11:00:00.000Z'
      }))
    );

    const stats = await runWorkerLoop(rt.workerDeps, { runOnce: true });

    expect(stats).toMatchObject({ periodicRuns: 1, processed: 1, completed: 1 });
    expect(rt.messenger.callsTo('sendMessage').map((c) => [c.chatId, c.text])).toEqual([
      [42, '10 streams are live right now. Open the bot to watch!']
    ]);
  });
});
