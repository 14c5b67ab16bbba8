// src/workers/jobsWorker.ts
import { randomUUID } from 'crypto';

import { JobStore } from '../db/repositories/jobsRepository';
import { WorkerConfig } from '../config/workerConfig';
import { Job, JobStatus } from '../types/job';
import { HandlerOutcome, isSuccess } from '../types/outcome';
import { sleep } from '../utils/dateUtils';
import { errorMessage, logError, logInfo, logWarn } from '../utils/logger';

export interface JobDispatcher {
  dispatch(job: Job, ctx: string): Promise<HandlerOutcome>;
}

export interface PeriodicTask {
  name: string;
  run(ctx: string): Promise<void>;
}

export type WorkerLoopConfig = Pick<
  WorkerConfig,
  | 'pollIntervalMs'
  | 'slowJobThresholdMs'
  | 'periodicIntervalMs'
  | 'excludedJobTypes'
  | 'runOnceEmptyRetries'
  | 'runOnceRetryDelayMs'
> &
  Partial<Pick<WorkerConfig, 'heartbeatIntervalMs'>>;

export interface WorkerDeps {
  jobs: JobStore;
  dispatcher: JobDispatcher;
  periodicTasks: PeriodicTask[];
  config: WorkerLoopConfig;
  /** Millisecond clock for timing and the periodic schedule. */
  now?: () => number;
}

export interface WorkerRunOptions {
  runOnce?: boolean;
  signal?: AbortSignal;
  runId?: string;
}

export interface WorkerStats {
  cycles: number;
  processed: number;
  completed: number;
  requeued: number;
  failed: number;
  loopErrors: number;
  periodicRuns: number;
}

export interface ProcessedJob {
  job: Job;
  outcome: HandlerOutcome;
  status: JobStatus | null;
  elapsedMs: number;
}

/**
 * Keeps the processing lease of a running job fresh so stale recovery
 * does not take it back. Returns the function that stops the timer.
 */
function startHeartbeat(deps: WorkerDeps, jobId: number, jobCtx: string): () => void {
  const intervalMs = deps.config.heartbeatIntervalMs ?? 0;
  const touch = deps.jobs.touch?.bind(deps.jobs);
  if (intervalMs <= 0 || !touch) return () => undefined;

  const timer = setInterval(() => {
    void touch(jobId)
      .then((alive) => {
        if (!alive) {
          logWarn(jobCtx, 'Job lease lost while running', { jobId });
        }
      })
      .catch((err: unknown) => {
        logWarn(jobCtx, 'Job heartbeat failed', { jobId, error: errorMessage(err) });
      });
  }, intervalMs);

  return () => clearInterval(timer);
}

/**
 * Claim one job, dispatch it and record the result. Returns null when
 * nothing was claimable.
 */
export async function processNextJob(
  deps: WorkerDeps,
  workerCtx: string
): Promise<ProcessedJob | null> {
  const now = deps.now ?? Date.now;
  const job = await deps.jobs.claimNext(deps.config.excludedJobTypes);
  if (!job) return null;

  const jobCtx = `job:${job.job_id}`;
  logInfo(jobCtx, 'Starting job', {
    jobId: job.job_id,
    type: job.job_type,
    retries: job.retries,
    worker: workerCtx
  });

  const started = now();
  const stopHeartbeat = startHeartbeat(deps, job.job_id, jobCtx);
  let outcome: HandlerOutcome;
  try {
    outcome = await deps.dispatcher.dispatch(job, jobCtx);
  } finally {
    stopHeartbeat();
  }
  const elapsedMs = now() - started;

  const status = await deps.jobs.finish(job.job_id, isSuccess(outcome), job.retries);

  if (elapsedMs > deps.config.slowJobThresholdMs) {
    logWarn(jobCtx, 'Slow job', {
      jobId: job.job_id,
      type: job.job_type,
      elapsedMs,
      thresholdMs: deps.config.slowJobThresholdMs
    });
  }

  const meta = {
    jobId: job.job_id,
    type: job.job_type,
    outcome: outcome.status,
    status,
    elapsedMs
  };

  if (outcome.status === 'retryable') {
    logError(jobCtx, 'Job attempt failed', { ...meta, error: outcome.error });
  } else if (outcome.status === 'dropped') {
    logInfo(jobCtx, 'Job dropped', { ...meta, reason: outcome.reason });
  } else {
    logInfo(jobCtx, 'Job completed', meta);
  }

  if (status === null) {
    logWarn(jobCtx, 'Job was no longer processing when finished', { jobId: job.job_id });
  }

  return { job, outcome, status, elapsedMs };
}

async function runPeriodicTasks(
  tasks: PeriodicTask[],
  workerCtx: string
): Promise<void> {
  for (const task of tasks) {
    try {
      await task.run(workerCtx);
    } catch (err) {
      logError(workerCtx, `Periodic task ${task.name} failed`, {
        error: errorMessage(err)
      });
    }
  }
}

function countStatus(stats: WorkerStats, status: JobStatus | null): void {
  if (status === 'completed') stats.completed += 1;
  else if (status === 'pending') stats.requeued += 1;
  else if (status === 'failed') stats.failed += 1;
}

/**
 * One sequential loop: periodic tasks when due, then claim, dispatch,
 * finish. Runs until `signal` aborts. In run-once mode it processes at
 * most one job, polling an empty queue a few extra times before giving up.
 */
export async function runWorkerLoop(
  deps: WorkerDeps,
  opts: WorkerRunOptions = {}
): Promise<WorkerStats> {
  const now = deps.now ?? Date.now;
  const { config } = deps;
  const { signal, runOnce = false } = opts;
  const workerCtx = `worker:${opts.runId ?? randomUUID()}`;

  const stats: WorkerStats = {
    cycles: 0,
    processed: 0,
    completed: 0,
    requeued: 0,
    failed: 0,
    loopErrors: 0,
    periodicRuns: 0
  };

  logInfo(workerCtx, 'Starting worker loop', {
    pollMs: config.pollIntervalMs,
    periodicMs: config.periodicIntervalMs,
    excluded: config.excludedJobTypes,
    runOnce
  });

  let lastPeriodic = 0;
  let emptyPolls = 0;

  while (!signal?.aborted) {
    stats.cycles += 1;

    try {
      const current = now();
      if (current - lastPeriodic > config.periodicIntervalMs) {
        // stamped first so a failing task does not run on every cycle
        lastPeriodic = current;
        stats.periodicRuns += 1;
        await runPeriodicTasks(deps.periodicTasks, workerCtx);
      }

      const processed = await processNextJob(deps, workerCtx);

      if (processed) {
        emptyPolls = 0;
        stats.processed += 1;
        countStatus(stats, processed.status);
        if (runOnce) break;
        continue;
      }

      if (runOnce) {
        if (emptyPolls >= config.runOnceEmptyRetries) break;
        emptyPolls += 1;
        await sleep(config.runOnceRetryDelayMs, signal);
        continue;
      }

      await sleep(config.pollIntervalMs, signal);
    } catch (err) {
      stats.loopErrors += 1;
      logError(workerCtx, 'Worker loop iteration crashed', {
        error: errorMessage(err)
      });

      if (runOnce) {
        if (emptyPolls >= config.runOnceEmptyRetries) break;
        emptyPolls += 1;
      }
      await sleep(config.pollIntervalMs * 2, signal);
    }
  }

  logInfo(workerCtx, 'Worker loop stopped', { ...stats });
  return stats;
}
