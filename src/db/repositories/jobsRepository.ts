// src/db/repositories/jobsRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import { supportsRowLocks } from '../locking';
import {
  isJobStatus,
  Job,
  JobListQuery,
  JobRow,
  JobStatus
} from '../../types/job';
import {
  Clock,
  fromDbTimestamp,
  systemClock,
  toDbTimestamp
} from '../../utils/dateUtils';

export const DEFAULT_RETRY_CEILING = 3;

/**
 * The part of the repository the worker loop depends on.
 */
export interface JobStore {
  claimNext(excludedTypes: readonly string[]): Promise<Job | null>;
  finish(
    jobId: number,
    success: boolean,
    currentRetries: number
  ): Promise<JobStatus | null>;
  /** Refreshes the processing lease; false once the job left processing. */
  touch?(jobId: number): Promise<boolean>;
}

export interface JobsRepositoryOptions {
  retryCeiling?: number;
  clock?: Clock;
}

export interface StaleRecoveryResult {
  requeued: number[];
  failed: number[];
}

export function mapJobRow(row: JobRow): Job {
  return {
    job_id: Number(row.job_id),
    job_type: row.job_type,
    payload: row.payload,
    status: row.status,
    retries: Number(row.retries),
    created_at: fromDbTimestamp(row.created_at),
    updated_at: fromDbTimestamp(row.updated_at)
  };
}

/**
 * Status and retry count after one processing attempt.
 * A failure re-queues the job while the retries recorded before the
 * attempt are below the ceiling; the attempt made at the ceiling fails it.
 */
export function resolveAttemptOutcome(
  success: boolean,
  currentRetries: number,
  retryCeiling: number
): { status: JobStatus; retries: number } {
  if (success) {
    return { status: 'completed', retries: currentRetries };
  }

  return {
    status: currentRetries < retryCeiling ? 'pending' : 'failed',
    retries: currentRetries + 1
  };
}

export class JobsRepository implements JobStore {
  private readonly retryCeiling: number;
  private readonly clock: Clock;
  private readonly rowLocks: boolean;

  constructor(
    private readonly db: Knex,
    options: JobsRepositoryOptions = {}
  ) {
    this.retryCeiling = options.retryCeiling ?? DEFAULT_RETRY_CEILING;
    this.clock = options.clock ?? systemClock;
    this.rowLocks = supportsRowLocks(db);
  }

  /**
   * Atomically claim the oldest pending job whose type is not excluded:
   * - status = pending
   * - ordered by created_at, then job_id
   * Marks it processing inside the same transaction. Concurrent claimers
   * skip the locked row instead of waiting on it, so each pending job is
   * handed to at most one caller.
   */
  async claimNext(excludedTypes: readonly string[] = []): Promise<Job | null> {
    return this.db.transaction(async (trx) => {
      const query = trx<JobRow>(TABLES.jobs)
        .select('*')
        .where('status', 'pending')
        .orderBy('created_at', 'asc')
        .orderBy('job_id', 'asc')
        .limit(1);

      if (excludedTypes.length) {
        query.whereNotIn('job_type', [...excludedTypes]);
      }

      if (this.rowLocks) {
        query.forUpdate().skipLocked();
      }

      const rows: JobRow[] = await query;
      const row = rows[0];
      if (!row) return null;

      const now = toDbTimestamp(this.clock());

      await trx(TABLES.jobs)
        .where({ job_id: row.job_id })
        .update({ status: 'processing', updated_at: now });

      return mapJobRow({ ...row, status: 'processing', updated_at: now });
    });
  }

  /**
   * Record the result of a processing attempt. Only applies to a job that
   * is still processing; returns the new status, or null when the row was
   * no longer processing (e.g. taken back by stale recovery).
   */
  async finish(
    jobId: number,
    success: boolean,
    currentRetries: number
  ): Promise<JobStatus | null> {
    const next = resolveAttemptOutcome(success, currentRetries, this.retryCeiling);

    const updated = await this.db(TABLES.jobs)
      .where({ job_id: jobId, status: 'processing' })
      .update({
        status: next.status,
        retries: next.retries,
        updated_at: toDbTimestamp(this.clock())
      });

    return updated > 0 ? next.status : null;
  }

  async touch(jobId: number): Promise<boolean> {
    const updated = await this.db(TABLES.jobs)
      .where({ job_id: jobId, status: 'processing' })
      .update({ updated_at: toDbTimestamp(this.clock()) });
    return updated > 0;
  }

  /**
   * Queue a new job. Pass `trx` to make the insert part of a larger
   * transaction.
   */
  async enqueue(
    jobType: string,
    payload: unknown,
    trx?: Knex.Transaction
  ): Promise<number> {
    const conn = trx ?? this.db;
    const now = toDbTimestamp(this.clock());

    const [inserted] = await conn<JobRow>(TABLES.jobs)
      .insert({
        job_type: jobType,
        payload: JSON.stringify(payload ?? {}),
        status: 'pending',
        retries: 0,
        created_at: now,
        updated_at: now
      })
      .returning('job_id');

    return Number(inserted.job_id);
  }

  async get(jobId: number): Promise<Job | null> {
    const row = await this.db<JobRow>(TABLES.jobs)
      .where('job_id', jobId)
      .first();
    return row ? mapJobRow(row) : null;
  }

  async list(query: JobListQuery = {}): Promise<Job[]> {
    const builder = this.db<JobRow>(TABLES.jobs).select('*');

    if (query.status) builder.where('status', query.status);
    if (query.type) builder.where('job_type', query.type);

    const rows: JobRow[] = await builder
      .orderBy('job_id', 'desc')
      .limit(query.limit ?? 50)
      .offset(query.offset ?? 0);

    return rows.map(mapJobRow);
  }

  async countByStatus(): Promise<Record<JobStatus, number>> {
    const rows: Array<{ status: string; count: number | string }> =
      await this.db(TABLES.jobs)
        .select('status')
        .count({ count: '*' })
        .groupBy('status');

    const counts: Record<JobStatus, number> = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0
    };

    for (const row of rows) {
      if (isJobStatus(row.status)) {
        counts[row.status] = Number(row.count);
      }
    }
    return counts;
  }

  /**
   * Manual retry of a permanently failed job: back to pending with a
   * fresh retry budget. Jobs in any other state are left alone.
   */
  async requeueFailed(jobId: number): Promise<boolean> {
    const updated = await this.db(TABLES.jobs)
      .where({ job_id: jobId, status: 'failed' })
      .update({
        status: 'pending',
        retries: 0,
        updated_at: toDbTimestamp(this.clock())
      });
    return updated > 0;
  }

  /**
   * Jobs left in processing for longer than the lease (worker crashed
   * mid-handler) count as a failed attempt: re-queued below the retry
   * ceiling, failed at it.
   */
  async recoverStale(leaseMs: number): Promise<StaleRecoveryResult> {
    const now = this.clock();
    const cutoff = toDbTimestamp(new Date(now.getTime() - leaseMs));

    return this.db.transaction(async (trx) => {
      const query = trx<JobRow>(TABLES.jobs)
        .select('*')
        .where('status', 'processing')
        .andWhere('updated_at', '<', cutoff)
        .orderBy('job_id', 'asc');

      if (this.rowLocks) {
        query.forUpdate().skipLocked();
      }

      const stale: JobRow[] = await query;
      const result: StaleRecoveryResult = { requeued: [], failed: [] };

      for (const row of stale) {
        const next = resolveAttemptOutcome(
          false,
          Number(row.retries),
          this.retryCeiling
        );

        await trx(TABLES.jobs)
          .where({ job_id: row.job_id, status: 'processing' })
          .update({
            status: next.status,
            retries: next.retries,
            updated_at: toDbTimestamp(now)
          });

        const jobId = Number(row.job_id);
        if (next.status === 'failed') {
          result.failed.push(jobId);
        } else {
          result.requeued.push(jobId);
        }
      }

      return result;
    });
  }
}
