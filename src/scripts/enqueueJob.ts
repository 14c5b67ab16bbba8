// src/scripts/enqueueJob.ts
import 'dotenv/config';
import { destroyDb, getDb } from '../db/knex';
import { JobsRepository } from '../db/repositories/jobsRepository';
import { findPayloadProblem } from '../schemas/adminApi';
import { isJobType, JOB_TYPES, JobType } from '../types/job';
import { createContextId, errorMessage, logError, logInfo } from '../utils/logger';

interface CliOptions {
  jobType: JobType;
  payload: Record<string, unknown>;
}

function usage(): never {
  console.error(
    [
      'Usage:',
      '  npm run enqueue -- <job_type> \'<json payload>\'',
      '',
      `Job types: ${JOB_TYPES.join(', ')}`,
      '',
      'Examples:',
      '  npm run enqueue -- notify_live \'{"entity":"acct1","link":"https://example.com/acct1/live"}\'',
      '  npm run enqueue -- broadcast_message \'{"message":"Hello","target":"premium"}\''
    ].join('\n')
  );
  process.exit(1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCliArgs(argv: string[]): CliOptions {
  const [jobType, rawPayload = '{}'] = argv;
  if (!jobType || !isJobType(jobType)) usage();

  let payload: unknown;
  try {
    payload = JSON.parse(rawPayload);
  } catch {
    console.error(`Payload is not valid JSON: ${rawPayload}`);
    usage();
  }
  if (!isRecord(payload)) usage();

  return { jobType, payload };
}

async function main(): Promise<void> {
  const { jobType, payload } = parseCliArgs(process.argv.slice(2));
  const ctx = createContextId('enqueue');

  const problem = findPayloadProblem(jobType, payload);
  if (problem) {
    logError(ctx, 'Invalid payload', { jobType, problem });
    process.exitCode = 1;
    return;
  }

  try {
    const jobId = await new JobsRepository(getDb()).enqueue(jobType, payload);
    logInfo(ctx, 'Job enqueued', { jobId, jobType });
  } catch (err) {
    logError(ctx, 'Enqueue failed', { error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    await destroyDb();
  }
}

void main();
