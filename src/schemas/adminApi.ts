import { z } from 'zod';
import { JOB_STATUSES, JOB_TYPES, JobType } from '../types/job';
import { BroadcastPayloadSchema, NotifyLivePayloadSchema } from './jobPayloads';

export const JobListQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  type: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

export const JobIdParamSchema = z.coerce.number().int().positive();

export const EnqueueJobSchema = z.object({
  job_type: z.enum(JOB_TYPES),
  payload: z.record(z.unknown())
});

/** Incoming bot update; everything besides the id is checked when processed. */
export const UpdateBodySchema = z
  .object({ update_id: z.number().int() })
  .passthrough();

const PAYLOAD_SCHEMAS: Record<JobType, z.ZodTypeAny> = {
  process_update: UpdateBodySchema,
  broadcast_message: BroadcastPayloadSchema,
  notify_live: NotifyLivePayloadSchema,
  send_to_groups: z.record(z.unknown())
};

/**
 * Validates a payload before it is queued. Returns the first problem,
 * or null. The payload is stored as given.
 */
export function findPayloadProblem(jobType: JobType, payload: unknown): string | null {
  const result = PAYLOAD_SCHEMAS[jobType].safeParse(payload);
  if (result.success) return null;

  const issue = result.error.issues[0];
  const path = issue?.path.length ? `${issue.path.join('.')}: ` : '';
  return `${path}${issue?.message ?? 'invalid payload'}`;
}
