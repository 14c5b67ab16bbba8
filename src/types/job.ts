export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export function isJobStatus(value: string): value is JobStatus {
  return (JOB_STATUSES as readonly string[]).includes(value);
}

export const JOB_TYPES = [
  'process_update',
  'broadcast_message',
  'notify_live',
  'send_to_groups'
] as const;
export type JobType = (typeof JOB_TYPES)[number];

export function isJobType(value: string): value is JobType {
  return (JOB_TYPES as readonly string[]).includes(value);
}

/**
 * Row as the driver returns it. Timestamps depend on the driver,
 * payload may already be decoded on a json column.
 */
export interface JobRow {
  job_id: number | string;
  job_type: string;
  payload: unknown;
  status: JobStatus;
  retries: number | string;
  created_at: Date | string | number;
  updated_at: Date | string | number;
}

export interface Job {
  job_id: number;
  job_type: string;
  payload: unknown;
  status: JobStatus;
  retries: number;
  created_at: Date;
  updated_at: Date;
}

export interface JobListQuery {
  status?: JobStatus;
  type?: string;
  limit?: number;
  offset?: number;
}
