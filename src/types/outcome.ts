/**
 * What a handler reports back to the worker.
 *  - ok: handled
 *  - dropped: intentionally not handled (rate limited, no route, permanent
 *    delivery failure); counts as success so the job is not retried
 *  - retryable: failed, the job goes back to the queue until the retry ceiling
 */
export type HandlerOutcome =
  | { status: 'ok' }
  | { status: 'dropped'; reason: string }
  | { status: 'retryable'; error: string };

export const ok = (): HandlerOutcome => ({ status: 'ok' });

export const dropped = (reason: string): HandlerOutcome => ({
  status: 'dropped',
  reason
});

export const retryable = (error: string): HandlerOutcome => ({
  status: 'retryable',
  error
});

export function isSuccess(outcome: HandlerOutcome): boolean {
  return outcome.status !== 'retryable';
}
