import axios from 'axios';
import { BotApiError } from './botApiClient';
import { dropped, HandlerOutcome, retryable } from '../types/outcome';
import { errorMessage } from '../utils/logger';

function isTransientStatus(status: number | undefined): boolean {
  // Network-level / unknown status → treat as transient
  if (!status) return true;

  if (status === 408 || status === 429) return true;
  return status >= 500;
}

/**
 * Worth retrying later? Permanent answers (blocked by the user, chat not
 * found, bad request) are not. Anything that is not an HTTP answer at all
 * is assumed transient.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof BotApiError) {
    return isTransientStatus(err.status);
  }

  if (axios.isAxiosError(err)) {
    return isTransientStatus(err.response?.status);
  }

  return true;
}

/**
 * Job outcome for a failed delivery.
 */
export function deliveryFailureOutcome(err: unknown, what: string): HandlerOutcome {
  const message = `${what}: ${errorMessage(err)}`;
  return isTransientError(err) ? retryable(message) : dropped(message);
}
