import { Env, envInt } from './env';
import { logError } from '../utils/logger';

export interface RateLimitRule {
  maxRequests: number;
  windowSeconds: number;
}

export type RateLimitTable = Readonly<Record<string, RateLimitRule>>;

export const DEFAULT_RATE_LIMITS: RateLimitTable = {
  check_live: { maxRequests: 5, windowSeconds: 60 },
  live_check_logic: { maxRequests: 10, windowSeconds: 60 },
  button_click: { maxRequests: 20, windowSeconds: 60 },
  payment: { maxRequests: 3, windowSeconds: 300 },
  message: { maxRequests: 10, windowSeconds: 60 }
};

const SAFE_RULE: RateLimitRule = { maxRequests: 5, windowSeconds: 60 };

/**
 * Per-action overrides: RATE_LIMIT_<ACTION>_COUNT and RATE_LIMIT_<ACTION>_WINDOW,
 * e.g. RATE_LIMIT_BUTTON_CLICK_COUNT=30.
 */
export function loadRateLimits(
  env: Env,
  defaults: RateLimitTable = DEFAULT_RATE_LIMITS
): RateLimitTable {
  const table: Record<string, RateLimitRule> = {};

  for (const [action, rule] of Object.entries(defaults)) {
    const prefix = `RATE_LIMIT_${action.toUpperCase()}`;
    const maxRequests = envInt(env, `${prefix}_COUNT`, rule.maxRequests);
    const windowSeconds = envInt(env, `${prefix}_WINDOW`, rule.windowSeconds);

    if (maxRequests <= 0 || windowSeconds <= 0) {
      logError('config', `Invalid rate limit for ${action}, using safe defaults`, {
        maxRequests,
        windowSeconds
      });
      table[action] = SAFE_RULE;
    } else {
      table[action] = { maxRequests, windowSeconds };
    }
  }

  return table;
}
