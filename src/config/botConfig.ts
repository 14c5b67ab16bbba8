import { Env, envInt, envIntClamped, envList } from './env';

export interface BotConfig {
  token: string;
  apiBaseUrl: string;
  username: string;
  adminIds: number[];
  premiumValidityDays: number;
  dailyPoints: number;
  liveStreamsPerPage: number;
  /** How many earlier messages "clear notifications" tries to delete. */
  clearMessagesLimit: number;
  preCheckoutDeadlineMs: number;
  /** Share of the pre-checkout deadline given to validation. */
  preCheckoutValidationBudgetMs: number;
  webhookSecret: string | null;
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  const token = env.BOT_TOKEN;
  if (!token) throw new Error('BOT_TOKEN is not configured');

  return {
    token,
    apiBaseUrl: env.BOT_API_BASE_URL || 'https://api.telegram.org',
    username: env.BOT_USERNAME || 'LiveQueueBot',
    adminIds: envList(env, 'ADMIN_IDS', [])
      .map(Number)
      .filter((id) => Number.isInteger(id)),
    premiumValidityDays: envIntClamped(env, 'PREMIUM_VALIDITY_DAYS', 30, 1, 365),
    dailyPoints: envIntClamped(env, 'DEFAULT_DAILY_POINTS', 3, 1, 100),
    liveStreamsPerPage: envIntClamped(env, 'LIVE_STREAMS_PER_PAGE', 5, 1, 20),
    clearMessagesLimit: envIntClamped(env, 'CLEAR_MESSAGES_LIMIT', 100, 1, 500),
    preCheckoutDeadlineMs: 10_000,
    preCheckoutValidationBudgetMs: envInt(env, 'PRE_CHECKOUT_VALIDATION_BUDGET_MS', 6_000),
    webhookSecret: env.BOT_WEBHOOK_SECRET || null
  };
}
