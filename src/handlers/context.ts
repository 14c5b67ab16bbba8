// src/handlers/context.ts
import { BotConfig } from '../config/botConfig';
import { JobsRepository } from '../db/repositories/jobsRepository';
import { PaymentsRepository, premiumCutoff } from '../db/repositories/paymentsRepository';
import { TrackedAccountsRepository } from '../db/repositories/trackedAccountsRepository';
import { UsersRepository } from '../db/repositories/usersRepository';
import { CallbackQuery } from '../schemas/update';
import { InlineKeyboard, Messenger } from '../services/botApiClient';
import { deliveryFailureOutcome, isTransientError } from '../services/deliveryErrors';
import { LiveNotifier } from '../services/liveNotifier';
import { RateLimiter } from '../services/rateLimiter';
import { HandlerOutcome, ok } from '../types/outcome';
import { Clock } from '../utils/dateUtils';
import { errorMessage, logError, logWarn } from '../utils/logger';

export interface HandlerDeps {
  messenger: Messenger;
  users: UsersRepository;
  payments: PaymentsRepository;
  trackedAccounts: TrackedAccountsRepository;
  jobs: JobsRepository;
  liveNotifier: LiveNotifier;
  rateLimiter: RateLimiter;
  bot: BotConfig;
  clock: Clock;
  /** Pause between two broadcast recipients. */
  broadcastIntervalMs: number;
}

/**
 * Run a delivery and turn its failure into a job outcome: transient
 * errors are retried, permanent ones dropped.
 */
export async function deliver(
  ctx: string,
  what: string,
  send: () => Promise<unknown>
): Promise<HandlerOutcome> {
  try {
    await send();
    return ok();
  } catch (err) {
    logError(ctx, `${what} failed`, { error: errorMessage(err) });
    return deliveryFailureOutcome(err, what);
  }
}

/**
 * Replace the screen the button belongs to. Falls back to a new message
 * when the old one cannot be edited.
 */
export async function showScreen(
  deps: HandlerDeps,
  ctx: string,
  query: CallbackQuery,
  text: string,
  keyboard?: InlineKeyboard
): Promise<HandlerOutcome> {
  const opts = { parseMode: 'Markdown' as const, keyboard };

  return deliver(ctx, 'show screen', async () => {
    if (query.message) {
      try {
        await deps.messenger.editMessageText(
          query.message.chat.id,
          query.message.message_id,
          text,
          opts
        );
        return;
      } catch (err) {
        if (isTransientError(err)) throw err;
        logWarn(ctx, 'Edit failed, sending a new message', { error: errorMessage(err) });
      }
    }
    await deps.messenger.sendMessage(query.from.id, text, opts);
  });
}

export function reply(
  deps: HandlerDeps,
  ctx: string,
  chatId: number,
  text: string,
  keyboard?: InlineKeyboard
): Promise<HandlerOutcome> {
  return deliver(ctx, 'sendMessage', () =>
    deps.messenger.sendMessage(chatId, text, { parseMode: 'Markdown', keyboard })
  );
}

export function currentPremiumCutoff(deps: HandlerDeps): Date {
  return premiumCutoff(deps.clock(), deps.bot.premiumValidityDays);
}

export function isPremium(deps: HandlerDeps, userId: number): Promise<boolean> {
  return deps.payments.hasActivePremium(userId, currentPremiumCutoff(deps));
}
