// src/handlers/liveHandlers.ts
import { JobHandlers } from '../services/dispatcher';
import { CallbackQuery } from '../schemas/update';
import { ok, retryable, HandlerOutcome } from '../types/outcome';
import { logInfo } from '../utils/logger';
import {
  DIVIDER,
  liveAlertKeyboard,
  liveAlertText,
  liveListKeyboard,
  liveListText,
  rateLimitedText,
  REGISTER_FIRST_TEXT,
  untilUtcMidnight
} from './menus';
import { currentPremiumCutoff, HandlerDeps, isPremium, reply, showScreen } from './context';

type LiveHandlers = Pick<JobHandlers, 'checkLive' | 'notifyLive'>;

const NO_POINTS_TEXT =
  '😢 *No Points Left!*\n\n' +
  "You're missing live streams right now!\n\n" +
  '🌟 *UPGRADE TO PREMIUM:*\n' +
  '  ✅ Unlimited checks 24/7\n' +
  '  🔔 Live notifications\n\n' +
  '🔄 *Or wait:* Points reset at midnight UTC';

export function createLiveHandlers(deps: HandlerDeps): LiveHandlers {
  const { users, trackedAccounts, liveNotifier, rateLimiter, bot, clock } = deps;

  function limited(ctx: string, userId: number, action: string): Promise<HandlerOutcome> | null {
    if (rateLimiter.allowed(userId, action)) return null;
    return reply(deps, ctx, userId, rateLimitedText(rateLimiter.resetInSeconds(userId, action)));
  }

  async function renderLivePage(
    ctx: string,
    query: CallbackQuery,
    page: number,
    premium: boolean
  ): Promise<HandlerOutcome> {
    const total = await trackedAccounts.countLive();
    const perPage = bot.liveStreamsPerPage;
    const totalPages = Math.max(1, Math.ceil(total / perPage));
    const current = Math.min(Math.max(1, page), totalPages);
    const offset = (current - 1) * perPage;

    const accounts = await trackedAccounts.listLive(perPage, offset);

    let text = liveListText(accounts, current, totalPages, total, offset);
    text += `\n${DIVIDER}\n`;
    if (premium) {
      text += '💎 *Status:* Premium (Unlimited)\n';
    } else {
      const user = await users.get(query.from.id);
      text +=
        `💰 *Points Left:* ${user?.points ?? 0}/${bot.dailyPoints}\n` +
        `⏰ *Reset in:* ${untilUtcMidnight(clock())}\n`;
    }

    logInfo(ctx, 'Live list shown', {
      userId: query.from.id,
      page: current,
      totalPages,
      live: total
    });
    return showScreen(deps, ctx, query, text, liveListKeyboard(current, totalPages, premium));
  }

  return {
    async checkLive(ctx, query, page) {
      const userId = query.from.id;

      const buttonLimited = limited(ctx, userId, 'check_live');
      if (buttonLimited) return buttonLimited;

      const user = await users.get(userId);
      if (!user) return reply(deps, ctx, userId, REGISTER_FIRST_TEXT);

      const lookupLimited = limited(ctx, userId, 'live_check_logic');
      if (lookupLimited) return lookupLimited;

      const premium = await isPremium(deps, userId);

      // only the first page costs a point
      if (!premium && page === 1) {
        await users.resetDailyPoints(userId, bot.dailyPoints);
        if (!(await users.spendPoint(userId))) {
          logInfo(ctx, 'User has no points left', { userId });
          return showScreen(deps, ctx, query, NO_POINTS_TEXT, [
            [{ text: '🌟 Upgrade Now', callback_data: 'buy' }],
            [{ text: '🎁 Get Referral Link', callback_data: 'referrals' }],
            [{ text: '⬅️ Back', callback_data: 'back' }]
          ]);
        }
      }

      return renderLivePage(ctx, query, page, premium);
    },

    async notifyLive(ctx, payload) {
      const recipients = await users.listLiveAlertRecipients(currentPremiumCutoff(deps));

      if (!recipients.length) {
        logInfo(ctx, 'No live alert recipients', { entity: payload.entity });
        return ok();
      }

      const result = await liveNotifier.notify(
        ctx,
        payload.entity,
        recipients,
        liveAlertText(payload.entity, payload.link),
        { parseMode: 'Markdown', keyboard: liveAlertKeyboard() }
      );

      if (result.sent === 0 && result.failed > 0) {
        return retryable(`all ${result.failed} live alerts for ${payload.entity} failed`);
      }
      return ok();
    }
  };
}
