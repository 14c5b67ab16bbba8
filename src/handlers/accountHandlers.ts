// src/handlers/accountHandlers.ts
import { JobHandlers } from '../services/dispatcher';
import { detectLanguage, isSupportedLanguage, languageName } from '../config/languages';
import { CallbackQuery } from '../schemas/update';
import { InlineKeyboard } from '../services/botApiClient';
import { dropped, HandlerOutcome } from '../types/outcome';
import { addMs, DAY_MS, utcDay } from '../utils/dateUtils';
import { errorMessage, logInfo, logWarn } from '../utils/logger';
import {
  BACK_TO_MENU,
  DIVIDER,
  languageKeyboard,
  mainMenuKeyboard,
  mainMenuText,
  REGISTER_FIRST_TEXT,
  untilUtcMidnight
} from './menus';
import { currentPremiumCutoff, deliver, HandlerDeps, reply, showScreen } from './context';

export const REFERRAL_BONUS_POINTS = 5;

type AccountHandlers = Pick<
  JobHandlers,
  | 'start'
  | 'reservedCommand'
  | 'myAccount'
  | 'back'
  | 'help'
  | 'referrals'
  | 'settings'
  | 'languageMenu'
  | 'setLanguage'
  | 'toggleNotifications'
  | 'clearNotifications'
>;

function displayName(firstName: string | null | undefined): string {
  return firstName || 'there';
}

function settingsScreen(language: string, notificationsEnabled: boolean): {
  text: string;
  keyboard: InlineKeyboard;
} {
  return {
    text:
      `⚙️ *SETTINGS*\n${DIVIDER}\n\n` +
      `🌍 *Current Language:* ${languageName(language)}\n` +
      `🔔 *Live Notifications:* ${notificationsEnabled ? 'ON' : 'OFF'}\n\n` +
      'Choose an option below:',
    keyboard: [
      [{ text: '🌍 Change Language', callback_data: 'lang:select' }],
      [
        {
          text: notificationsEnabled ? '🔕 Turn Notifications OFF' : '🔔 Turn Notifications ON',
          callback_data: 'toggle_notifications'
        }
      ],
      [{ text: '⬅️ Back to Menu', callback_data: 'back' }]
    ]
  };
}

export function createAccountHandlers(deps: HandlerDeps): AccountHandlers {
  const { messenger, users, payments, bot, clock } = deps;

  async function creditReferral(ctx: string, referrerId: number, newcomer: string): Promise<void> {
    const balance = await users.addPoints(referrerId, REFERRAL_BONUS_POINTS);
    if (balance === null) return;

    logInfo(ctx, 'Referral credited', { referrerId, points: REFERRAL_BONUS_POINTS });

    const text =
      '🎊 *Referral Success!*\n\n' +
      `${newcomer} just joined using your referral link!\n\n` +
      `💰 *Reward:* +${REFERRAL_BONUS_POINTS} Points\n` +
      `💎 *New Balance:* ${balance} points`;

    try {
      await messenger.sendMessage(referrerId, text, { parseMode: 'Markdown' });
    } catch (err) {
      logWarn(ctx, 'Could not tell referrer about the reward', {
        referrerId,
        error: errorMessage(err)
      });
    }
  }

  async function requireUser(ctx: string, query: CallbackQuery) {
    const user = await users.get(query.from.id);
    if (!user) {
      logWarn(ctx, 'Callback from unregistered user', { userId: query.from.id });
    }
    return user;
  }

  return {
    async start(ctx, message, referrerId) {
      const from = message.from;
      if (!from) return dropped('message without sender');

      let referredBy: number | null = null;
      if (referrerId !== null && referrerId !== from.id && (await users.get(referrerId))) {
        referredBy = referrerId;
      }

      const language = detectLanguage(from.language_code);
      const name = displayName(from.first_name);

      const { created } = await users.register({
        id: from.id,
        firstName: from.first_name,
        username: from.username,
        language,
        referredBy,
        startingPoints: bot.dailyPoints
      });

      if (created) {
        logInfo(ctx, 'New user registered', { userId: from.id, language, referredBy });
        if (referredBy !== null) {
          await creditReferral(ctx, referredBy, name);
        }

        const text =
          '🎉 *Welcome!*\n\n' +
          `Hey ${name}! Great to have you here.\n\n` +
          '🌍 *Please select your preferred language:*';
        return reply(deps, ctx, from.id, text, languageKeyboard('setlang', language));
      }

      const refilled = await users.resetDailyPoints(from.id, bot.dailyPoints);
      const prefix = refilled
        ? `☀️ *Good morning!* Your ${bot.dailyPoints} daily points are back.\n\n`
        : '';
      return reply(deps, ctx, from.id, mainMenuText(name, prefix), mainMenuKeyboard());
    },

    async reservedCommand(ctx, message, command) {
      const from = message.from;
      if (!from) return dropped('message without sender');

      logInfo(ctx, 'Reserved command used', { userId: from.id, command });
      return reply(deps, ctx, from.id, 'ℹ️ This command is reserved for future features.');
    },

    async myAccount(ctx, query) {
      const user = await requireUser(ctx, query);
      if (!user) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      const now = clock();
      const lastPayment = await payments.lastCompletedSince(user.id, currentPremiumCutoff(deps));
      const referrals = await users.countReferrals(user.id);

      let text =
        `👤 *YOUR ACCOUNT*\n${DIVIDER}\n\n` +
        `👤 *Name:* ${user.firstName ?? 'Unknown'}\n` +
        `🆔 *Username:* @${user.username ?? 'Not set'}\n` +
        `🔢 *User ID:* \`${user.id}\`\n` +
        `📅 *Joined:* ${utcDay(user.createdAt)}\n` +
        `👥 *Referrals:* ${referrals} friends\n\n`;

      if (lastPayment) {
        const validUntil = addMs(lastPayment, bot.premiumValidityDays * DAY_MS);
        text += `💎 *Status:* Premium\n📅 *Valid Until:* ${utcDay(validUntil)}\n`;
      } else {
        text +=
          `💰 *Points:* ${user.points}/${bot.dailyPoints}\n` +
          `⏰ *Reset in:* ${untilUtcMidnight(now)}\n`;
      }

      const keyboard: InlineKeyboard = [[{ text: '🔴 Check Live', callback_data: 'check_live' }]];
      if (!lastPayment) keyboard.push([{ text: '🌟 Upgrade to Premium', callback_data: 'buy' }]);
      keyboard.push(...BACK_TO_MENU);

      return showScreen(deps, ctx, query, text, keyboard);
    },

    async back(ctx, query) {
      return showScreen(
        deps,
        ctx,
        query,
        mainMenuText(displayName(query.from.first_name)),
        mainMenuKeyboard()
      );
    },

    async help(ctx, query) {
      const text =
        `ℹ️ *HELP & INFO*\n${DIVIDER}\n\n` +
        '📋 *How to use:*\n\n' +
        '🔴 *Check Live* - See who is streaming\n' +
        '   Costs 1 point per check\n\n' +
        '👤 *My Account* - Points & subscription\n\n' +
        `🎁 *Referrals* - +${REFERRAL_BONUS_POINTS} points per friend\n\n` +
        `${DIVIDER}\n\n` +
        '💎 *Points System:*\n' +
        `  • ${bot.dailyPoints} free points every day\n` +
        '  • Resets daily at midnight UTC\n' +
        '  • 1 point = 1 live check\n' +
        '  • Premium checks are unlimited';

      return showScreen(deps, ctx, query, text, BACK_TO_MENU);
    },

    async referrals(ctx, query) {
      const user = await requireUser(ctx, query);
      if (!user) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      const count = await users.countReferrals(user.id);
      const link = `https://t.me/${bot.username}?start=${user.id}`;

      const text =
        `🎁 *REFERRALS*\n${DIVIDER}\n\n` +
        `👥 *Total Referrals:* ${count}\n` +
        `💰 *Points Earned:* ${count * REFERRAL_BONUS_POINTS}\n\n` +
        '💡 *How it works:*\n\n' +
        '1️⃣ Share your link\n' +
        '2️⃣ Friend joins via link\n' +
        `3️⃣ You get +${REFERRAL_BONUS_POINTS} points!\n\n` +
        `🔗 *Your Referral Link:*\n\`${link}\``;

      const keyboard: InlineKeyboard = [
        [{ text: '📤 Share Link', url: `https://t.me/share/url?url=${encodeURIComponent(link)}` }],
        ...BACK_TO_MENU
      ];
      return showScreen(deps, ctx, query, text, keyboard);
    },

    async settings(ctx, query) {
      const user = await requireUser(ctx, query);
      if (!user) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      const screen = settingsScreen(user.language, user.notificationsEnabled);
      return showScreen(deps, ctx, query, screen.text, screen.keyboard);
    },

    async languageMenu(ctx, query) {
      const user = await requireUser(ctx, query);
      if (!user) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      const keyboard = languageKeyboard('lang', user.language);
      keyboard.push([{ text: '⬅️ Back', callback_data: 'settings' }]);

      return showScreen(
        deps,
        ctx,
        query,
        `🌍 *SELECT LANGUAGE*\n${DIVIDER}\n\nChoose your preferred language:`,
        keyboard
      );
    },

    async setLanguage(ctx, query, language, initial) {
      if (!isSupportedLanguage(language)) {
        logWarn(ctx, 'Unsupported language requested', { userId: query.from.id, language });
        return dropped(`unsupported language ${language}`);
      }

      const updated = await users.setLanguage(query.from.id, language);
      if (!updated) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      logInfo(ctx, 'Language changed', { userId: query.from.id, language, initial });
      const confirmation = `✅ Language set to ${languageName(language)}.\n\n`;

      if (initial) {
        return showScreen(
          deps,
          ctx,
          query,
          mainMenuText(displayName(query.from.first_name), confirmation),
          mainMenuKeyboard()
        );
      }

      const user = await users.get(query.from.id);
      const screen = settingsScreen(language, user?.notificationsEnabled ?? true);
      return showScreen(deps, ctx, query, confirmation + screen.text, screen.keyboard);
    },

    async toggleNotifications(ctx, query) {
      const enabled = await users.toggleNotifications(query.from.id);
      if (enabled === null) return reply(deps, ctx, query.from.id, REGISTER_FIRST_TEXT);

      logInfo(ctx, 'Live notifications toggled', { userId: query.from.id, enabled });
      const text = enabled
        ? '🔔 Live notifications are now *ON*.'
        : '🔕 Live notifications are now *OFF*.';
      const keyboard: InlineKeyboard = [
        [
          {
            text: enabled ? '🔕 Turn OFF' : '🔔 Turn ON',
            callback_data: 'toggle_notifications'
          }
        ],
        ...BACK_TO_MENU
      ];
      return reply(deps, ctx, query.from.id, text, keyboard);
    },

    async clearNotifications(ctx, query): Promise<HandlerOutcome> {
      const message = query.message;
      if (!message || message.chat.id !== query.from.id) {
        return reply(deps, ctx, query.from.id, '❌ You can only clear notifications in private chat.');
      }

      let cleared = 0;
      let skipped = 0;
      for (let i = 1; i <= bot.clearMessagesLimit && message.message_id - i > 0; i += 1) {
        try {
          await messenger.deleteMessage(message.chat.id, message.message_id - i);
          cleared += 1;
        } catch (err) {
          // already gone or too old
          skipped += 1;
        }
      }

      logInfo(ctx, 'Cleared chat messages', { userId: query.from.id, cleared, skipped });
      return deliver(ctx, 'editMessageText', () =>
        messenger.editMessageText(
          message.chat.id,
          message.message_id,
          `✅ *Cleared ${cleared} messages!*`,
          { parseMode: 'Markdown' }
        )
      );
    }
  };
}
