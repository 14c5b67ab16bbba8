// src/handlers/menus.ts
import { InlineButton, InlineKeyboard } from '../services/botApiClient';
import { LANGUAGE_NAMES } from '../config/languages';
import { PAYMENT_PACKAGES } from '../config/paymentPackages';
import { TrackedAccount } from '../db/repositories/trackedAccountsRepository';

export const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

export const REGISTER_FIRST_TEXT = '❌ Please use /start first to register.';

export const BACK_TO_MENU: InlineKeyboard = [[{ text: '⬅️ Back to Menu', callback_data: 'back' }]];

export function mainMenuKeyboard(): InlineKeyboard {
  return [
    [{ text: '🔴 Check Live', callback_data: 'check_live' }],
    [
      { text: '👤 My Account', callback_data: 'my_account' },
      { text: '⭐ Premium', callback_data: 'buy' }
    ],
    [
      { text: '🎁 Referrals', callback_data: 'referrals' },
      { text: '⚙️ Settings', callback_data: 'settings' }
    ],
    [{ text: 'ℹ️ Help', callback_data: 'help' }]
  ];
}

export function mainMenuText(name: string, prefix = ''): string {
  return `${prefix}👋 *Hey ${name}!*\n\nWhat would you like to do?`;
}

/** Two languages per row; `prefix` is "setlang" on signup, "lang" in settings. */
export function languageKeyboard(
  prefix: 'setlang' | 'lang',
  current: string
): InlineKeyboard {
  const rows: InlineKeyboard = [];
  const entries = Object.entries(LANGUAGE_NAMES);

  for (let i = 0; i < entries.length; i += 2) {
    rows.push(
      entries.slice(i, i + 2).map(([code, name]) => ({
        text: code === current ? `✓ ${name}` : name,
        callback_data: `${prefix}:${code}`
      }))
    );
  }
  return rows;
}

export function packagesKeyboard(): InlineKeyboard {
  const rows: InlineKeyboard = Object.entries(PAYMENT_PACKAGES).map(([id, pkg]) => [
    { text: `🌟 ${pkg.title} - ⭐ ${pkg.stars}`, callback_data: `pay:${id}` }
  ]);
  rows.push([{ text: '⬅️ Back', callback_data: 'back' }]);
  return rows;
}

export function liveAlertKeyboard(): InlineKeyboard {
  return [
    [
      { text: '🔕 Turn OFF', callback_data: 'toggle_notifications' },
      { text: '🗑️ Clear All', callback_data: 'clear_notifications' }
    ]
  ];
}

export function liveAlertText(entity: string, link: string): string {
  return `🔴 *LIVE NOW!*\n\n*${entity}* started streaming!\n\n[Watch Now](${link})`;
}

export function liveListText(
  accounts: TrackedAccount[],
  page: number,
  totalPages: number,
  total: number,
  offset: number
): string {
  const header = `🔴 *LIVE NOW*\n${DIVIDER}\n\n`;

  if (!accounts.length) {
    return `${header}😴 *No one is live right now.*\n`;
  }

  let text =
    header +
    (totalPages > 1
      ? `📄 Page ${page}/${totalPages} • ${total} total streams\n\n`
      : `Found *${total}* live stream${total === 1 ? '' : 's'}!\n\n`);

  accounts.forEach((account, idx) => {
    text += `${offset + idx + 1}. 🔴 *[${account.username}](${account.link})*\n`;
    if (account.totalLives > 0) {
      text += `   📊 Total lives: ${account.totalLives}\n`;
    }
  });

  return text;
}

export function liveListKeyboard(
  page: number,
  totalPages: number,
  premium: boolean
): InlineKeyboard {
  const rows: InlineKeyboard = [];

  const nav: InlineButton[] = [];
  if (page > 1) nav.push({ text: '⬅️ Previous', callback_data: `check_live:${page - 1}` });
  if (page < totalPages) nav.push({ text: 'Next ➡️', callback_data: `check_live:${page + 1}` });
  if (nav.length) rows.push(nav);

  if (!premium) rows.push([{ text: '🌟 Upgrade to Unlimited', callback_data: 'buy' }]);
  rows.push([{ text: '🔄 Refresh', callback_data: 'check_live' }]);
  rows.push([{ text: '⬅️ Back to Menu', callback_data: 'back' }]);
  return rows;
}

/** "Xh Ym" until the next UTC midnight. */
export function untilUtcMidnight(now: Date): string {
  const next = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1);
  const minutes = Math.floor((next - now.getTime()) / 60000);
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function rateLimitedText(seconds: number): string {
  return `⏳ Too many requests. Please try again in ${seconds} seconds.`;
}
