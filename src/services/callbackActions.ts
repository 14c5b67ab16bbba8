// src/services/callbackActions.ts

/**
 * Inline-button payloads, decoded once at the dispatch boundary.
 */
export type CallbackAction =
  | { kind: 'my_account' }
  | { kind: 'check_live'; page: number }
  | { kind: 'back' }
  | { kind: 'help' }
  | { kind: 'referrals' }
  | { kind: 'settings' }
  | { kind: 'buy' }
  | { kind: 'pay'; packageId: string }
  | { kind: 'set_language'; language: string; initial: boolean }
  | { kind: 'language_menu' }
  | { kind: 'toggle_notifications' }
  | { kind: 'clear_notifications' }
  | { kind: 'unknown'; data: string };

const SIMPLE_ACTIONS = {
  my_account: { kind: 'my_account' },
  back: { kind: 'back' },
  help: { kind: 'help' },
  referrals: { kind: 'referrals' },
  settings: { kind: 'settings' },
  buy: { kind: 'buy' },
  toggle_notifications: { kind: 'toggle_notifications' },
  clear_notifications: { kind: 'clear_notifications' }
} as const satisfies Record<string, CallbackAction>;

function isSimpleAction(data: string): data is keyof typeof SIMPLE_ACTIONS {
  return Object.prototype.hasOwnProperty.call(SIMPLE_ACTIONS, data);
}

export function parseCallbackData(data: string | undefined): CallbackAction {
  const raw = (data ?? '').trim();

  if (isSimpleAction(raw)) return SIMPLE_ACTIONS[raw];

  if (raw === 'check_live') return { kind: 'check_live', page: 1 };

  const sep = raw.indexOf(':');
  if (sep === -1) return { kind: 'unknown', data: raw };

  const prefix = raw.slice(0, sep);
  const value = raw.slice(sep + 1);

  switch (prefix) {
    case 'check_live': {
      const page = Number(value);
      return {
        kind: 'check_live',
        page: Number.isInteger(page) && page > 0 ? page : 1
      };
    }
    case 'pay':
      return value ? { kind: 'pay', packageId: value } : { kind: 'unknown', data: raw };
    case 'setlang':
      return value
        ? { kind: 'set_language', language: value, initial: true }
        : { kind: 'unknown', data: raw };
    case 'lang':
      if (value === 'select') return { kind: 'language_menu' };
      return value
        ? { kind: 'set_language', language: value, initial: false }
        : { kind: 'unknown', data: raw };
    default:
      return { kind: 'unknown', data: raw };
  }
}

export type BotCommand =
  | { name: 'start'; referrerId: number | null }
  | { name: 'init' }
  | { name: 'activate' }
  | { name: 'broadcast'; text: string };

/**
 * Commands are matched by prefix. `/start 123` or `/start ref_123`
 * carries a referrer id.
 */
export function parseCommand(text: string | undefined): BotCommand | null {
  const trimmed = (text ?? '').trim();

  if (trimmed.startsWith('/start')) {
    const arg = trimmed.split(/\s+/)[1] ?? '';
    const digits = arg.startsWith('ref_') ? arg.slice(4) : arg;
    const referrerId = /^\d+$/.test(digits) ? Number(digits) : null;
    return { name: 'start', referrerId };
  }
  if (trimmed.startsWith('/init')) return { name: 'init' };
  if (trimmed.startsWith('/activate')) return { name: 'activate' };
  if (trimmed.startsWith('/broadcast')) {
    return { name: 'broadcast', text: trimmed.slice('/broadcast'.length).trim() };
  }

  return null;
}
