import { describe, it, expect } from 'vitest';
import { parseCallbackData, parseCommand } from '../../src/services/callbackActions';

describe('parseCallbackData', () => {
  it('maps plain actions', () => {
    expect(parseCallbackData('my_account')).toEqual({ kind: 'my_account' });
    expect(parseCallbackData('clear_notifications')).toEqual({ kind: 'clear_notifications' });
    expect(parseCallbackData(' back ')).toEqual({ kind: 'back' });
  });

  it('reads the live list page, defaulting to the first', () => {
    expect(parseCallbackData('check_live')).toEqual({ kind: 'check_live', page: 1 });
    expect(parseCallbackData('check_live:3')).toEqual({ kind: 'check_live', page: 3 });
    expect(parseCallbackData('check_live:0')).toEqual({ kind: 'check_live', page: 1 });
    expect(parseCallbackData('check_live:abc')).toEqual({ kind: 'check_live', page: 1 });
  });

  it('separates onboarding and settings language choices', () => {
    expect(parseCallbackData('setlang:de')).toEqual({
      kind: 'set_language',
      language: 'de',
      initial: true
    });
    expect(parseCallbackData('lang:fr')).toEqual({
      kind: 'set_language',
      language: 'fr',
      initial: false
    });
    expect(parseCallbackData('lang:select')).toEqual({ kind: 'language_menu' });
  });

  it('reads the package of a pay action', () => {
    expect(parseCallbackData('pay:premium_30')).toEqual({ kind: 'pay', packageId: 'premium_30' });
  });

  it('returns unknown for anything else', () => {
    expect(parseCallbackData('pay:')).toEqual({ kind: 'unknown', data: 'pay:' });
    expect(parseCallbackData('nope')).toEqual({ kind: 'unknown', data: 'nope' });
    expect(parseCallbackData('other:1')).toEqual({ kind: 'unknown', data: 'other:1' });
    expect(parseCallbackData(undefined)).toEqual({ kind: 'unknown', data: '' });
  });
});

describe('parseCommand', () => {
  it('reads a referrer from /start in both forms', () => {
    expect(parseCommand('/start')).toEqual({ name: 'start', referrerId: null });
    expect(parseCommand('/start 12345')).toEqual({ name: 'start', referrerId: 12345 });
    expect(parseCommand('/start ref_678')).toEqual({ name: 'start', referrerId: 678 });
    expect(parseCommand('/start ref_x')).toEqual({ name: 'start', referrerId: null });
  });

  it('keeps the broadcast text', () => {
    expect(parseCommand('/broadcast  Hello everyone ')).toEqual({
      name: 'broadcast',
      text: 'Hello everyone'
    });
    expect(parseCommand('/broadcast')).toEqual({ name: 'broadcast', text: '' });
  });

  it('recognises reserved commands and ignores plain text', () => {
    expect(parseCommand('/init')).toEqual({ name: 'init' });
    expect(parseCommand('/activate')).toEqual({ name: 'activate' });
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand(undefined)).toBeNull();
  });
});
