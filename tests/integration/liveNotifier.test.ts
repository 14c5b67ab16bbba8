import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LiveNotifier } from '../../src/services/liveNotifier';
import { LiveNotificationsRepository } from '../../src/db/repositories/liveNotificationsRepository';
import { BotApiError } from '../../src/services/botApiClient';
import { HOUR_MS } from '../../src/utils/dateUtils';
import { createTestDb, manualClock, ManualClock, TestDbHarness } from '../helpers/testDb';
import { FakeMessenger } from '../helpers/fakeMessenger';

describe('LiveNotifier', () => {
  let harness: TestDbHarness;
  let time: ManualClock;
  let messenger: FakeMessenger;
  let store: LiveNotificationsRepository;
  let notifier: LiveNotifier;

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    harness = await createTestDb();
    time = manualClock();
    messenger = new FakeMessenger();
    store = new LiveNotificationsRepository(harness.db);
    notifier = new LiveNotifier(messenger, store, { clock: time.clock, sendIntervalMs: 0 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await harness.cleanup();
  });

  it('sends to every target and records each alert', async () => {
    const result = await notifier.notify('test', 'acct1', [1, 2], 'live!');

    expect(result).toEqual({ sent: 2, failed: 0, retracted: 0 });
    expect((await store.find('acct1', '1'))?.messageId).toBe(1001);
    expect((await store.find('acct1', '2'))?.messageId).toBe(1002);
  });

  it('deletes the previous alert before sending the next and keeps one record', async () => {
    await notifier.notify('test', 'acct1', [1, 2], 'live!');
    time.advance(HOUR_MS);

    const result = await notifier.notify('test', 'acct1', [1, 2], 'live again!');

    expect(result).toEqual({ sent: 2, failed: 0, retracted: 2 });
    expect(messenger.calls.slice(2).map((c) => [c.method, 'chatId' in c ? c.chatId : null])).toEqual([
      ['deleteMessage', 1],
      ['sendMessage', 1],
      ['deleteMessage', 2],
      ['sendMessage', 2]
    ]);
    expect(messenger.callsTo('deleteMessage').map((c) => c.messageId)).toEqual([1001, 1002]);
    expect(await store.countFor('acct1', '1')).toBe(1);
    expect((await store.find('acct1', '1'))?.messageId).toBe(1003);
  });

  it('keeps alerts for different entities apart', async () => {
    await notifier.notify('test', 'acct1', [1], 'a');
    await notifier.notify('test', 'acct2', [1], 'b');

    expect(messenger.callsTo('deleteMessage')).toHaveLength(0);
    expect(await store.countFor('acct1', '1')).toBe(1);
    expect(await store.countFor('acct2', '1')).toBe(1);
  });

  it('skips deleting alerts past the deletion window but replaces the record', async () => {
    await notifier.notify('test', 'acct1', [1], 'live!');
    time.advance(49 * HOUR_MS);

    const result = await notifier.notify('test', 'acct1', [1], 'live again!');

    expect(result).toEqual({ sent: 1, failed: 0, retracted: 0 });
    expect(messenger.callsTo('deleteMessage')).toHaveLength(0);
    const record = await store.find('acct1', '1');
    expect(record?.messageId).toBe(1002);
    expect(record?.createdAt.toISOString()).toBe('2024-05-03T13:00:00.000Z');
  });

  it('still sends when deleting the previous alert fails', async () => {
    await notifier.notify('test', 'acct1', [1], 'live!');
    messenger.failNext('deleteMessage', new BotApiError('deleteMessage', 400, 'not found', 'not found'));

    const result = await notifier.notify('test', 'acct1', [1], 'live again!');

    expect(result).toEqual({ sent: 1, failed: 0, retracted: 0 });
    expect((await store.find('acct1', '1'))?.messageId).toBe(1002);
  });

  it('counts a failed send without stopping the other targets', async () => {
    messenger.failNext('sendMessage', new BotApiError('sendMessage', 403, 'blocked', 'blocked'));

    const result = await notifier.notify('test', 'acct1', [1, 2], 'live!');

    expect(result).toEqual({ sent: 1, failed: 1, retracted: 0 });
    expect(await store.find('acct1', '1')).toBeNull();
    expect((await store.find('acct1', '2'))?.messageId).toBe(1002);
  });
});
