import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UsersRepository } from '../../src/db/repositories/usersRepository';
import { DAY_MS } from '../../src/utils/dateUtils';
import { createTestDb, manualClock, ManualClock, TestDbHarness } from '../helpers/testDb';

describe('UsersRepository', () => {
  let harness: TestDbHarness;
  let time: ManualClock;
  let users: UsersRepository;

  beforeEach(async () => {
    harness = await createTestDb();
    time = manualClock('2024-05-01T12:00:00.000Z');
    users = new UsersRepository(harness.db, time.clock);
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  it('reports creation only for the first registration', async () => {
    const first = await users.register({ id: 1, firstName: 'Ada', language: 'en', startingPoints: 3 });
    time.advance(60_000);
    const second = await users.register({ id: 1, firstName: 'Ada L.', language: 'fr', startingPoints: 3 });

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.user).toMatchObject({
      firstName: 'Ada L.',
      language: 'en',
      points: 3,
      pointsResetOn: '2024-05-01',
      notificationsEnabled: true
    });
    expect(second.user.lastSeenAt?.toISOString()).toBe('2024-05-01T12:01:00.000Z');
  });

  it('spends points down to zero and refills once per UTC day', async () => {
    await users.register({ id: 1, language: 'en', startingPoints: 2 });

    expect(await users.spendPoint(1)).toBe(true);
    expect(await users.spendPoint(1)).toBe(true);
    expect(await users.spendPoint(1)).toBe(false);
    expect(await users.resetDailyPoints(1, 3)).toBe(false);

    time.advance(DAY_MS);
    expect(await users.resetDailyPoints(1, 3)).toBe(true);
    expect(await users.resetDailyPoints(1, 3)).toBe(false);
    expect((await users.get(1))?.points).toBe(3);
  });

  it('adds points only to known users', async () => {
    await users.register({ id: 1, language: 'en', startingPoints: 3 });

    expect(await users.addPoints(1, 5)).toBe(8);
    expect(await users.addPoints(2, 5)).toBeNull();
  });

  it('toggles notifications and reports unknown users', async () => {
    await users.register({ id: 1, language: 'en', startingPoints: 3 });

    expect(await users.toggleNotifications(1)).toBe(false);
    expect(await users.toggleNotifications(1)).toBe(true);
    expect(await users.toggleNotifications(2)).toBeNull();
  });
});
