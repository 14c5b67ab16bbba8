// src/db/repositories/usersRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import { BroadcastTarget } from '../../schemas/jobPayloads';
import {
  Clock,
  DAY_MS,
  fromDbTimestamp,
  systemClock,
  toDbTimestamp,
  utcDay
} from '../../utils/dateUtils';

interface BotUserRow {
  id: number | string;
  first_name: string | null;
  username: string | null;
  language: string;
  points: number | string;
  points_reset_on: string | null;
  notifications_enabled: boolean | number;
  referred_by: number | string | null;
  last_seen_at: Date | string | number | null;
  created_at: Date | string | number;
  updated_at: Date | string | number;
}

export interface BotUser {
  id: number;
  firstName: string | null;
  username: string | null;
  language: string;
  points: number;
  pointsResetOn: string | null;
  notificationsEnabled: boolean;
  referredBy: number | null;
  lastSeenAt: Date | null;
  createdAt: Date;
}

export interface RegisterUserInput {
  id: number;
  firstName?: string | null;
  username?: string | null;
  language: string;
  referredBy?: number | null;
  startingPoints: number;
}

/** Users who have not opened the bot for this long count as inactive. */
export const INACTIVE_AFTER_DAYS = 7;

function mapRow(row: BotUserRow): BotUser {
  return {
    id: Number(row.id),
    firstName: row.first_name,
    username: row.username,
    language: row.language,
    points: Number(row.points),
    pointsResetOn: row.points_reset_on,
    notificationsEnabled: Boolean(row.notifications_enabled),
    referredBy: row.referred_by === null ? null : Number(row.referred_by),
    lastSeenAt: row.last_seen_at === null ? null : fromDbTimestamp(row.last_seen_at),
    createdAt: fromDbTimestamp(row.created_at)
  };
}

export class UsersRepository {
  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {}

  async get(id: number): Promise<BotUser | null> {
    const row = await this.db<BotUserRow>(TABLES.users).where('id', id).first();
    return row ? mapRow(row) : null;
  }

  /**
   * Insert a new user, or refresh name and last-seen of a known one.
   * `created` is true only for the call that inserted the row, so a
   * referral is credited once.
   */
  async register(
    input: RegisterUserInput
  ): Promise<{ user: BotUser; created: boolean }> {
    const now = this.clock();
    const ts = toDbTimestamp(now);

    const inserted = await this.db<BotUserRow>(TABLES.users)
      .insert({
        id: input.id,
        first_name: input.firstName ?? null,
        username: input.username ?? null,
        language: input.language,
        points: input.startingPoints,
        points_reset_on: utcDay(now),
        notifications_enabled: true,
        referred_by: input.referredBy ?? null,
        last_seen_at: ts,
        created_at: ts,
        updated_at: ts
      })
      .onConflict('id')
      .ignore()
      .returning('id');

    const created = inserted.length > 0;

    if (!created) {
      await this.db(TABLES.users)
        .where('id', input.id)
        .update({
          first_name: input.firstName ?? null,
          username: input.username ?? null,
          last_seen_at: ts,
          updated_at: ts
        });
    }

    const user = await this.get(input.id);
    if (!user) throw new Error(`User ${input.id} vanished after register`);
    return { user, created };
  }

  /** Adds points; returns the new balance, or null for an unknown user. */
  async addPoints(id: number, points: number): Promise<number | null> {
    const updated = await this.db(TABLES.users)
      .where('id', id)
      .update({
        points: this.db.raw('points + ?', [points]),
        updated_at: toDbTimestamp(this.clock())
      });

    if (!updated) return null;
    const user = await this.get(id);
    return user ? user.points : null;
  }

  /**
   * Refill to the daily allowance on the first call of a new UTC day.
   * Returns true when the refill happened.
   */
  async resetDailyPoints(id: number, dailyPoints: number): Promise<boolean> {
    const today = utcDay(this.clock());

    const updated = await this.db(TABLES.users)
      .where('id', id)
      .andWhere((qb) => {
        qb.whereNull('points_reset_on').orWhere('points_reset_on', '<>', today);
      })
      .update({
        points: dailyPoints,
        points_reset_on: today,
        updated_at: toDbTimestamp(this.clock())
      });

    return updated > 0;
  }

  /** Spend one point; false when the balance is already zero. */
  async spendPoint(id: number): Promise<boolean> {
    const updated = await this.db(TABLES.users)
      .where('id', id)
      .andWhere('points', '>', 0)
      .update({
        points: this.db.raw('points - 1'),
        updated_at: toDbTimestamp(this.clock())
      });

    return updated > 0;
  }

  async setLanguage(id: number, language: string): Promise<boolean> {
    const updated = await this.db(TABLES.users)
      .where('id', id)
      .update({ language, updated_at: toDbTimestamp(this.clock()) });
    return updated > 0;
  }

  /** Flip the notification switch; returns the new value. */
  async toggleNotifications(id: number): Promise<boolean | null> {
    return this.db.transaction(async (trx) => {
      const row = await trx<BotUserRow>(TABLES.users).where('id', id).first();
      if (!row) return null;

      const enabled = !row.notifications_enabled;
      await trx(TABLES.users)
        .where('id', id)
        .update({
          notifications_enabled: enabled,
          updated_at: toDbTimestamp(this.clock())
        });
      return enabled;
    });
  }

  async countReferrals(id: number): Promise<number> {
    const rows: Array<{ count: number | string }> = await this.db(TABLES.users)
      .where('referred_by', id)
      .count({ count: '*' });
    return Number(rows[0]?.count ?? 0);
  }

  /**
   * Ids of the users a broadcast goes to.
   * - all: everyone
   * - premium / free: with / without a completed payment after `premiumCutoff`
   * - inactive: not seen for INACTIVE_AFTER_DAYS
   * - lang:<code>: users with that language
   */
  async listBroadcastRecipients(
    target: BroadcastTarget,
    premiumCutoff: Date
  ): Promise<number[]> {
    const query = this.db(TABLES.users).select('id').orderBy('id', 'asc');

    if (target === 'premium') {
      query.whereIn('id', this.premiumUserIds(premiumCutoff));
    } else if (target === 'free') {
      query.whereNotIn('id', this.premiumUserIds(premiumCutoff));
    } else if (target === 'inactive') {
      const inactiveSince = toDbTimestamp(
        new Date(this.clock().getTime() - INACTIVE_AFTER_DAYS * DAY_MS)
      );
      query.where((qb) => {
        qb.whereNull('last_seen_at').orWhere('last_seen_at', '<', inactiveSince);
      });
    } else if (target.startsWith('lang:')) {
      query.where('language', target.slice('lang:'.length));
    }

    const rows: Array<{ id: number | string }> = await query;
    return rows.map((row) => Number(row.id));
  }

  /** Premium users who keep live alerts switched on. */
  async listLiveAlertRecipients(premiumCutoff: Date): Promise<number[]> {
    const rows: Array<{ id: number | string }> = await this.db(TABLES.users)
      .select('id')
      .where('notifications_enabled', true)
      .whereIn('id', this.premiumUserIds(premiumCutoff))
      .orderBy('id', 'asc');

    return rows.map((row) => Number(row.id));
  }

  private premiumUserIds(cutoff: Date): Knex.QueryBuilder {
    return this.db(TABLES.payments)
      .distinct('user_id')
      .where('status', 'completed')
      .andWhere('completed_at', '>', toDbTimestamp(cutoff));
  }
}
