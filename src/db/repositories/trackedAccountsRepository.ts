// src/db/repositories/trackedAccountsRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import { fromDbTimestamp } from '../../utils/dateUtils';

interface TrackedAccountRow {
  username: string;
  link: string;
  is_live: boolean | number;
  total_lives: number | string;
  last_live_at: Date | string | number | null;
}

export interface TrackedAccount {
  username: string;
  link: string;
  isLive: boolean;
  totalLives: number;
  lastLiveAt: Date | null;
}

/**
 * Source of the number the auto-broadcast trigger compares to its threshold.
 */
export interface LiveMetricSource {
  countLive(): Promise<number>;
}

function mapRow(row: TrackedAccountRow): TrackedAccount {
  return {
    username: row.username,
    link: row.link,
    isLive: Boolean(row.is_live),
    totalLives: Number(row.total_lives),
    lastLiveAt: row.last_live_at === null ? null : fromDbTimestamp(row.last_live_at)
  };
}

export class TrackedAccountsRepository implements LiveMetricSource {
  constructor(private readonly db: Knex) {}

  async countLive(): Promise<number> {
    const rows: Array<{ count: number | string }> = await this.db(
      TABLES.trackedAccounts
    )
      .where('is_live', true)
      .count({ count: '*' });
    return Number(rows[0]?.count ?? 0);
  }

  /** Live accounts, most recently live first. */
  async listLive(limit: number, offset = 0): Promise<TrackedAccount[]> {
    const rows: TrackedAccountRow[] = await this.db<TrackedAccountRow>(
      TABLES.trackedAccounts
    )
      .select('*')
      .where('is_live', true)
      .orderBy('last_live_at', 'desc')
      .orderBy('username', 'asc')
      .limit(limit)
      .offset(offset);

    return rows.map(mapRow);
  }
}
