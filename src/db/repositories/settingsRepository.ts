// src/db/repositories/settingsRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import { supportsRowLocks } from '../locking';
import { Clock, systemClock, toDbTimestamp } from '../../utils/dateUtils';

interface SettingRow {
  key: string;
  value: string | null;
  updated_at: Date | string | number;
}

/**
 * Small key/value table for process-wide markers.
 */
export class SettingsRepository {
  private readonly rowLocks: boolean;

  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {
    this.rowLocks = supportsRowLocks(db);
  }

  /**
   * Read a value. With `lock` inside a transaction, the row stays locked
   * until that transaction ends.
   */
  async get(
    key: string,
    options: { trx?: Knex.Transaction; lock?: boolean } = {}
  ): Promise<string | null> {
    const conn = options.trx ?? this.db;
    const query = conn<SettingRow>(TABLES.settings).where('key', key).first();

    if (options.lock && options.trx && this.rowLocks) {
      query.forUpdate();
    }

    const row = await query;
    return row?.value ?? null;
  }

  /**
   * Create the row with a null value unless it exists. Run inside the
   * transaction before a locking `get` so there is always a row to lock.
   */
  async ensureKey(key: string, trx?: Knex.Transaction): Promise<void> {
    const conn = trx ?? this.db;

    await conn<SettingRow>(TABLES.settings)
      .insert({ key, value: null, updated_at: toDbTimestamp(this.clock()) })
      .onConflict('key')
      .ignore();
  }

  async set(key: string, value: string, trx?: Knex.Transaction): Promise<void> {
    const conn = trx ?? this.db;

    await conn<SettingRow>(TABLES.settings)
      .insert({ key, value, updated_at: toDbTimestamp(this.clock()) })
      .onConflict('key')
      .merge();
  }
}
