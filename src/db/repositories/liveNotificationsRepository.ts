// src/db/repositories/liveNotificationsRepository.ts
import { Knex } from 'knex';
import { TABLES } from '../schema';
import { fromDbTimestamp, toDbTimestamp } from '../../utils/dateUtils';

interface LiveNotificationRow {
  entity_key: string;
  target_id: string;
  message_id: number | string;
  created_at: Date | string | number;
}

export interface LiveNotificationRecord {
  entityKey: string;
  targetId: string;
  messageId: number;
  createdAt: Date;
}

/**
 * At most one record per (entity, target): the alert currently visible
 * to that target.
 */
export interface LiveNotificationStore {
  find(entityKey: string, targetId: string): Promise<LiveNotificationRecord | null>;
  remove(entityKey: string, targetId: string): Promise<void>;
  save(record: LiveNotificationRecord): Promise<void>;
}

function mapRow(row: LiveNotificationRow): LiveNotificationRecord {
  return {
    entityKey: row.entity_key,
    targetId: row.target_id,
    messageId: Number(row.message_id),
    createdAt: fromDbTimestamp(row.created_at)
  };
}

export class LiveNotificationsRepository implements LiveNotificationStore {
  constructor(private readonly db: Knex) {}

  async find(
    entityKey: string,
    targetId: string
  ): Promise<LiveNotificationRecord | null> {
    const row = await this.db<LiveNotificationRow>(TABLES.liveNotifications)
      .where({ entity_key: entityKey, target_id: targetId })
      .first();
    return row ? mapRow(row) : null;
  }

  async remove(entityKey: string, targetId: string): Promise<void> {
    await this.db(TABLES.liveNotifications)
      .where({ entity_key: entityKey, target_id: targetId })
      .delete();
  }

  async save(record: LiveNotificationRecord): Promise<void> {
    await this.db<LiveNotificationRow>(TABLES.liveNotifications)
      .insert({
        entity_key: record.entityKey,
        target_id: record.targetId,
        message_id: record.messageId,
        created_at: toDbTimestamp(record.createdAt)
      })
      .onConflict(['entity_key', 'target_id'])
      .merge();
  }

  async countFor(entityKey: string, targetId: string): Promise<number> {
    const rows: Array<{ count: number | string }> = await this.db(
      TABLES.liveNotifications
    )
      .where({ entity_key: entityKey, target_id: targetId })
      .count({ count: '*' });
    return Number(rows[0]?.count ?? 0);
  }

  /** Drop records whose message is past the deletion window. */
  async pruneOlderThan(cutoff: Date): Promise<number> {
    const deleted = await this.db(TABLES.liveNotifications)
      .where('created_at', '<', toDbTimestamp(cutoff))
      .delete();
    return deleted;
  }
}
