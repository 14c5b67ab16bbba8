// src/db/schema.ts
import { Knex } from 'knex';

export const TABLES = {
  jobs: 'jobs',
  settings: 'system_settings',
  liveNotifications: 'live_notification_messages',
  users: 'bot_users',
  trackedAccounts: 'tracked_accounts',
  payments: 'star_payments'
} as const;

type TableDefinition = (table: Knex.CreateTableBuilder) => void;

const DEFINITIONS: Array<[string, TableDefinition]> = [
  [
    TABLES.jobs,
    (table) => {
      table.increments('job_id');
      table.string('job_type', 64).notNullable();
      table.text('payload');
      table.string('status', 16).notNullable().defaultTo('pending');
      table.integer('retries').notNullable().defaultTo(0);
      table.timestamp('created_at', { useTz: true }).notNullable();
      table.timestamp('updated_at', { useTz: true }).notNullable();
      table.index(['status', 'created_at'], 'idx_jobs_status_created_at');
      table.index(['job_type', 'status'], 'idx_jobs_type_status');
    }
  ],
  [
    TABLES.settings,
    (table) => {
      table.string('key', 128).primary();
      table.text('value');
      table.timestamp('updated_at', { useTz: true }).notNullable();
    }
  ],
  [
    TABLES.liveNotifications,
    (table) => {
      table.string('entity_key', 128).notNullable();
      table.string('target_id', 64).notNullable();
      table.bigInteger('message_id').notNullable();
      table.timestamp('created_at', { useTz: true }).notNullable();
      table.primary(['entity_key', 'target_id']);
      table.index(['created_at'], 'idx_live_notif_created_at');
    }
  ],
  [
    TABLES.users,
    (table) => {
      table.bigInteger('id').primary();
      table.string('first_name', 255);
      table.string('username', 255);
      table.string('language', 8).notNullable().defaultTo('en');
      table.integer('points').notNullable().defaultTo(0);
      table.string('points_reset_on', 10);
      table.boolean('notifications_enabled').notNullable().defaultTo(true);
      table.bigInteger('referred_by');
      table.timestamp('last_seen_at', { useTz: true });
      table.timestamp('created_at', { useTz: true }).notNullable();
      table.timestamp('updated_at', { useTz: true }).notNullable();
    }
  ],
  [
    TABLES.trackedAccounts,
    (table) => {
      table.string('username', 128).primary();
      table.string('link', 512).notNullable();
      table.boolean('is_live').notNullable().defaultTo(false);
      table.integer('total_lives').notNullable().defaultTo(0);
      table.timestamp('last_live_at', { useTz: true });
    }
  ],
  [
    TABLES.payments,
    (table) => {
      table.increments('id');
      table.bigInteger('user_id').notNullable();
      table.string('charge_id', 255).notNullable().unique();
      table.integer('amount').notNullable();
      table.string('package_id', 50).notNullable();
      table.string('status', 20).notNullable().defaultTo('completed');
      table.timestamp('created_at', { useTz: true }).notNullable();
      table.timestamp('completed_at', { useTz: true });
      table.index(['user_id'], 'idx_star_payments_user_id');
    }
  ]
];

/**
 * Create any missing table. Existing tables are left as they are.
 * Returns the names of the tables that were created.
 */
export async function ensureSchema(db: Knex): Promise<string[]> {
  const created: string[] = [];

  for (const [name, define] of DEFINITIONS) {
    if (await db.schema.hasTable(name)) continue;
    await db.schema.createTable(name, define);
    created.push(name);
  }

  return created;
}
