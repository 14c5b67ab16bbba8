import { Knex } from 'knex';

const ROW_LOCK_DIALECTS = new Set([
  'pg',
  'postgres',
  'postgresql',
  'pgnative',
  'cockroachdb',
  'mysql',
  'mysql2'
]);

/**
 * Whether the connected dialect understands FOR UPDATE ... SKIP LOCKED.
 * SQLite has no row locks; its single-connection pool serializes
 * transactions instead.
 */
export function supportsRowLocks(db: Knex): boolean {
  const client = db.client.config.client;
  return typeof client === 'string' && ROW_LOCK_DIALECTS.has(client);
}
