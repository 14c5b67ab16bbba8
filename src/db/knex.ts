// src/db/knex.ts
import knex, { Knex } from 'knex';
import { Env, envInt } from '../config/env';

export function databaseConfigFromEnv(env: Env = process.env): Knex.Config {
  const connection = env.DATABASE_URL;
  if (!connection) throw new Error('DATABASE_URL is not configured');

  return {
    client: 'pg',
    connection,
    pool: { min: 0, max: envInt(env, 'DB_POOL_MAX', 5) }
  };
}

let instance: Knex | null = null;

/**
 * Process-wide knex instance for the entry points. Library code takes
 * a Knex handle as a parameter instead of reaching for this.
 */
export function getDb(): Knex {
  if (!instance) {
    instance = knex(databaseConfigFromEnv());
  }
  return instance;
}

export async function destroyDb(): Promise<void> {
  if (!instance) return;
  const current = instance;
  instance = null;
  await current.destroy();
}
