// src/scripts/migrate.ts
import 'dotenv/config';
import { destroyDb, getDb } from '../db/knex';
import { ensureSchema } from '../db/schema';
import { createContextId, errorMessage, logError, logInfo } from '../utils/logger';

async function main(): Promise<void> {
  const ctx = createContextId('migrate');
  try {
    const created = await ensureSchema(getDb());
    logInfo(ctx, created.length ? 'Tables created' : 'Schema already up to date', { created });
  } catch (err) {
    logError(ctx, 'Migration failed', { error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    await destroyDb();
  }
}

void main();
