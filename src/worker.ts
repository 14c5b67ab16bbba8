// src/worker.ts
import 'dotenv/config';
import { randomUUID } from 'crypto';

import { loadBotConfig } from './config/botConfig';
import { loadWorkerConfig } from './config/workerConfig';
import { destroyDb, getDb } from './db/knex';
import { createRuntime } from './runtime';
import { BotApiClient } from './services/botApiClient';
import { errorMessage, logError, logInfo } from './utils/logger';
import { runWorkerLoop } from './workers/jobsWorker';

async function main(): Promise<void> {
  const runOnce = process.argv.includes('--once');
  const runId = randomUUID();

  const bot = loadBotConfig();
  const runtime = createRuntime({
    db: getDb(),
    messenger: new BotApiClient({ token: bot.token, baseUrl: bot.apiBaseUrl }),
    bot,
    worker: loadWorkerConfig()
  });

  const abort = new AbortController();
  const stop = (signal: string) => {
    logInfo(`worker:${runId}`, `${signal} received, finishing current job`);
    abort.abort();
  };
  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));

  try {
    const stats = await runWorkerLoop(runtime.workerDeps, {
      runOnce,
      runId,
      signal: abort.signal
    });
    logInfo(`worker:${runId}`, 'Worker finished', { ...stats });
  } finally {
    await destroyDb();
  }
}

main().catch((err: unknown) => {
  logError('worker', 'Fatal worker error', { error: errorMessage(err) });
  process.exit(1);
});
