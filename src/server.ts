// src/server.ts
import 'dotenv/config';
import { createServer } from 'http';

import { createApp } from './app';
import { loadBotConfig } from './config/botConfig';
import { envBool, envInt } from './config/env';
import { loadWorkerConfig } from './config/workerConfig';
import { destroyDb, getDb } from './db/knex';
import { createRuntime } from './runtime';
import { BotApiClient } from './services/botApiClient';
import { errorMessage, logError, logInfo } from './utils/logger';
import { runWorkerLoop, WorkerStats } from './workers/jobsWorker';

const PORT = envInt(process.env, 'PORT', 4000);

const db = getDb();
const bot = loadBotConfig();
const runtime = createRuntime({
  db,
  messenger: new BotApiClient({ token: bot.token, baseUrl: bot.apiBaseUrl }),
  bot,
  worker: loadWorkerConfig()
});

const app = createApp({
  db,
  jobs: runtime.jobs,
  adminSecret: process.env.ADMIN_API_SECRET || null,
  webhookSecret: bot.webhookSecret
});

// ============================================================================
// SERVER STARTUP & GRACEFUL SHUTDOWN
// ============================================================================

const httpServer = createServer(app);
const workerAbort = new AbortController();
let workerLoop: Promise<WorkerStats | null> | null = null;

httpServer.listen(PORT, () => {
  logInfo('server', `API listening on port ${PORT}`);

  if (envBool(process.env, 'RUN_WORKER_IN_SERVER', true)) {
    workerLoop = runWorkerLoop(runtime.workerDeps, { signal: workerAbort.signal }).catch(
      (err: unknown) => {
        logError('worker', 'Fatal worker error', { error: errorMessage(err) });
        return null;
      }
    );
  }
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logInfo('server', `${signal} received. Shutting down...`);

  // 1. Stop HTTP
  await new Promise<void>((resolve) => {
    httpServer.close((err) => {
      if (err) logError('server', 'HTTP server close error', { error: errorMessage(err) });
      resolve();
    });
  });

  // 2. Stop worker after its current job
  workerAbort.abort();
  if (workerLoop) await workerLoop;

  // 3. Close DB
  try {
    await destroyDb();
    logInfo('server', 'Database connection closed.');
    process.exit(0);
  } catch (err) {
    logError('server', 'Error during shutdown', { error: errorMessage(err) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
