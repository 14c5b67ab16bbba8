// src/app.ts
import express, { Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { Knex } from 'knex';

import { JobsRepository } from './db/repositories/jobsRepository';
import { verifySharedSecret, WEBHOOK_SECRET_HEADER } from './middleware/internalSecret';
import {
  EnqueueJobSchema,
  findPayloadProblem,
  JobIdParamSchema,
  JobListQuerySchema,
  UpdateBodySchema
} from './schemas/adminApi';
import { errorMessage, logError, logInfo } from './utils/logger';

export interface AppDeps {
  db: Knex;
  jobs: JobsRepository;
  adminSecret?: string | null;
  webhookSecret?: string | null;
  /** Request log format for morgan; null turns request logging off. */
  requestLog?: string | null;
}

export function createApp(deps: AppDeps): Express {
  const { db, jobs } = deps;
  const requireAdmin = verifySharedSecret(deps.adminSecret);
  const requireWebhookSecret = verifySharedSecret(deps.webhookSecret, WEBHOOK_SECRET_HEADER);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (deps.requestLog !== null) {
    app.use(morgan(deps.requestLog ?? 'combined'));
  }

  // ==========================================================================
  // HEALTH
  // ==========================================================================

  app.get('/health', async (_req, res) => {
    try {
      await db.raw('SELECT 1');
      const counts = await jobs.countByStatus();
      res.json({ status: 'ok', jobs: counts });
    } catch (err) {
      logError('api', 'Health check failed', { error: errorMessage(err) });
      res.status(503).json({ status: 'error', db: 'disconnected' });
    }
  });

  // ==========================================================================
  // JOBS
  // ==========================================================================

  app.get('/jobs', async (req, res) => {
    const parsed = JobListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues });
    }

    try {
      const { status, type, limit, offset } = parsed.data;
      const rows = await jobs.list({ status, type, limit, offset });
      return res.json({ data: rows, pagination: { limit, offset } });
    } catch (err) {
      logError('api', 'GET /jobs error', { error: errorMessage(err) });
      return res.status(500).json({ error: 'Internal Server Error' });
    }
  });

  app.get('/jobs/:id', async (req, res) => {
    const id = JobIdParamSchema.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: 'Invalid job id' });

    try {
      const job = await jobs.get(id.data);
      if (!job) return res.status(404).json({ error: 'Job not found' });
      return res.json(job);
    } catch (err) {
      logError('api', 'GET /jobs/:id error', { error: errorMessage(err) });
      return res.status(500).json({ error: 'Internal Server Error' });
    }
  });

  app.post('/jobs', requireAdmin, async (req, res) => {
    const parsed = EnqueueJobSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid job', issues: parsed.error.issues });
    }

    const { job_type, payload } = parsed.data;
    const problem = findPayloadProblem(job_type, payload);
    if (problem) return res.status(400).json({ error: `Invalid payload: ${problem}` });

    try {
      const jobId = await jobs.enqueue(job_type, payload);
      logInfo('api', 'Job enqueued', { jobId, type: job_type });
      return res.status(201).json({ ok: true, job_id: jobId });
    } catch (err) {
      logError('api', 'POST /jobs error', { error: errorMessage(err) });
      return res.status(500).json({ error: 'Internal Server Error' });
    }
  });

  app.post('/jobs/:id/retry', requireAdmin, async (req, res) => {
    const id = JobIdParamSchema.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: 'Invalid job id' });

    try {
      if (await jobs.requeueFailed(id.data)) {
        logInfo('api', 'Failed job requeued', { jobId: id.data });
        return res.json({ ok: true, job_id: id.data });
      }

      const job = await jobs.get(id.data);
      if (!job) return res.status(404).json({ error: 'Job not found' });
      return res.status(409).json({ error: `Job is ${job.status}, only failed jobs can be retried` });
    } catch (err) {
      logError('api', 'POST /jobs/:id/retry error', { error: errorMessage(err) });
      return res.status(500).json({ error: 'Internal Server Error' });
    }
  });

  // ==========================================================================
  // BOT WEBHOOK
  // ==========================================================================

  app.post('/updates', requireWebhookSecret, async (req, res) => {
    const parsed = UpdateBodySchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: 'Invalid update' });

    try {
      const jobId = await jobs.enqueue('process_update', parsed.data);
      return res.json({ ok: true, job_id: jobId });
    } catch (err) {
      logError('api', 'POST /updates error', {
        updateId: parsed.data.update_id,
        error: errorMessage(err)
      });
      return res.status(500).json({ error: 'Internal Server Error' });
    }
  });

  return app;
}
