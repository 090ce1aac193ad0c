import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { WinstonLogger, type ILogger } from './infra/logger.js';
import { EnvConfig, readIntSetting } from './infra/config.js';
import { DEFAULT_MAX_FINISHED_RUNS, InMemoryRunStore } from './storage/in-memory-storage.js';
import type { IRunRecord, IRunStore } from './storage/index.js';
import { RunManager } from './orchestrator/run-manager.js';
import { createEngineFactory } from './index.js';

export interface ApiDependencies {
  manager: RunManager;
  store: IRunStore;
  logger: ILogger;
}

const startRunSchema = z.object({
  goal: z.string().trim().min(1, 'goal is required'),
  targetApp: z.string().trim().min(1).optional(),
  targetState: z.string().trim().min(1).optional(),
  successCriteria: z.array(z.string().trim().min(1)).optional(),
});

const feedbackSchema = z.object({
  text: z.string().trim().min(1, 'text is required'),
});

type AsyncRoute = (req: Request, res: Response) => Promise<unknown>;

const route =
  (handler: AsyncRoute) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

function summarize(record: IRunRecord) {
  return {
    runId: record.runId,
    goal: record.goal,
    goalKey: record.goalKey,
    status: record.status,
    createdAt: record.createdAt,
    completedAt: record.completedAt,
    currentStep: record.currentStep,
    totalSteps: record.totalSteps,
  };
}

function hasStatus(error: unknown): error is { status: number; message?: string } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApp({ manager, store, logger }: ApiDependencies): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.info(`Incoming ${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.post(
    '/api/runs',
    route(async (req, res) => {
      const parsed = startRunSchema.safeParse(req.body);
      if (!parsed.success) {
        logger.warn('Run request rejected', { issues: parsed.error.issues });
        return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      }

      const runId = await manager.start(parsed.data);
      logger.info('Run accepted', { runId, goal: parsed.data.goal });
      return res.status(202).json({
        runId,
        status: 'running',
        message: 'Run started. Use POST /api/runs/:runId/signals after each step.',
      });
    })
  );

  app.get(
    '/api/runs',
    route(async (_req, res) => {
      const runs = await store.listRuns();
      return res.json({ runs: runs.map(summarize), total: runs.length });
    })
  );

  app.get(
    '/api/runs/:runId',
    route(async (req, res) => {
      const record = await store.getRun(req.params.runId);
      if (!record) {
        return res.status(404).json({ error: 'Run not found', runId: req.params.runId });
      }
      return res.json({ ...record, active: manager.isActive(record.runId) });
    })
  );

  app.delete(
    '/api/runs/:runId',
    route(async (req, res) => {
      const { runId } = req.params;
      if (manager.isActive(runId)) {
        return res.status(409).json({ error: 'Run is still active', runId });
      }
      if (!(await store.deleteRun(runId))) {
        return res.status(404).json({ error: 'Run not found', runId });
      }
      logger.info('Run deleted', { runId });
      return res.json({ runId, deleted: true });
    })
  );

  app.get(
    '/api/goals/:goalKey/runs',
    route(async (req, res) => {
      const { goalKey } = req.params;
      const runs = await store.getRunsByGoalKey(goalKey);
      return res.json({ goalKey, runs: runs.map(summarize), total: runs.length });
    })
  );

  /**
   * Routes one input to an active run, or explains why it cannot.
   */
  const deliver = async (req: Request, res: Response, send: (runId: string) => boolean, action: string) => {
    const { runId } = req.params;
    if (send(runId)) {
      logger.info(`Run ${action}`, { runId });
      return res.json({ runId, accepted: true });
    }
    const record = await store.getRun(runId);
    if (!record) {
      return res.status(404).json({ error: 'Run not found', runId });
    }
    return res.status(409).json({ error: 'Run is not active', runId, status: record.status });
  };

  app.post(
    '/api/runs/:runId/signals',
    route((req, res) => deliver(req, res, (runId) => manager.signal(runId), 'signalled'))
  );

  app.post(
    '/api/runs/:runId/feedback',
    route(async (req, res) => {
      const parsed = feedbackSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      }
      return deliver(req, res, (runId) => manager.feedback(runId, parsed.data.text), 'received feedback');
    })
  );

  app.post(
    '/api/runs/:runId/cancel',
    route((req, res) => deliver(req, res, (runId) => manager.cancel(runId), 'cancel requested'))
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      return res.status(error.status).json({ error: 'Bad request', message: error.message ?? 'Invalid request' });
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Request failed', error);
    return res.status(500).json({ error: 'Internal server error', message });
  });

  return app;
}

export function startServer(): void {
  const config = new EnvConfig();
  const logger = new WinstonLogger();
  const store = new InMemoryRunStore(Date.now, readIntSetting(config, 'RUN_HISTORY_LIMIT', DEFAULT_MAX_FINISHED_RUNS, 1));
  const manager = new RunManager(createEngineFactory({ config, logger }), store, logger);
  const port = readIntSetting(config, 'PORT', 3001, 1);

  createApp({ manager, store, logger }).listen(port, () => {
    logger.info(`Server listening on port ${port}`);
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer();
}
