import 'dotenv/config';
import { build, context, type BuildOptions } from 'esbuild';
import express from 'express';
import fs from 'fs';
import path from 'path';
import { Worker } from 'worker_threads';

import { loadSettings, Settings } from '../config/settings';
import { OperationCancelledError } from '../core/errors';
import { ModelComparator, isRankCriterion } from '../ranking/comparator';
import { EloSystem } from '../ranking/elo';
import { ModelStore } from '../storage/model_store';
import { BackgroundTask, createSharedCancelFlag, TaskContext } from '../tasks/background_task';
import type { JobProgress, JobResult } from '../tasks/jobs';
import { InvalidRequestError, JobKind, JobRequest, parseJobRequest } from '../tasks/requests';
import type { TaskWorkerData, TaskWorkerMessage } from './protocol';

type BuildContext = Awaited<ReturnType<typeof context>>;
const activeWatchContexts: BuildContext[] = [];

const JOB_KINDS: readonly JobKind[] = ['train', 'tournament', 'automl'];

const tasks: Record<JobKind, BackgroundTask<JobProgress, JobResult>> = {
  train: new BackgroundTask(),
  tournament: new BackgroundTask(),
  automl: new BackgroundTask(),
};

async function bundleWorker(projectRoot: string, watch = false): Promise<string> {
  const outDir = path.resolve(projectRoot, 'dist', 'server');
  await fs.promises.mkdir(outDir, { recursive: true });
  const outfile = path.join(outDir, 'task_worker.js');

  const workerOptions: BuildOptions = {
    entryPoints: [path.resolve(projectRoot, 'src', 'server', 'task_worker.ts')],
    outfile,
    bundle: true,
    sourcemap: true,
    platform: 'node',
    target: ['node20'],
    format: 'cjs',
    logLevel: 'info',
    external: ['worker_threads'],
  };

  if (watch) {
    const workerCtx = await context(workerOptions);
    await workerCtx.watch();
    activeWatchContexts.push(workerCtx);
  } else {
    await build(workerOptions);
  }
  return outfile;
}

function runTaskWorker(
  workerPath: string,
  request: JobRequest,
  task: TaskContext<JobProgress>,
): Promise<JobResult> {
  return new Promise((resolve, reject) => {
    const flag = createSharedCancelFlag();
    const data: TaskWorkerData = { request, cancelBuffer: flag.buffer };
    const worker = new Worker(workerPath, { workerData: data });
    const onAbort = (): void => flag.cancel();
    task.signal.addEventListener('abort', onAbort, { once: true });

    worker.on('message', (message: TaskWorkerMessage) => {
      if (message.type === 'progress') {
        task.publish(message.progress);
      } else if (message.type === 'result') {
        resolve(message.result);
      } else if (message.cancelled) {
        reject(new OperationCancelledError(`${request.kind} job`));
      } else {
        reject(new Error(message.error));
      }
    });
    worker.once('error', (error) => {
      reject(error);
    });
    worker.once('exit', (code) => {
      task.signal.removeEventListener('abort', onAbort);
      reject(
        new Error(
          code === 0
            ? 'Task worker exited without a result'
            : `Task worker exited with code ${code}`,
        ),
      );
    });
  });
}

function createServer(settings: Settings, workerPath: string) {
  const app = express();
  const store = new ModelStore(settings.modelsDir);

  app.use(express.json());

  for (const kind of JOB_KINDS) {
    const task = tasks[kind];

    app.post(`/api/${kind}/start`, (req, res) => {
      let request: JobRequest;
      try {
        request = parseJobRequest(req.body, kind);
      } catch (error) {
        if (error instanceof InvalidRequestError) {
          res.status(400).json({ error: error.message });
          return;
        }
        throw error;
      }
      if (!task.start((ctx) => runTaskWorker(workerPath, request, ctx))) {
        res.status(409).json({ error: `A ${kind} job is already running`, status: task.getSnapshot() });
        return;
      }
      res.json({ status: task.getSnapshot() });
    });

    app.post(`/api/${kind}/stop`, (_req, res) => {
      task.cancel();
      res.json({ status: task.getSnapshot() });
    });

    app.get(`/api/${kind}/status`, (_req, res) => {
      res.json(task.getSnapshot());
    });
  }

  app.get('/api/models', (_req, res) => {
    const models = store.list().map((model) => ({
      ...model,
      metadata: { ...model.metadata, episode_rewards: undefined },
    }));
    res.json({ models });
  });

  app.get('/api/leaderboard', (req, res) => {
    const top = Number(req.query.top ?? 10);
    const elo = new EloSystem({
      filePath: settings.eloPath,
      kFactor: settings.eloKFactor,
      initialRating: settings.eloInitialRating,
    });
    res.json({ leaderboard: elo.getLeaderboard(Number.isInteger(top) && top > 0 ? top : 10), stats: elo.getStats() });
  });

  app.get('/api/rankings', (req, res) => {
    const criterion = typeof req.query.criterion === 'string' ? req.query.criterion : 'compositeScore';
    if (!isRankCriterion(criterion)) {
      res.status(400).json({ error: `Unknown ranking criterion: ${criterion}` });
      return;
    }
    const comparator = new ModelComparator(store);
    const { unavailable } = comparator.computeMetricsForAll();
    const ranked = comparator.rankModels(criterion).map(({ model, metrics }) => ({
      name: model.name,
      id: model.id,
      timestamp: model.timestamp,
      metrics,
    }));
    res.json({
      criterion,
      models: ranked,
      unavailable: unavailable.map(({ model, reason }) => ({ name: model.name, reason })),
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  return app;
}

async function main(): Promise<void> {
  const projectRoot = path.resolve(__dirname, '..', '..');
  const settings = loadSettings();
  const watch = process.argv.includes('--watch');

  const workerPath = await bundleWorker(projectRoot, watch);
  const app = createServer(settings, workerPath);
  app.listen(settings.port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Q-table arena server running at http://localhost:${settings.port} ` +
        `(models=${settings.modelsDir}, watch=${watch})`,
    );
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
