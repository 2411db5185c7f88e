/**
 * HTTP API
 *
 * Project management, run triggers and record queries over JSON
 */

import express from 'express';
import { config } from '../config/index.js';
import { exportRecords, parseExportFormat, summarizeRecords } from '../report/index.js';
import { AppError, ConflictError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { clampLimit, clampOffset } from '../store/types.js';
import type { FetchScheduler } from '../scheduler.js';
import type { ProjectRegistry } from '../registry/registry.js';
import type { ScrapeStore } from '../store/types.js';
import type { ProjectStatus } from '../types/index.js';

export interface AppDeps {
  registry: ProjectRegistry;
  scheduler: FetchScheduler;
  store: ScrapeStore;
}

const DEFAULT_RUN_LIMIT = 20;
const FIELD_FILTER_PREFIX = 'field.';

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

const asyncHandler =
  (handler: AsyncHandler): express.RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const projectIdParam = (req: express.Request): string => {
  const id = req.params.id;
  if (!id) {
    throw new ValidationError('Missing project id');
  }
  return id;
};

const parseNumber = (value: unknown): number | undefined => {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parsePageLimit = (value: unknown, name: string): number | undefined => {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Invalid ${name}`, [`${name}: Expected a positive integer`]);
  }
  return parsed;
};

const parseStatus = (value: unknown): ProjectStatus | undefined => {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  if (raw !== 'active' && raw !== 'paused') {
    throw new ValidationError('Invalid status', ["status: Expected 'active' or 'paused'"]);
  }
  return raw;
};

const fieldFilters = (query: express.Request['query']): Record<string, string> => {
  const where: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    const text = queryString(value);
    if (key.startsWith(FIELD_FILTER_PREFIX) && key.length > FIELD_FILTER_PREFIX.length && text) {
      where[key.slice(FIELD_FILTER_PREFIX.length)] = text;
    }
  }
  return where;
};

const errorHandler: express.ErrorRequestHandler = (error: unknown, req, res, _next) => {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error({ error, method: req.method, path: req.path }, 'Request failed');
    }
    res.status(error.statusCode).json({
      error: error.message,
      ...(error instanceof ValidationError && error.issues.length > 0 ? { details: error.issues } : {}),
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (error instanceof SyntaxError) {
    res.status(400).json({ error: 'Invalid JSON body' });
    return;
  }

  logger.error({ error, method: req.method, path: req.path }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal server error' });
};

export const createApp = ({ registry, scheduler, store }: AppDeps): express.Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.status(200).send('OK');
  });

  app.get(
    '/api/projects',
    asyncHandler(async (req, res) => {
      const projects = await registry.list({ status: parseStatus(req.query.status) });
      res.json({ count: projects.length, projects });
    })
  );

  app.post(
    '/api/projects',
    asyncHandler(async (req, res) => {
      const project = await registry.create(req.body);
      res.status(201).json(project);
    })
  );

  app.get(
    '/api/projects/:id',
    asyncHandler(async (req, res) => {
      const project = await registry.get(projectIdParam(req));
      const [lastRun] = await store.listRuns(project.id, 1);
      res.json({
        ...project,
        running: scheduler.isRunning(project.id),
        lastRun: lastRun ?? null,
      });
    })
  );

  app.patch(
    '/api/projects/:id',
    asyncHandler(async (req, res) => {
      res.json(await registry.update(projectIdParam(req), req.body));
    })
  );

  app.delete(
    '/api/projects/:id',
    asyncHandler(async (req, res) => {
      const id = projectIdParam(req);
      // A run in flight would keep writing under the removed id
      if (scheduler.isRunning(id)) {
        throw new ConflictError(`Project '${id}' is running, remove it once the run finishes`);
      }
      await registry.remove(id);
      res.status(204).end();
    })
  );

  app.post(
    '/api/projects/:id/pause',
    asyncHandler(async (req, res) => {
      res.json(await registry.pause(projectIdParam(req)));
    })
  );

  app.post(
    '/api/projects/:id/resume',
    asyncHandler(async (req, res) => {
      res.json(await registry.resume(projectIdParam(req)));
    })
  );

  app.post(
    '/api/projects/:id/runs',
    asyncHandler(async (req, res) => {
      const maxPages =
        parsePageLimit(req.query.maxPages, 'maxPages') ?? parsePageLimit(req.query.max_proj, 'max_proj');
      const { runId, done } = await scheduler.trigger(projectIdParam(req), { trigger: 'manual', maxPages });

      if (req.query.async === 'true') {
        done.catch((error: unknown) => {
          logger.error({ error, runId }, 'Background run failed');
        });
        res.status(202).json({ runId });
        return;
      }

      res.json(await done);
    })
  );

  app.get(
    '/api/projects/:id/runs',
    asyncHandler(async (req, res) => {
      const project = await registry.get(projectIdParam(req));
      const runs = await store.listRuns(project.id, clampLimit(parseNumber(req.query.limit), DEFAULT_RUN_LIMIT));
      res.json({ count: runs.length, runs });
    })
  );

  app.get(
    '/api/projects/:id/records',
    asyncHandler(async (req, res) => {
      const project = await registry.get(projectIdParam(req));
      const page = await store.listRecords(project.id, {
        q: queryString(req.query.q),
        where: fieldFilters(req.query),
        limit: clampLimit(parseNumber(req.query.limit), config.api.defaultRecordLimit),
        offset: clampOffset(parseNumber(req.query.offset)),
      });
      res.json({ total: page.total, count: page.records.length, records: page.records });
    })
  );

  app.get(
    '/api/projects/:id/summary',
    asyncHandler(async (req, res) => {
      const project = await registry.get(projectIdParam(req));
      const records = await store.allRecords(project.id);
      res.json({ projectId: project.id, ...summarizeRecords(records, project.rules.summary) });
    })
  );

  app.get(
    '/api/projects/:id/export',
    asyncHandler(async (req, res) => {
      const format = parseExportFormat(req.query.format);
      const project = await registry.get(projectIdParam(req));
      const file = exportRecords(project, await store.allRecords(project.id), format);

      res.setHeader('Content-Type', file.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${file.filename}"`);
      res.status(200).send(file.body);
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
};
