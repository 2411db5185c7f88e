/**
 * Fetch Scheduler
 *
 * Runs project pipelines on their cron schedules and on demand. A project
 * never runs twice at once, and at most `maxConcurrentRuns` runs execute
 * across all projects.
 */

import crypto from 'crypto';
import cron, { type ScheduledTask } from 'node-cron';
import { config } from './config/index.js';
import { runProject, type PipelineOptions } from './pipeline.js';
import { ConflictError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { Semaphore } from './utils/semaphore.js';
import type { ProjectRegistry, RegistryChange } from './registry/registry.js';
import type { Fetcher } from './scraper/types.js';
import type { ScrapeStore } from './store/types.js';
import type { Project, RunResult, RunTrigger } from './types/index.js';

export interface SchedulerDeps {
  registry: ProjectRegistry;
  store: ScrapeStore;
  fetcher: Fetcher;
}

export interface SchedulerOptions {
  maxConcurrentRuns?: number;
  timezone?: string;
  /** Passed to every pipeline run */
  pipeline?: Pick<PipelineOptions, 'retry'>;
}

export interface TriggerOptions {
  trigger?: RunTrigger;
  maxPages?: number;
}

export interface TriggeredRun {
  runId: string;
  done: Promise<RunResult>;
}

interface ScheduledEntry {
  expression: string;
  task: ScheduledTask;
}

export class FetchScheduler {
  private readonly tasks = new Map<string, ScheduledEntry>();
  private readonly running = new Map<string, TriggeredRun>();
  private readonly limiters = new Map<string, RateLimiter>();
  private readonly slots: Semaphore;
  private readonly timezone: string;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions = {}
  ) {
    this.slots = new Semaphore(options.maxConcurrentRuns ?? config.scraper.maxConcurrentRuns);
    this.timezone = options.timezone ?? config.scheduler.timezone;
  }

  /**
   * Schedule every active project that has a schedule, and follow registry changes
   */
  async start(): Promise<void> {
    const projects = await this.deps.registry.list({ status: 'active' });
    for (const project of projects) {
      this.refresh(project);
    }

    this.unsubscribe ??= this.deps.registry.onChange((change) => this.handleChange(change));

    logger.info(
      { scheduled: this.scheduledIds(), timezone: this.timezone },
      'Scheduler started'
    );
  }

  /**
   * Stop every cron task. Runs in flight finish on their own.
   */
  stop(): void {
    for (const [projectId, entry] of this.tasks) {
      entry.task.stop();
      logger.debug({ projectId }, 'Schedule stopped');
    }
    this.tasks.clear();

    this.unsubscribe?.();
    this.unsubscribe = null;

    logger.info('Scheduler stopped');
  }

  /**
   * Bring a project's cron task in line with its definition
   */
  refresh(project: Project): void {
    const current = this.tasks.get(project.id);
    const wanted = project.status === 'active' ? project.schedule : null;

    // Definition changes may alter the rate limit
    const limiter = this.limiters.get(project.id);
    if (limiter && limiter.intervalMs !== project.rateLimitMs) {
      this.limiters.delete(project.id);
    }

    if (current && current.expression === wanted) {
      return;
    }

    if (current) {
      this.unschedule(project.id);
    }

    if (!wanted) {
      return;
    }

    if (!cron.validate(wanted)) {
      logger.error({ projectId: project.id, schedule: wanted }, 'Invalid cron expression, not scheduling');
      return;
    }

    const task = cron.schedule(
      wanted,
      () => {
        this.runScheduled(project.id).catch((error: unknown) => {
          logger.error({ error, projectId: project.id }, 'Scheduled run failed');
        });
      },
      { timezone: this.timezone }
    );

    this.tasks.set(project.id, { expression: wanted, task });
    logger.info({ projectId: project.id, schedule: wanted }, 'Project scheduled');
  }

  unschedule(projectId: string): void {
    const entry = this.tasks.get(projectId);
    if (entry) {
      entry.task.stop();
      this.tasks.delete(projectId);
      logger.info({ projectId }, 'Project unscheduled');
    }
  }

  scheduledIds(): string[] {
    return [...this.tasks.keys()].sort();
  }

  scheduleOf(projectId: string): string | null {
    return this.tasks.get(projectId)?.expression ?? null;
  }

  isRunning(projectId: string): boolean {
    return this.running.has(projectId);
  }

  runningIds(): string[] {
    return [...this.running.keys()].sort();
  }

  /**
   * Start a run now. Rejects with ConflictError when the project is paused or
   * already running; the run itself reports failures in its result.
   */
  async trigger(projectId: string, options: TriggerOptions = {}): Promise<TriggeredRun> {
    const project = await this.deps.registry.get(projectId);

    if (project.status === 'paused') {
      throw new ConflictError(`Project '${projectId}' is paused`);
    }

    // Checked after the await above, then claimed synchronously
    if (this.running.has(projectId)) {
      throw new ConflictError(`Project '${projectId}' is already running`);
    }

    const runId = crypto.randomUUID();
    const done = this.execute(project, runId, options);
    const triggered: TriggeredRun = { runId, done };
    this.running.set(projectId, triggered);

    return triggered;
  }

  private async execute(project: Project, runId: string, options: TriggerOptions): Promise<RunResult> {
    try {
      if (this.slots.running >= (this.options.maxConcurrentRuns ?? config.scraper.maxConcurrentRuns)) {
        logger.info({ projectId: project.id, queued: this.slots.pending + 1 }, 'Run queued');
      }

      return await this.slots.execute(() =>
        runProject(
          project,
          {
            store: this.deps.store,
            fetcher: this.deps.fetcher,
            rateLimiter: this.limiterFor(project),
          },
          {
            ...this.options.pipeline,
            runId,
            trigger: options.trigger ?? 'manual',
            maxPages: options.maxPages,
          }
        )
      );
    } finally {
      this.running.delete(project.id);
    }
  }

  private async runScheduled(projectId: string): Promise<void> {
    if (this.running.has(projectId)) {
      logger.warn({ projectId }, 'Project already running, skipping this execution');
      return;
    }

    const startTime = new Date();
    logger.info({ projectId, startTime: startTime.toISOString() }, 'Scheduled run starting');

    let triggered: TriggeredRun;
    try {
      triggered = await this.trigger(projectId, { trigger: 'schedule' });
    } catch (error) {
      // Another trigger won the run lock while the project was loading
      if (error instanceof ConflictError) {
        logger.warn({ projectId, reason: error.message }, 'Scheduled run skipped');
        return;
      }
      throw error;
    }
    const result = await triggered.done;

    logger.info(
      {
        projectId,
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        status: result.status,
        recordsNew: result.recordsNew,
      },
      'Scheduled run completed'
    );
  }

  private limiterFor(project: Project): RateLimiter {
    let limiter = this.limiters.get(project.id);
    if (!limiter) {
      limiter = new RateLimiter(project.rateLimitMs);
      this.limiters.set(project.id, limiter);
    }
    return limiter;
  }

  private handleChange(change: RegistryChange): void {
    if (change.type === 'remove') {
      this.unschedule(change.id);
      this.limiters.delete(change.id);
      return;
    }
    this.refresh(change.project);
  }
}
