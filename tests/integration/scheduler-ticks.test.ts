/**
 * Scheduler: what a cron tick does, with node-cron replaced by hand-fired tasks
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProjectRegistry } from '../../src/registry/registry.js';
import { FetchScheduler } from '../../src/scheduler.js';
import { MemoryStore } from '../../src/store/memory-store.js';
import { logger } from '../../src/utils/logger.js';
import { FakeFetcher, item } from '../helpers/fake-fetcher.js';
import { projectInput, TARGET } from '../helpers/fixtures.js';

interface CronStub {
  expression: string;
  fire: () => void;
  stop: () => void;
}

const cronTasks = vi.hoisted(() => {
  const tasks: CronStub[] = [];
  return tasks;
});

vi.mock('node-cron', () => ({
  default: {
    validate: () => true,
    schedule: (expression: string, fire: () => void) => {
      const task: CronStub = { expression, fire, stop: vi.fn() };
      cronTasks.push(task);
      return task;
    },
  },
}));

const SCHEDULE = '*/5 * * * *';

describe('FetchScheduler cron ticks', () => {
  let store: MemoryStore;
  let fetcher: FakeFetcher;
  let scheduler: FetchScheduler;

  const tick = (): void => {
    const task = cronTasks.find((entry) => entry.expression === SCHEDULE);
    if (!task) throw new Error('project was not scheduled');
    task.fire();
  };

  beforeEach(async () => {
    cronTasks.length = 0;
    store = new MemoryStore();
    const registry = new ProjectRegistry(store);
    fetcher = new FakeFetcher({ listings: { [TARGET]: [[item(0, { name: 'Green Acres', rera: 'PRM/1' })]] } });
    scheduler = new FetchScheduler(
      { registry, store, fetcher },
      { maxConcurrentRuns: 2, timezone: 'UTC', pipeline: { retry: { maxAttempts: 1, initialDelayMs: 1 } } }
    );

    await registry.create(projectInput({ schedule: SCHEDULE }));
    await scheduler.start();
  });

  afterEach(() => {
    scheduler.stop();
    vi.restoreAllMocks();
  });

  it('runs the project on each tick', async () => {
    tick();

    await vi.waitFor(async () => {
      const [run] = await store.listRuns('estate-projects');
      expect(run).toMatchObject({ trigger: 'schedule', status: 'succeeded', recordsNew: 1 });
    });
  });

  it('skips a tick while the project is running', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const release = fetcher.hold();
    const first = await scheduler.trigger('estate-projects');

    tick();

    expect(warn).toHaveBeenCalledWith({ projectId: 'estate-projects' }, 'Project already running, skipping this execution');
    release();
    await first.done;
    expect(fetcher.sessionsOpened).toBe(1);
    expect(await store.listRuns('estate-projects')).toHaveLength(1);
  });

  it('skips a tick that loses the run lock to a trigger in flight', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const error = vi.spyOn(logger, 'error');
    const release = fetcher.hold();

    // Both are still loading the project when the tick checks the lock
    const manual = scheduler.trigger('estate-projects');
    tick();
    const { done } = await manual;

    await vi.waitFor(() =>
      expect(warn).toHaveBeenCalledWith(
        { projectId: 'estate-projects', reason: "Project 'estate-projects' is already running" },
        'Scheduled run skipped'
      )
    );
    release();
    await done;

    expect(error).not.toHaveBeenCalled();
    expect(fetcher.sessionsOpened).toBe(1);
    expect((await store.listRuns('estate-projects')).map((run) => run.trigger)).toEqual(['manual']);
  });
});
