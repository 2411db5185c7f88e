/**
 * Scheduler: run locking, concurrency and cron bookkeeping
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProjectRegistry } from '../../src/registry/registry.js';
import { FetchScheduler } from '../../src/scheduler.js';
import { MemoryStore } from '../../src/store/memory-store.js';
import { ConflictError } from '../../src/utils/errors.js';
import { FakeFetcher, item } from '../helpers/fake-fetcher.js';
import { projectInput, TARGET } from '../helpers/fixtures.js';

const OTHER_TARGET = 'https://other.example.test/projects';

describe('FetchScheduler', () => {
  let store: MemoryStore;
  let registry: ProjectRegistry;
  let fetcher: FakeFetcher;
  let scheduler: FetchScheduler;

  beforeEach(async () => {
    store = new MemoryStore();
    registry = new ProjectRegistry(store);
    fetcher = new FakeFetcher({
      listings: {
        [TARGET]: [[item(0, { name: 'Green Acres', rera: 'PRM/1' })]],
        [OTHER_TARGET]: [[item(0, { name: 'Blue Lagoon', rera: 'PRM/2' })]],
      },
    });
    scheduler = new FetchScheduler(
      { registry, store, fetcher },
      { maxConcurrentRuns: 1, timezone: 'UTC', pipeline: { retry: { maxAttempts: 1, initialDelayMs: 1 } } }
    );
    await registry.create(projectInput());
  });

  afterEach(() => {
    scheduler.stop();
  });

  describe('trigger', () => {
    it('runs the project and reports the result', async () => {
      const { runId, done } = await scheduler.trigger('estate-projects');
      const result = await done;

      expect(result).toMatchObject({ runId, success: true, recordsNew: 1 });
      expect(scheduler.isRunning('estate-projects')).toBe(false);
      expect((await store.getRun(runId))?.trigger).toBe('manual');
    });

    it('refuses a second run of a running project', async () => {
      const release = fetcher.hold();
      const first = await scheduler.trigger('estate-projects');

      expect(scheduler.isRunning('estate-projects')).toBe(true);
      await expect(scheduler.trigger('estate-projects')).rejects.toThrow(
        "Project 'estate-projects' is already running"
      );

      release();
      await first.done;
      const again = await scheduler.trigger('estate-projects');
      await expect(again.done).resolves.toMatchObject({ success: true, recordsDuplicate: 1 });
    });

    it('refuses a paused project', async () => {
      await registry.pause('estate-projects');
      await expect(scheduler.trigger('estate-projects')).rejects.toBeInstanceOf(ConflictError);
    });

    it('passes the page limit through', async () => {
      const { done } = await scheduler.trigger('estate-projects', { maxPages: 1 });
      await done;
      expect(fetcher.calls.next).toEqual([]);
    });

    it('queues runs beyond the concurrency limit', async () => {
      await registry.create(projectInput({ id: 'other-projects', targets: [OTHER_TARGET] }));
      const release = fetcher.hold();

      const first = await scheduler.trigger('estate-projects');
      const second = await scheduler.trigger('other-projects');

      await vi.waitFor(() => expect(fetcher.sessionsOpened).toBe(1));
      expect(scheduler.runningIds()).toEqual(['estate-projects', 'other-projects']);

      release();
      const results = await Promise.all([first.done, second.done]);

      expect(results.map((r) => r.projectId)).toEqual(['estate-projects', 'other-projects']);
      expect(fetcher.sessionsOpened).toBe(2);
      expect(scheduler.runningIds()).toEqual([]);
    });
  });

  describe('schedules', () => {
    it('schedules active projects that have a cron expression', async () => {
      await registry.update('estate-projects', { schedule: '0 6 * * *' });
      await registry.create(projectInput({ id: 'paused-projects', schedule: '0 7 * * *', status: 'paused' }));
      await registry.create(projectInput({ id: 'manual-projects' }));

      await scheduler.start();

      expect(scheduler.scheduledIds()).toEqual(['estate-projects']);
      expect(scheduler.scheduleOf('estate-projects')).toBe('0 6 * * *');
    });

    it('follows registry changes once started', async () => {
      await scheduler.start();

      await registry.update('estate-projects', { schedule: '*/30 * * * *' });
      expect(scheduler.scheduleOf('estate-projects')).toBe('*/30 * * * *');

      await registry.update('estate-projects', { schedule: '0 6 * * 1' });
      expect(scheduler.scheduleOf('estate-projects')).toBe('0 6 * * 1');

      await registry.pause('estate-projects');
      expect(scheduler.scheduledIds()).toEqual([]);

      await registry.resume('estate-projects');
      expect(scheduler.scheduledIds()).toEqual(['estate-projects']);

      await registry.remove('estate-projects');
      expect(scheduler.scheduledIds()).toEqual([]);
    });

    it('stops following changes after stop', async () => {
      await scheduler.start();
      scheduler.stop();

      await registry.update('estate-projects', { schedule: '0 6 * * *' });
      expect(scheduler.scheduledIds()).toEqual([]);
    });
  });
});
