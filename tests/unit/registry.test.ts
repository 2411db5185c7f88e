import { describe, it, expect, beforeEach } from 'vitest';
import { config } from '../../src/config/index.js';
import { ProjectRegistry, type RegistryChange } from '../../src/registry/registry.js';
import { slugify } from '../../src/registry/schema.js';
import { MemoryStore } from '../../src/store/memory-store.js';
import { ConflictError, NotFoundError, ValidationError } from '../../src/utils/errors.js';
import { projectInput } from '../helpers/fixtures.js';

const NOW = new Date('2026-02-01T10:00:00.000Z');

async function validationIssues(promise: Promise<unknown>): Promise<string[]> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ValidationError) return error.issues;
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('slugify', () => {
  it('derives lowercase hyphenated ids', () => {
    expect(slugify('Karnataka RERA Projects!')).toBe('karnataka-rera-projects');
    expect(slugify('Café Déjà Vu')).toBe('cafe-deja-vu');
  });
});

describe('ProjectRegistry', () => {
  let store: MemoryStore;
  let registry: ProjectRegistry;
  let changes: RegistryChange[];

  beforeEach(() => {
    store = new MemoryStore();
    registry = new ProjectRegistry(store, () => NOW);
    changes = [];
    registry.onChange((change) => changes.push(change));
  });

  describe('create', () => {
    it('derives the id from the name and applies defaults', async () => {
      const project = await registry.create({
        name: 'Karnataka RERA Projects',
        targets: ['https://listings.example.test/'],
        rules: { itemSelector: 'div.card', fields: { name: { selector: 'h5' } } },
      });

      expect(project).toMatchObject({
        id: 'karnataka-rera-projects',
        schedule: null,
        status: 'active',
        maxPages: config.scraper.defaultMaxPages,
        rateLimitMs: config.scraper.rateLimitMs,
        createdAt: NOW,
        updatedAt: NOW,
      });
      expect(project.rules.labelSelector).toBe('label');
      expect(changes).toEqual([{ type: 'upsert', project }]);
    });

    it('rejects a duplicate id', async () => {
      await registry.create(projectInput());
      await expect(registry.create(projectInput())).rejects.toBeInstanceOf(ConflictError);
    });

    it('rejects non-http targets', async () => {
      const issues = await validationIssues(registry.create(projectInput({ targets: ['ftp://files.example.test/'] })));
      expect(issues).toContain('targets.0: Targets must be http or https URLs');
    });

    it('rejects a field rule with both a selector and a label', async () => {
      const input = projectInput();
      const issues = await validationIssues(
        registry.create({
          ...input,
          rules: { itemSelector: 'div.card', fields: { name: { selector: 'h5', label: 'Name' } } },
        })
      );
      expect(issues).toContain('rules.fields.name: A field rule takes either a selector or a label, not both');
    });

    it('rejects an invalid cron expression', async () => {
      const issues = await validationIssues(registry.create(projectInput({ schedule: 'every day' })));
      expect(issues).toContain('schedule: Invalid cron expression');
    });

    it('rejects unknown keys', async () => {
      await expect(registry.create({ ...projectInput(), owner: 'someone' })).rejects.toBeInstanceOf(ValidationError);
    });

    it('asks for an id when none can be derived', async () => {
      const { id: _id, ...input } = projectInput();
      const issues = await validationIssues(registry.create({ ...input, name: '!!!' }));
      expect(issues).toEqual(["id: cannot derive an id from name '!!!', supply one"]);
    });
  });

  describe('update', () => {
    it('applies a partial patch', async () => {
      await registry.create(projectInput());
      const updated = await registry.update('estate-projects', { maxPages: 2, schedule: '0 6 * * *' });

      expect(updated.maxPages).toBe(2);
      expect(updated.schedule).toBe('0 6 * * *');
      expect(updated.name).toBe('Estate projects');
      expect((await registry.get('estate-projects')).maxPages).toBe(2);
    });

    it('clears the schedule with null', async () => {
      await registry.create(projectInput({ schedule: '0 6 * * *' }));
      const updated = await registry.update('estate-projects', { schedule: null });
      expect(updated.schedule).toBeNull();
    });

    it('does not accept an id change', async () => {
      await registry.create(projectInput());
      await expect(registry.update('estate-projects', { id: 'other' })).rejects.toBeInstanceOf(ValidationError);
    });

    it('fails for an unknown project', async () => {
      await expect(registry.update('missing', { maxPages: 2 })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('pause and resume', () => {
    it('only emits when the status changes', async () => {
      await registry.create(projectInput());
      changes.length = 0;

      await registry.pause('estate-projects');
      const again = await registry.pause('estate-projects');

      expect(again.status).toBe('paused');
      expect(changes).toHaveLength(1);

      const resumed = await registry.resume('estate-projects');
      expect(resumed.status).toBe('active');
      expect(changes).toHaveLength(2);
    });
  });

  describe('list', () => {
    it('filters by status', async () => {
      await registry.create(projectInput());
      await registry.create(projectInput({ id: 'other-projects', status: 'paused' }));

      expect((await registry.list()).map((p) => p.id)).toEqual(['estate-projects', 'other-projects']);
      expect((await registry.list({ status: 'paused' })).map((p) => p.id)).toEqual(['other-projects']);
    });
  });

  describe('remove', () => {
    it('deletes the project and emits a removal', async () => {
      await registry.create(projectInput());
      await registry.remove('estate-projects');

      await expect(registry.get('estate-projects')).rejects.toBeInstanceOf(NotFoundError);
      expect(changes.at(-1)).toEqual({ type: 'remove', id: 'estate-projects' });
    });

    it('fails for an unknown project', async () => {
      await expect(registry.remove('missing')).rejects.toThrow("Project 'missing' not found");
    });
  });

  describe('seed', () => {
    it('creates new definitions and skips registered ones', async () => {
      await registry.create(projectInput());

      const result = await registry.seed([projectInput(), projectInput({ id: 'second-projects' })]);

      expect(result).toEqual({ created: ['second-projects'], skipped: ['estate-projects'] });
    });

    it('stops on an invalid definition', async () => {
      await expect(registry.seed([{ name: 'Broken' }])).rejects.toBeInstanceOf(ValidationError);
    });
  });

  it('keeps notifying when a listener throws', async () => {
    registry.onChange(() => {
      throw new Error('listener failed');
    });

    await registry.create(projectInput());
    expect(changes).toHaveLength(1);
  });
});
