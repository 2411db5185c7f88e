/**
 * Project Registry
 *
 * Validates and stores scrape project definitions, and tells listeners
 * (the scheduler) about every change.
 */

import { config } from '../config/index.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ScrapeStore } from '../store/types.js';
import type { Project, ProjectStatus } from '../types/index.js';
import {
  parseOrThrow,
  projectInputSchema,
  projectPatchSchema,
  slugify,
  PROJECT_ID_PATTERN,
} from './schema.js';

export type RegistryChange =
  | { type: 'upsert'; project: Project }
  | { type: 'remove'; id: string };

export type RegistryListener = (change: RegistryChange) => void;

export interface SeedResult {
  created: string[];
  skipped: string[];
}

export class ProjectRegistry {
  private readonly listeners = new Set<RegistryListener>();

  constructor(
    private readonly store: ScrapeStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Subscribe to changes; returns the unsubscribe function
   */
  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async create(input: unknown): Promise<Project> {
    const parsed = parseOrThrow(projectInputSchema, input, 'project');
    const id = parsed.id ?? slugify(parsed.name);

    if (!PROJECT_ID_PATTERN.test(id)) {
      throw new ValidationError('Invalid project', [
        `id: cannot derive an id from name '${parsed.name}', supply one`,
      ]);
    }

    const now = this.clock();
    const project: Project = {
      id,
      name: parsed.name,
      targets: parsed.targets,
      rules: parsed.rules,
      schedule: parsed.schedule ?? null,
      status: parsed.status ?? 'active',
      maxPages: parsed.maxPages ?? config.scraper.defaultMaxPages,
      rateLimitMs: parsed.rateLimitMs ?? config.scraper.rateLimitMs,
      createdAt: now,
      updatedAt: now,
    };

    // The store raises ConflictError for a duplicate id
    await this.store.insertProject(project);
    logger.info({ projectId: id, targets: project.targets.length }, 'Project created');

    this.emit({ type: 'upsert', project });
    return project;
  }

  async get(id: string): Promise<Project> {
    const project = await this.store.getProject(id);
    if (!project) {
      throw new NotFoundError(`Project '${id}' not found`);
    }
    return project;
  }

  async list(filter: { status?: ProjectStatus } = {}): Promise<Project[]> {
    return this.store.listProjects(filter);
  }

  async update(id: string, patch: unknown): Promise<Project> {
    const current = await this.get(id);
    const parsed = parseOrThrow(projectPatchSchema, patch, 'project update');

    const updated: Project = {
      ...current,
      name: parsed.name ?? current.name,
      targets: parsed.targets ?? current.targets,
      rules: parsed.rules ?? current.rules,
      schedule: parsed.schedule === undefined ? current.schedule : parsed.schedule,
      status: parsed.status ?? current.status,
      maxPages: parsed.maxPages ?? current.maxPages,
      rateLimitMs: parsed.rateLimitMs ?? current.rateLimitMs,
      updatedAt: this.clock(),
    };

    await this.store.updateProject(updated);
    logger.info({ projectId: id, changed: Object.keys(parsed) }, 'Project updated');

    this.emit({ type: 'upsert', project: updated });
    return updated;
  }

  async pause(id: string): Promise<Project> {
    return this.setStatus(id, 'paused');
  }

  async resume(id: string): Promise<Project> {
    return this.setStatus(id, 'active');
  }

  async remove(id: string): Promise<void> {
    const deleted = await this.store.deleteProject(id);
    if (!deleted) {
      throw new NotFoundError(`Project '${id}' not found`);
    }
    logger.info({ projectId: id }, 'Project removed');
    this.emit({ type: 'remove', id });
  }

  /**
   * Create every definition whose id is not registered yet
   */
  async seed(definitions: unknown[]): Promise<SeedResult> {
    const result: SeedResult = { created: [], skipped: [] };

    for (const definition of definitions) {
      try {
        const project = await this.create(definition);
        result.created.push(project.id);
      } catch (error) {
        if (error instanceof ConflictError) {
          const parsed = projectInputSchema.safeParse(definition);
          result.skipped.push(parsed.success ? parsed.data.id ?? slugify(parsed.data.name) : '?');
          continue;
        }
        throw error;
      }
    }

    logger.info(result, 'Project seed applied');
    return result;
  }

  private async setStatus(id: string, status: ProjectStatus): Promise<Project> {
    const current = await this.get(id);
    if (current.status === status) {
      return current;
    }

    const updated: Project = { ...current, status, updatedAt: this.clock() };
    await this.store.updateProject(updated);
    logger.info({ projectId: id, status }, 'Project status changed');

    this.emit({ type: 'upsert', project: updated });
    return updated;
  }

  private emit(change: RegistryChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        logger.error({ error, change: change.type }, 'Registry listener failed');
      }
    }
  }
}
