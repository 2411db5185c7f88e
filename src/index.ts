/**
 * Scrapper
 *
 * Config-driven scraping service:
 * 1. Loads scrape projects (targets and extraction rules)
 * 2. Renders listing and detail pages with a headless browser
 * 3. Cleans fields into deduplicated records
 * 4. Serves projects, runs and records over HTTP, on cron schedules
 *
 * Usage:
 *   node dist/src/index.js --service                       - Run the API and scheduler (default)
 *   node dist/src/index.js --run <projectId> [--max-pages=N] - Run one project once and exit
 *   node dist/src/index.js --export <projectId> --format=csv [--out=file] - Export records to a file
 */

import fs from 'fs';
import type { Server } from 'http';
import { config } from './config/index.js';
import { runProject } from './pipeline.js';
import { loadProjectDefinitions, ProjectRegistry } from './registry/index.js';
import { exportRecords } from './report/index.js';
import { FetchScheduler } from './scheduler.js';
import { BrowserFetcher } from './scraper/index.js';
import { checkStore, parseArgs } from './cli.js';
import { startServer, stopServer } from './server/index.js';
import { createStore, type ScrapeStore } from './store/index.js';
import { logger } from './utils/logger.js';

async function openRegistry(store: ScrapeStore): Promise<ProjectRegistry> {
  await store.init();
  const registry = new ProjectRegistry(store);

  const definitions = loadProjectDefinitions(config.projects.seedFile);
  if (definitions.length > 0) {
    const seeded = await registry.seed(definitions);
    logger.info({ file: config.projects.seedFile, ...seeded }, 'Project definitions loaded');
  }

  const stats = await store.getStats();
  logger.info(
    {
      store: store.kind,
      projects: stats.totalProjects,
      active: stats.activeProjects,
      records: stats.totalRecords,
      lastRun: stats.lastRunAt?.toISOString() ?? 'never',
    },
    'Store ready'
  );

  return registry;
}

async function runOnce(store: ScrapeStore, projectId: string, maxPages?: number): Promise<boolean> {
  const registry = await openRegistry(store);
  const project = await registry.get(projectId);
  const fetcher = new BrowserFetcher();

  try {
    const result = await runProject(project, { store, fetcher }, { trigger: 'cli', maxPages });

    logger.info('');
    logger.info(`Run ${result.success ? 'Complete' : 'Failed'}: ${result.message}`);
    logger.info(`  ✓ Pages:      ${result.pagesProcessed}`);
    logger.info(`  ✓ Records:    ${result.recordsFound} (${result.recordsNew} new)`);
    logger.info(`  ✓ Duplicates: ${result.recordsDuplicate}`);
    if (result.itemsSkipped > 0) {
      logger.info(`  ⚠ Skipped:    ${result.itemsSkipped}`);
    }
    if (result.errors > 0) {
      logger.info(`  ⚠ Errors:     ${result.errors}`);
    }
    logger.info(`  ⏱ Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);

    return result.success;
  } finally {
    await fetcher.shutdown();
  }
}

async function exportOnce(store: ScrapeStore, projectId: string, format: string, out?: string): Promise<void> {
  const registry = await openRegistry(store);
  const project = await registry.get(projectId);
  const file = exportRecords(project, await store.allRecords(project.id), format);

  const target = out ?? file.filename;
  fs.writeFileSync(target, file.body);
  logger.info({ projectId, file: target }, 'Records exported');
}

async function serve(store: ScrapeStore): Promise<void> {
  const registry = await openRegistry(store);
  const fetcher = new BrowserFetcher();
  const scheduler = new FetchScheduler({ registry, store, fetcher });

  await scheduler.start();
  const server: Server = await startServer({ registry, scheduler, store });

  // Graceful shutdown handler
  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');

    scheduler.stop();
    try {
      await stopServer(server);
      await fetcher.shutdown();
      await store.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

async function main(): Promise<void> {
  const mode = parseArgs(process.argv.slice(2));

  logger.info('');
  logger.info('╔═══════════════════════════════════════════════════╗');
  logger.info('║       Scrapper                                    ║');
  logger.info('╚═══════════════════════════════════════════════════╝');
  logger.info('');
  logger.info({ env: config.app.env, mode: mode.kind }, 'Starting application');

  const store = createStore();
  const warning = checkStore(mode, store.kind);
  if (warning) {
    logger.warn({ store: store.kind }, warning);
  }

  if (mode.kind === 'service') {
    await serve(store);
    return;
  }

  let ok = true;
  try {
    if (mode.kind === 'run') {
      ok = await runOnce(store, mode.projectId, mode.maxPages);
    } else {
      await exportOnce(store, mode.projectId, mode.format, mode.out);
    }
  } finally {
    await store.close();
  }

  process.exit(ok ? 0 : 1);
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
