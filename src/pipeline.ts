/**
 * Run Pipeline
 *
 * One fetch-parse-store cycle for one project:
 * 1. Render each target listing page (following pagination)
 * 2. Open detail pages for items that link to one
 * 3. Clean raw values into records
 * 4. Store records, deduplicated against earlier runs
 */

import crypto from 'crypto';
import { buildRecord, extractFields } from './extract/index.js';
import { config } from './config/index.js';
import { errorMessage, FetchError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { withRetry, type RetryOptions } from './utils/retry.js';
import type { ScrapeStore } from './store/types.js';
import type {
  Fetcher,
  ListingPage,
  PageSnapshot,
  RawDetail,
  ScrapeSession,
} from './scraper/types.js';
import type {
  ExtractedRecord,
  FetchKind,
  FetchResult,
  Project,
  RunCounters,
  RunResult,
  RunTrigger,
  ScrapeRun,
} from './types/index.js';

/**
 * Pipeline dependencies
 */
export interface PipelineDeps {
  store: ScrapeStore;
  fetcher: Fetcher;
  /** Shared with other runs of the same project; created from the project when absent */
  rateLimiter?: RateLimiter;
  clock?: () => Date;
}

/**
 * Pipeline options
 */
export interface PipelineOptions {
  runId?: string;
  trigger?: RunTrigger;
  /** Overrides the project's page limit */
  maxPages?: number;
  retry?: Omit<RetryOptions, 'retryIf' | 'label'>;
}

const isRetryable = (error: Error): boolean => !(error instanceof FetchError) || error.retryable;

/**
 * Run one cycle for a project. Page and item failures are counted, not thrown.
 */
export async function runProject(
  project: Project,
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<RunResult> {
  const clock = deps.clock ?? (() => new Date());
  const limiter = deps.rateLimiter ?? new RateLimiter(project.rateLimitMs);
  const maxPages = options.maxPages ?? project.maxPages;
  const retry = { ...config.retry, ...options.retry };

  const startTime = Date.now();
  const run: ScrapeRun = {
    id: options.runId ?? crypto.randomUUID(),
    projectId: project.id,
    trigger: options.trigger ?? 'manual',
    status: 'running',
    startedAt: clock(),
    finishedAt: null,
    pagesProcessed: 0,
    recordsFound: 0,
    recordsNew: 0,
    recordsDuplicate: 0,
    itemsSkipped: 0,
    errors: 0,
    errorMessage: null,
  };
  const detailUrls: string[] = [];
  let lastError: string | null = null;

  const log = logger.child({ projectId: project.id, runId: run.id });
  log.info({ targets: project.targets.length, maxPages, trigger: run.trigger }, 'Starting project run');

  await deps.store.createRun(run);

  const fetchWithRetry = <T>(label: string, fn: () => Promise<T>): Promise<T> =>
    withRetry(() => limiter.execute(fn), { ...retry, retryIf: isRetryable, label });

  const saveSnapshot = async (snapshot: PageSnapshot, kind: FetchKind): Promise<FetchResult> => {
    const fetchResult: FetchResult = {
      id: crypto.randomUUID(),
      projectId: project.id,
      runId: run.id,
      kind,
      url: snapshot.url,
      status: snapshot.status,
      payload: snapshot.html,
      fetchedAt: snapshot.fetchedAt,
    };
    await deps.store.saveFetchResult(fetchResult);
    return fetchResult;
  };

  const processListing = async (session: ScrapeSession, listing: ListingPage): Promise<void> => {
    const fetchResult = await saveSnapshot(listing.snapshot, 'listing');
    const records: ExtractedRecord[] = [];

    for (const item of listing.items) {
      try {
        let detail: RawDetail | undefined;
        if (project.rules.detail && item.detailUrl) {
          const detailUrl = item.detailUrl;
          try {
            const detailPage = await fetchWithRetry(`detail ${detailUrl}`, () =>
              session.openDetail(detailUrl, project.rules)
            );
            await saveSnapshot(detailPage.snapshot, 'detail');
            detail = detailPage.detail;
            detailUrls.push(detailPage.snapshot.url);
          } catch (error) {
            // The listing fields may still be enough; required detail fields decide below
            run.errors++;
            lastError = errorMessage(error);
            log.error({ error, url: detailUrl }, 'Failed to fetch detail page');
          }
        }

        const { fields, missing } = extractFields(item, project.rules, detail);
        if (missing.length > 0) {
          run.itemsSkipped++;
          log.debug({ index: item.index, missing }, 'Item missing required fields, skipping');
          continue;
        }

        records.push(
          buildRecord({
            projectId: project.id,
            runId: run.id,
            fetchResultId: fetchResult.id,
            fields,
            detailUrl: item.detailUrl,
            keyFields: project.rules.keyFields,
            seenAt: clock(),
          })
        );
      } catch (error) {
        run.errors++;
        lastError = errorMessage(error);
        log.error({ error, index: item.index }, 'Error extracting item');
      }
    }

    // A page counts once its records are stored; a failed save throws to the target
    const saved = await deps.store.saveRecords(records);
    run.pagesProcessed++;
    run.recordsFound += records.length;
    run.recordsNew += saved.inserted;
    run.recordsDuplicate += saved.duplicates;

    log.info(
      {
        url: listing.snapshot.url,
        items: listing.items.length,
        records: records.length,
        inserted: saved.inserted,
        duplicates: saved.duplicates,
      },
      'Listing page processed'
    );
  };

  let session: ScrapeSession | null = null;
  try {
    session = await deps.fetcher.openSession();
    const activeSession = session;

    for (const target of project.targets) {
      try {
        let listing: ListingPage | null = await fetchWithRetry(`listing ${target}`, () =>
          activeSession.openListing(target, project.rules)
        );
        let pageNumber = 1;

        while (listing) {
          await processListing(activeSession, listing);

          if (pageNumber >= maxPages) {
            log.info({ target, maxPages }, 'Reached maximum pages limit');
            break;
          }

          pageNumber++;
          const requested = pageNumber;
          // Click pagination mutates the open page, so it is not retried
          listing =
            project.rules.pagination?.mode === 'click'
              ? await limiter.execute(() => activeSession.nextListing(project.rules, requested))
              : await fetchWithRetry(`page ${requested} of ${target}`, () =>
                  activeSession.nextListing(project.rules, requested)
                );
        }
      } catch (error) {
        run.errors++;
        lastError = errorMessage(error);
        log.error({ error, target }, 'Error scraping target');
      }
    }
  } catch (error) {
    run.errors++;
    lastError = errorMessage(error);
    log.error({ error }, 'Project run failed');
  } finally {
    if (session) {
      await session.close();
    }
  }

  run.finishedAt = clock();
  run.status = run.pagesProcessed > 0 ? 'succeeded' : 'failed';
  run.errorMessage = run.status === 'failed' ? lastError ?? 'No listing page could be processed' : null;
  await deps.store.finishRun(run);

  const result = toRunResult(run, detailUrls, Date.now() - startTime);
  log.info(
    {
      status: result.status,
      pagesProcessed: result.pagesProcessed,
      recordsFound: result.recordsFound,
      recordsNew: result.recordsNew,
      errors: result.errors,
      durationMs: result.durationMs,
    },
    'Project run completed'
  );

  return result;
}

function toRunResult(run: ScrapeRun, detailUrls: string[], durationMs: number): RunResult {
  const counters: RunCounters = {
    pagesProcessed: run.pagesProcessed,
    recordsFound: run.recordsFound,
    recordsNew: run.recordsNew,
    recordsDuplicate: run.recordsDuplicate,
    itemsSkipped: run.itemsSkipped,
    errors: run.errors,
  };
  const success = run.status === 'succeeded';

  return {
    success,
    message: success
      ? `Successfully scraped ${run.recordsFound} records`
      : `Scraping failed: ${run.errorMessage ?? 'unknown error'}`,
    runId: run.id,
    projectId: run.projectId,
    status: run.status,
    ...counters,
    detailUrls,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt ?? run.startedAt,
    durationMs,
  };
}
