/**
 * Browser Fetcher
 *
 * Renders listing and detail pages with Playwright and collects raw field
 * values inside the page.
 */

import { errorMessage, FetchError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ExtractionRules } from '../types/index.js';
import { BrowserHost, type BrowserOptions, type BrowserPage, type PageSource } from './browser.js';
import { toCollectFields } from './collect.js';
import type {
  DetailPage,
  Fetcher,
  ListingPage,
  PageSnapshot,
  ScrapeSession,
} from './types.js';

/**
 * Navigate; failures and error statuses become FetchErrors
 */
async function navigate(page: BrowserPage, url: string): Promise<number | null> {
  let status: number | null;
  try {
    status = await page.open(url);
  } catch (error) {
    throw new FetchError(url, null, errorMessage(error));
  }

  if (status !== null && status >= 400) {
    throw new FetchError(url, status);
  }
  return status;
}

async function snapshotOf(page: BrowserPage, status: number | null): Promise<PageSnapshot> {
  return { url: page.url(), status, html: await page.html(), fetchedAt: new Date() };
}

const waitSelector = (rules: ExtractionRules): string => rules.waitForSelector ?? rules.itemSelector;

class BrowserSession implements ScrapeSession {
  private listingUrl: string | null = null;

  constructor(
    private readonly pages: PageSource,
    private readonly page: BrowserPage
  ) {}

  async openListing(url: string, rules: ExtractionRules): Promise<ListingPage> {
    const status = await navigate(this.page, url);

    const waitFor = waitSelector(rules);
    if (!(await this.page.waitFor(waitFor))) {
      throw new FetchError(url, status, `Timed out waiting for '${waitFor}' on ${url}`);
    }

    return this.readListing(status, rules);
  }

  async nextListing(rules: ExtractionRules, pageNumber: number): Promise<ListingPage | null> {
    const pagination = rules.pagination;
    if (!pagination || !this.listingUrl) {
      return null;
    }

    const waitFor = waitSelector(rules);

    if (pagination.mode === 'query') {
      const url = new URL(this.listingUrl);
      url.searchParams.set(pagination.param, String(pagination.start + pageNumber - 1));

      let status: number | null;
      try {
        status = await navigate(this.page, url.toString());
      } catch (error) {
        if (error instanceof FetchError && error.status === 404) {
          logger.debug({ url: url.toString() }, 'No further listing page');
          return null;
        }
        throw error;
      }

      // Sites often render an empty result page past the last one
      if (!(await this.page.waitFor(waitFor))) {
        logger.debug({ url: url.toString(), waitFor }, 'Listing page has no items, stopping');
        return null;
      }

      const listing = await this.readListing(status, rules);
      return listing.items.length > 0 ? listing : null;
    }

    if (!(await this.page.click(pagination.selector))) {
      return null;
    }
    await this.page.settle();

    if (!(await this.page.waitFor(waitFor))) {
      throw new FetchError(this.page.url(), null, `Timed out waiting for '${waitFor}' after pagination`);
    }

    return this.readListing(null, rules);
  }

  async openDetail(url: string, rules: ExtractionRules): Promise<DetailPage> {
    const detailRules = rules.detail;
    const page = await this.pages.newPage();

    try {
      const status = await navigate(page, url);

      if (detailRules?.tabSelector && (await page.click(detailRules.tabSelector))) {
        await page.settle();
      }
      if (detailRules?.keyValueSelector && !(await page.waitFor(detailRules.keyValueSelector))) {
        logger.debug({ url, selector: detailRules.keyValueSelector }, 'No key-value blocks on detail page');
      }

      const output = await page.collect({
        itemSelector: null,
        labelSelector: rules.labelSelector,
        fields: toCollectFields(detailRules?.fields ?? {}),
        detailLinkSelector: null,
        blockSelector: detailRules?.keyValueSelector ?? null,
      });

      return {
        snapshot: await snapshotOf(page, status),
        detail: { values: output.items[0]?.values ?? {}, blocks: output.blocks },
      };
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    await this.page.close();
  }

  private async readListing(status: number | null, rules: ExtractionRules): Promise<ListingPage> {
    const snapshot = await snapshotOf(this.page, status);
    this.listingUrl = snapshot.url;

    const output = await this.page.collect({
      itemSelector: rules.itemSelector,
      labelSelector: rules.labelSelector,
      fields: toCollectFields(rules.fields),
      detailLinkSelector: rules.detail?.linkSelector ?? null,
      blockSelector: null,
    });

    return { snapshot, items: output.items };
  }
}

export class BrowserFetcher implements Fetcher {
  private readonly pages: PageSource;

  constructor(options: BrowserOptions = {}, pages?: PageSource) {
    this.pages = pages ?? new BrowserHost(options);
  }

  async openSession(): Promise<ScrapeSession> {
    return new BrowserSession(this.pages, await this.pages.newPage());
  }

  async shutdown(): Promise<void> {
    if (this.pages.running) {
      await this.pages.close();
    }
  }
}
