/**
 * In-process Fetcher stand-in serving canned listing and detail pages
 */

import type {
  DetailPage,
  Fetcher,
  ListingPage,
  RawDetail,
  RawItem,
  ScrapeSession,
} from '../../src/scraper/types.js';
import type { ExtractionRules } from '../../src/types/index.js';

export interface FakeSite {
  /** Target URL -> pages of items, page 1 first */
  listings: Record<string, RawItem[][]>;
  details?: Record<string, RawDetail>;
  /** URL -> error thrown whenever it is opened */
  failures?: Record<string, Error>;
}

export interface FakeCalls {
  listing: string[];
  next: number[];
  detail: string[];
}

export const FETCHED_AT = new Date('2026-01-15T08:00:00.000Z');

export function item(index: number, values: Record<string, string | null>, detailUrl: string | null = null): RawItem {
  return { index, values, detailUrl };
}

class FakeSession implements ScrapeSession {
  private target: string | null = null;

  constructor(private readonly fetcher: FakeFetcher) {}

  async openListing(url: string, _rules: ExtractionRules): Promise<ListingPage> {
    this.fetcher.calls.listing.push(url);
    this.fetcher.throwIfFailing(url);

    const pages = this.fetcher.site.listings[url];
    if (!pages) {
      throw new Error(`No listing for ${url}`);
    }
    this.target = url;
    return this.page(url, pages[0] ?? []);
  }

  async nextListing(_rules: ExtractionRules, pageNumber: number): Promise<ListingPage | null> {
    this.fetcher.calls.next.push(pageNumber);
    if (!this.target) return null;

    const items = this.fetcher.site.listings[this.target]?.[pageNumber - 1];
    return items ? this.page(`${this.target}?page=${pageNumber}`, items) : null;
  }

  async openDetail(url: string, _rules: ExtractionRules): Promise<DetailPage> {
    this.fetcher.calls.detail.push(url);
    this.fetcher.throwIfFailing(url);

    const detail = this.fetcher.site.details?.[url];
    if (!detail) {
      throw new Error(`No detail page for ${url}`);
    }
    return {
      snapshot: { url, status: 200, html: `<html>${url}</html>`, fetchedAt: FETCHED_AT },
      detail,
    };
  }

  async close(): Promise<void> {
    this.fetcher.sessionsClosed++;
  }

  private page(url: string, items: RawItem[]): ListingPage {
    return {
      snapshot: { url, status: 200, html: `<html>${url}</html>`, fetchedAt: FETCHED_AT },
      items,
    };
  }
}

export class FakeFetcher implements Fetcher {
  readonly calls: FakeCalls = { listing: [], next: [], detail: [] };
  sessionsOpened = 0;
  sessionsClosed = 0;
  shutdowns = 0;
  private gate: Promise<void> | null = null;

  constructor(readonly site: FakeSite) {}

  /**
   * Hold every new session open until the returned function is called
   */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async openSession(): Promise<ScrapeSession> {
    this.sessionsOpened++;
    if (this.gate) {
      await this.gate;
    }
    return new FakeSession(this);
  }

  async shutdown(): Promise<void> {
    this.shutdowns++;
  }

  throwIfFailing(url: string): void {
    const failure = this.site.failures?.[url];
    if (failure) {
      throw failure;
    }
  }
}
