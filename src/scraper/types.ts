/**
 * Fetcher Types
 */

import type { ExtractionRules } from '../types/index.js';

/**
 * Raw field values collected from one page element, before cleaning
 */
export type RawValues = Record<string, string | null>;

/**
 * One item (card, row) found on a listing page
 */
export interface RawItem {
  index: number;
  values: RawValues;
  detailUrl: string | null;
}

/**
 * Values collected from an item's detail page
 */
export interface RawDetail {
  values: RawValues;
  /** Text of every key-value block, one entry per block */
  blocks: string[];
}

/**
 * A rendered page as fetched
 */
export interface PageSnapshot {
  url: string;
  status: number | null;
  html: string;
  fetchedAt: Date;
}

export interface ListingPage {
  snapshot: PageSnapshot;
  items: RawItem[];
}

export interface DetailPage {
  snapshot: PageSnapshot;
  detail: RawDetail;
}

/**
 * A browsing session over one project's pages
 */
export interface ScrapeSession {
  /** Navigate to a listing URL and collect its items */
  openListing(url: string, rules: ExtractionRules): Promise<ListingPage>;

  /**
   * Move to the next listing page. `pageNumber` is the 1-based number of
   * the page being requested. Resolves null when there is no next page.
   */
  nextListing(rules: ExtractionRules, pageNumber: number): Promise<ListingPage | null>;

  /** Open a detail page without leaving the current listing */
  openDetail(url: string, rules: ExtractionRules): Promise<DetailPage>;

  close(): Promise<void>;
}

export interface Fetcher {
  openSession(): Promise<ScrapeSession>;
  /** Release shared resources (browser) */
  shutdown(): Promise<void>;
}
