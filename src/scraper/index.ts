/**
 * Scraper Module
 *
 * Browser-backed fetching of listing and detail pages
 */

export { BrowserFetcher } from './browser-fetcher.js';

export { BrowserHost } from './browser.js';
export type { BrowserOptions, BrowserPage, PageSource, WaitUntil } from './browser.js';
export type {
  Fetcher,
  ScrapeSession,
  ListingPage,
  DetailPage,
  PageSnapshot,
  RawItem,
  RawDetail,
  RawValues,
} from './types.js';
