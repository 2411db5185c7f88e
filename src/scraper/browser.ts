/**
 * Playwright browser host
 *
 * One Chromium process and one context per fetcher; every scrape session
 * opens its pages here.
 */

import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { collectInPage, type CollectOutput, type CollectPlan } from './collect.js';

export interface BrowserOptions {
  headless?: boolean;
  /** Navigation and selector timeout */
  timeout?: number;
  userAgent?: string;
  /** Playwright resource types aborted before they load */
  blockResources?: string[];
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

/**
 * The page operations a scrape session drives
 */
export interface BrowserPage {
  /** Navigate; resolves the main document status, null for same-document navigations */
  open(url: string): Promise<number | null>;
  /** false when nothing matched before the timeout */
  waitFor(selector: string): Promise<boolean>;
  url(): string;
  html(): Promise<string>;
  collect(plan: CollectPlan): Promise<CollectOutput>;
  /** Click the first match; false when it is missing or disabled */
  click(selector: string): Promise<boolean>;
  /** Let the network go quiet after a click */
  settle(): Promise<void>;
  close(): Promise<void>;
}

export interface PageSource {
  readonly running: boolean;
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

const DEFAULT_BLOCKED_RESOURCES = ['media', 'font'];

class PlaywrightPage implements BrowserPage {
  constructor(
    private readonly page: Page,
    private readonly waitUntil: WaitUntil = 'domcontentloaded'
  ) {}

  async open(url: string): Promise<number | null> {
    logger.debug({ url, waitUntil: this.waitUntil }, 'Navigating to URL');

    const response = await this.page.goto(url, { waitUntil: this.waitUntil });
    logger.debug({ url, status: response?.status() }, 'Navigation finished');
    return response?.status() ?? null;
  }

  async waitFor(selector: string): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { state: 'attached' });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  url(): string {
    return this.page.url();
  }

  html(): Promise<string> {
    return this.page.content();
  }

  collect(plan: CollectPlan): Promise<CollectOutput> {
    return this.page.evaluate(collectInPage, plan);
  }

  async click(selector: string): Promise<boolean> {
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) {
      return false;
    }

    const disabled = await target.evaluate(
      (el) =>
        el.hasAttribute('disabled') ||
        el.getAttribute('aria-disabled') === 'true' ||
        el.classList.contains('disabled') ||
        (el.parentElement?.classList.contains('disabled') ?? false)
    );
    if (disabled || !(await target.isEnabled())) {
      return false;
    }

    await target.click();
    return true;
  }

  async settle(): Promise<void> {
    try {
      await this.page.waitForLoadState('networkidle');
    } catch (error) {
      logger.debug({ error }, 'Network did not settle');
    }
  }

  async close(): Promise<void> {
    try {
      await this.page.close();
    } catch (error) {
      logger.warn({ error }, 'Error closing page');
    }
  }
}

export class BrowserHost implements PageSource {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private launching: Promise<BrowserContext> | null = null;
  private readonly blocked: Set<string>;

  constructor(private readonly options: BrowserOptions = {}) {
    this.blocked = new Set(options.blockResources ?? DEFAULT_BLOCKED_RESOURCES);
  }

  get running(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }

  /**
   * Launch on first use; concurrent callers share one launch
   */
  async ensureContext(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }
    this.launching ??= this.launch().finally(() => {
      this.launching = null;
    });
    return this.launching;
  }

  async newPage(): Promise<BrowserPage> {
    const context = await this.ensureContext();
    const page = await context.newPage();

    if (this.blocked.size > 0) {
      await page.route('**/*', (route) =>
        this.blocked.has(route.request().resourceType()) ? route.abort() : route.continue()
      );
    }

    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    if (this.context) {
      try {
        await this.context.close();
      } catch (error) {
        logger.warn({ error }, 'Error closing context');
      }
      this.context = null;
    }

    if (this.browser) {
      try {
        await this.browser.close();
        logger.info('Browser closed');
      } catch (error) {
        logger.warn({ error }, 'Error closing browser');
      }
      this.browser = null;
    }
  }

  private async launch(): Promise<BrowserContext> {
    const headless = this.options.headless ?? config.browser.headless;
    logger.info({ headless }, 'Launching browser');

    this.browser = await chromium.launch({
      headless,
      // Required for Docker/containerized environments
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });

    const context = await this.browser.newContext({
      userAgent: this.options.userAgent ?? config.browser.userAgent,
      viewport: config.browser.viewport,
      javaScriptEnabled: true,
      extraHTTPHeaders: {
        'Accept-Language': 'en-US,en;q=0.9',
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      },
    });
    context.setDefaultTimeout(this.options.timeout ?? config.scraper.timeout);
    this.context = context;

    logger.info('Browser initialized successfully');
    return context;
  }
}
