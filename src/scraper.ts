import type { BrowserPage, ProductRecord } from './types';
import type { ScraperSettings } from './config';
import { DEFAULT_SETTINGS } from './config';
import { launchBrowser, type BrowserLauncher, type BrowserSession } from './browser';
import { discoverCategoryUrls } from './categories';
import { scrapeCategoryPage } from './extractor';
import { loggerFor, type Logger } from './reliability';

export interface ScraperOptions {
  settings?: Partial<ScraperSettings>;
  launch?: BrowserLauncher;
  now?: () => Date;
}

export class AldiScraper {
  private session: BrowserSession | null = null;
  private readonly settings: ScraperSettings;
  private readonly launch: BrowserLauncher;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly discoveryLogger: Logger;
  private readonly pageLogger: Logger;

  constructor(options: ScraperOptions = {}) {
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.launch = options.launch ?? launchBrowser;
    this.now = options.now ?? (() => new Date());
    this.logger = loggerFor('AldiScraper', this.settings);
    this.discoveryLogger = loggerFor('CategoryDiscovery', this.settings);
    this.pageLogger = loggerFor('Extractor', this.settings);
  }

  async initialize(): Promise<void> {
    this.logger.info('Launching browser', {
      headless: this.settings.headless,
      channel: this.settings.browserChannel,
    });
    this.session = await this.launch({
      headless: this.settings.headless,
      channel: this.settings.browserChannel,
    });
  }

  private requirePage(): BrowserPage {
    if (!this.session) {
      throw new Error('Scraper not initialized. Call initialize() first.');
    }
    return this.session.page;
  }

  async discoverCategories(): Promise<string[]> {
    return discoverCategoryUrls(this.requirePage(), this.settings, this.discoveryLogger);
  }

  /**
   * Load one category page, wait for lazy content, and extract its products.
   */
  async scrapeCategory(url: string): Promise<ProductRecord[]> {
    const page = this.requirePage();

    await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.settings.navigationTimeoutMs });
    await page.waitForTimeout(this.settings.pageSettleMs);

    return scrapeCategoryPage(
      page,
      { scrollDelayMs: this.settings.scrollDelayMs, maxScrolls: this.settings.maxScrolls },
      this.pageLogger,
      this.now
    );
  }

  async close(): Promise<void> {
    if (this.session) {
      await this.session.close();
      this.session = null;
      this.logger.info('Browser closed');
    }
  }
}
