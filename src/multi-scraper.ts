import type { ProductRecord } from './types';
import type { ScraperSettings } from './config';
import { DEFAULT_SETTINGS } from './config';
import { AldiScraper } from './scraper';
import { appendToCsv } from './export';
import { validateRecord } from './schemas';
import { loggerFor, type Logger } from './reliability';

export interface MultiScraperConfig {
  settings?: Partial<ScraperSettings>;
  onProgress?: (progress: ScrapeProgress) => void;
}

export interface CategoryResult {
  url: string;
  success: boolean;
  productCount: number;
  error?: string;
}

export interface ScrapeProgress {
  total: number;
  completed: number;
  failed: number;
  current?: string;
  results: CategoryResult[];
}

export interface ScrapeSummary extends ScrapeProgress {
  /** Rows appended to the output file. */
  rowsWritten: number;
  /** Records dropped because they failed validation. */
  invalidRecords: number;
  outputFile: string;
}

export class MultiCategoryScraper {
  private readonly settings: ScraperSettings;
  private readonly config: MultiScraperConfig;
  private readonly logger: Logger;

  constructor(config: MultiScraperConfig = {}) {
    this.config = config;
    this.settings = { ...DEFAULT_SETTINGS, ...config.settings };
    this.logger = loggerFor('MultiCategoryScraper', this.settings);
  }

  /**
   * Discover categories, scrape each in turn, then append everything collected
   * to the CSV file in one write. A failing category is logged and skipped.
   */
  async run(): Promise<ScrapeSummary> {
    const scraper = new AldiScraper({ settings: this.settings });
    const summary: ScrapeSummary = {
      total: 0,
      completed: 0,
      failed: 0,
      results: [],
      rowsWritten: 0,
      invalidRecords: 0,
      outputFile: this.settings.outputFile,
    };

    try {
      await scraper.initialize();

      const urls = await scraper.discoverCategories();
      if (urls.length === 0) {
        this.logger.warn('No URLs to scrape. Exiting.');
        return summary;
      }

      summary.total = urls.length;

      const collected: ProductRecord[] = [];
      for (const [index, url] of urls.entries()) {
        summary.current = url;
        this.logger.info(`Processing URL ${index + 1}/${urls.length}: ${url}`);

        const records = await this.scrapeCategory(scraper, url, summary);
        collected.push(...records);

        // Pause after every category, failed ones included
        if (this.settings.categoryDelayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.settings.categoryDelayMs));
        }
      }
      summary.current = undefined;

      const valid = this.validate(collected, summary);
      summary.rowsWritten = appendToCsv(valid, this.settings.outputFile, loggerFor('CsvExport', this.settings));
    } finally {
      await scraper.close();
    }

    return summary;
  }

  private async scrapeCategory(
    scraper: AldiScraper,
    url: string,
    progress: ScrapeProgress
  ): Promise<ProductRecord[]> {
    let records: ProductRecord[] = [];

    try {
      records = await scraper.scrapeCategory(url);
      progress.completed++;
      progress.results.push({ url, success: true, productCount: records.length });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      progress.failed++;
      progress.results.push({ url, success: false, productCount: 0, error: errorMessage });
      this.logger.error(`Error scraping ${url}: ${errorMessage}`);
    }

    this.config.onProgress?.(progress);
    return records;
  }

  private validate(records: ProductRecord[], summary: ScrapeSummary): ProductRecord[] {
    const valid: ProductRecord[] = [];

    for (const record of records) {
      const result = validateRecord(record);
      if (result.success && result.data) {
        valid.push(result.data);
      } else {
        summary.invalidRecords++;
        this.logger.warn('Dropping invalid record', {
          error: result.error?.message,
          productName: record.productName,
        });
      }
    }

    return valid;
  }
}
