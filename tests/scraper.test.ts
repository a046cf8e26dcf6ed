import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { AldiScraper } from '../src/scraper';
import type { BrowserLauncher } from '../src/browser';
import { FakePage } from './helpers/fake-page';

const STOREFRONT = 'https://shop.aldi.us/store/aldi/storefront';
const SNACKS = 'https://shop.aldi.us/store/aldi/collections/n-40-snacks';

const PAGES: Record<string, string> = {
  [STOREFRONT]: `
    <ul class="e-19g896u">
      <li><a class="e-v0wv1" href="/store/aldi/collections/d-4-pantry">Pantry</a></li>
    </ul>
  `,
  'https://shop.aldi.us/store/aldi/collections/d-4-pantry': '<a href="/store/aldi/collections/n-40-snacks">Snacks</a>',
  [SNACKS]: `
    <h1 class="e-4jb28s">Snacks</h1>
    <h3 class="e-ti75j2">
      <div class="e-147kl2c">Sea Salt Kettle Chips</div>
      <div class="e-2feaft"><span class="screen-reader-only">Current price: $2.29</span></div>
      <div class="e-an4oxa">8 oz</div>
    </h3>
  `,
};

const FAST = {
  storefrontSettleMs: 0,
  confirmSettleMs: 0,
  departmentSettleMs: 0,
  pageSettleMs: 150,
  scrollDelayMs: 0,
  logLevel: 'error' as const,
};

describe('AldiScraper', () => {
  let page: FakePage;
  let close: Mock<() => Promise<void>>;
  let launch: Mock<BrowserLauncher>;

  beforeEach(() => {
    page = new FakePage({ pages: PAGES });
    close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    launch = vi.fn<BrowserLauncher>(async () => ({ page, close }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('refuses to work before initialize()', async () => {
    const scraper = new AldiScraper({ settings: FAST, launch });

    await expect(scraper.discoverCategories()).rejects.toThrow(
      'Scraper not initialized. Call initialize() first.'
    );
  });

  it('launches the browser with the configured options', async () => {
    const scraper = new AldiScraper({ settings: { ...FAST, headless: false, browserChannel: 'chrome' }, launch });

    await scraper.initialize();

    expect(launch).toHaveBeenCalledWith({ headless: false, channel: 'chrome' });
  });

  it('discovers category URLs from the storefront', async () => {
    const scraper = new AldiScraper({ settings: FAST, launch });
    await scraper.initialize();

    expect(await scraper.discoverCategories()).toEqual([SNACKS]);
  });

  it('scrapes a category page after letting it settle', async () => {
    const scraper = new AldiScraper({ settings: FAST, launch, now: () => new Date(2024, 5, 1) });
    await scraper.initialize();

    const records = await scraper.scrapeCategory(SNACKS);

    expect(page.navigations).toEqual([{ url: SNACKS, waitUntil: 'domcontentloaded' }]);
    expect(page.waits[0]).toBe(150);
    expect(records).toEqual([
      {
        date: '2024-06-01',
        category: 'Snacks',
        productName: 'Sea Salt Kettle Chips',
        price: '$2.29',
        ounces: '8 oz',
      },
    ]);
  });

  it('closes the browser once', async () => {
    const scraper = new AldiScraper({ settings: FAST, launch });
    await scraper.initialize();

    await scraper.close();
    await scraper.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
