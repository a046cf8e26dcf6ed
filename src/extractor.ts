import type { BrowserPage, ElementLocator, ProductDetails, ProductRecord } from './types';
import type { Logger } from './reliability';
import { scrollToLoadAll, type LazyLoadOptions } from './lazy-load';
import { formatRunDate, parsePriceText } from './utils';
import {
  CATEGORY_HEADING,
  NOT_FOUND,
  PRICE_CONTAINERS,
  PRICE_TEXT,
  PRODUCT_ITEM,
  PRODUCT_NAME,
  PRODUCT_WEIGHT,
  UNKNOWN_CATEGORY,
} from './selectors';

async function textOrDefault(scope: ElementLocator, selector: string, fallback: string): Promise<string> {
  const element = scope.locator(selector).first();
  return (await element.count()) > 0 ? element.innerText() : fallback;
}

async function extractPrice(item: ElementLocator): Promise<string> {
  for (const container of PRICE_CONTAINERS) {
    const priceText = item.locator(container).first().locator(PRICE_TEXT).first();
    if ((await priceText.count()) > 0) {
      return parsePriceText(await priceText.innerText());
    }
  }
  return NOT_FOUND;
}

/**
 * Read name, price and weight from one product element. Absent fields become
 * "Not found"; the price is always "$"-prefixed, so a missing one reads "$Not found".
 */
export async function extractItemDetails(item: ElementLocator): Promise<ProductDetails> {
  const price = await extractPrice(item);
  const productName = await textOrDefault(item, PRODUCT_NAME, NOT_FOUND);
  const ounces = await textOrDefault(item, PRODUCT_WEIGHT, NOT_FOUND);

  return { productName, price: `$${price}`, ounces };
}

export async function scrapeCategoryPage(
  page: Pick<BrowserPage, 'evaluate' | 'waitForTimeout' | 'locator'>,
  options: LazyLoadOptions,
  logger: Logger,
  now: () => Date = () => new Date()
): Promise<ProductRecord[]> {
  await scrollToLoadAll(page, options, logger);

  const heading = page.locator(CATEGORY_HEADING).first();
  const category = (await heading.count()) > 0 ? await heading.innerText() : UNKNOWN_CATEGORY;
  logger.info(`Scraping category: ${category}`);

  const items = page.locator(PRODUCT_ITEM);
  const itemCount = await items.count();
  logger.info(`Number of products found: ${itemCount}`, { category });

  if (itemCount === 0) {
    logger.warn(`No products found with locator ${PRODUCT_ITEM}`);
    return [];
  }

  const date = formatRunDate(now());
  const records: ProductRecord[] = [];
  for (let i = 0; i < itemCount; i++) {
    const details = await extractItemDetails(items.nth(i));
    records.push({ date, category, ...details });
  }

  return records;
}
