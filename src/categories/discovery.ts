import type { BrowserPage } from '../types';
import type { Logger } from '../reliability';
import type { DiscoveryOptions } from './types';
import { isCollectionUrl, toAbsoluteUrl } from '../utils';
import { COLLECTION_LINKS, CONFIRM_BUTTON_NAME, DEPARTMENT_LINKS, DEPARTMENT_LIST } from '../selectors';

const CONTENT_DUMP_CHARS = 1000;

/**
 * Click the storefront's "Confirm" dialog button if it is showing.
 * Returns whether a click happened.
 */
export async function dismissConfirmDialog(
  page: BrowserPage,
  options: Pick<DiscoveryOptions, 'confirmSettleMs'>,
  logger: Logger
): Promise<boolean> {
  const button = page.getByRole('button', { name: CONFIRM_BUTTON_NAME });
  if ((await button.count()) === 0) {
    logger.info('Confirm button not found');
    return false;
  }

  await button.first().click();
  logger.info('Confirm button clicked');
  await page.waitForTimeout(options.confirmSettleMs);
  return true;
}

/**
 * Collect the sub-category collection URLs linked from one department page.
 * A department without any is its own single category.
 */
export async function getSubcategoryUrls(
  page: BrowserPage,
  departmentUrl: string,
  options: Pick<DiscoveryOptions, 'siteOrigin' | 'navigationTimeoutMs' | 'departmentSettleMs'>,
  logger: Logger
): Promise<string[]> {
  logger.info(`Navigating to department: ${departmentUrl}`);
  await page.goto(departmentUrl, { waitUntil: 'domcontentloaded', timeout: options.navigationTimeoutMs });
  await page.waitForTimeout(options.departmentSettleMs);

  const links = page.locator(COLLECTION_LINKS);
  const linkCount = await links.count();
  const subcategoryUrls = new Set<string>();

  for (let i = 0; i < linkCount; i++) {
    const href = await links.nth(i).getAttribute('href');
    if (!href) {
      continue;
    }
    const url = toAbsoluteUrl(href, options.siteOrigin);
    if (isCollectionUrl(url) && !subcategoryUrls.has(url)) {
      subcategoryUrls.add(url);
      logger.debug(`Found sub-category URL: ${url}`);
    }
  }

  if (subcategoryUrls.size === 0) {
    logger.info(`No sub-categories found for ${departmentUrl}. Treating as a single category.`);
    subcategoryUrls.add(departmentUrl);
  }

  return [...subcategoryUrls];
}

/**
 * Load the storefront root and read the top-level department links.
 * Returns null when the department navigation list is missing.
 */
export async function getDepartmentUrls(
  page: BrowserPage,
  options: DiscoveryOptions,
  logger: Logger
): Promise<string[] | null> {
  logger.info(`Navigating to ${options.storefrontUrl}...`);
  await page.goto(options.storefrontUrl, { waitUntil: 'domcontentloaded', timeout: options.navigationTimeoutMs });
  logger.info(`Loaded ${page.url()}, waiting for content...`);
  await page.waitForTimeout(options.storefrontSettleMs);

  await dismissConfirmDialog(page, options, logger);

  if ((await page.locator(DEPARTMENT_LIST).count()) === 0) {
    const content = await page.content();
    logger.error(`${DEPARTMENT_LIST} not found`, { content: content.slice(0, CONTENT_DUMP_CHARS) });
    return null;
  }

  const links = page.locator(DEPARTMENT_LINKS);
  const linkCount = await links.count();
  logger.info(`Total department links found: ${linkCount}`);

  const departmentUrls = new Set<string>();
  for (let i = 0; i < linkCount; i++) {
    const href = await links.nth(i).getAttribute('href');
    if (!href) {
      logger.warn('Department link without href skipped', { index: i });
      continue;
    }
    const url = toAbsoluteUrl(href, options.siteOrigin);
    departmentUrls.add(url);
    logger.debug(`Found department URL: ${url}`);
  }

  return [...departmentUrls];
}

/**
 * Walk departments and their sub-categories, returning every leaf category
 * URL once. An empty list means there is nothing to scrape.
 */
export async function discoverCategoryUrls(
  page: BrowserPage,
  options: DiscoveryOptions,
  logger: Logger
): Promise<string[]> {
  const departmentUrls = await getDepartmentUrls(page, options, logger);
  if (!departmentUrls) {
    return [];
  }

  const categoryUrls = new Set<string>();
  for (const departmentUrl of departmentUrls) {
    const subcategoryUrls = await getSubcategoryUrls(page, departmentUrl, options, logger);
    for (const url of subcategoryUrls) {
      categoryUrls.add(url);
    }
  }

  logger.info(`Total unique sub-category URLs found: ${categoryUrls.size}`);
  return [...categoryUrls];
}
