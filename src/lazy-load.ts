import type { BrowserPage } from './types';
import type { Logger } from './reliability';

export interface LazyLoadOptions {
  /** Pause after each scroll for new content to append. */
  scrollDelayMs: number;
  /** Give up after this many scrolls even if the height is still changing. */
  maxScrolls: number;
}

export interface LazyLoadResult {
  scrolls: number;
  finalHeight: number;
  /** False when `maxScrolls` was reached before the height settled. */
  stabilized: boolean;
}

const readScrollHeight = (): number => document.body.scrollHeight;

const scrollToBottom = (): void => {
  window.scrollTo(0, document.body.scrollHeight);
};

/**
 * Scroll to the bottom repeatedly until the document height stops changing,
 * so that every lazily appended product is in the DOM before extraction.
 */
export async function scrollToLoadAll(
  page: Pick<BrowserPage, 'evaluate' | 'waitForTimeout'>,
  options: LazyLoadOptions,
  logger: Logger
): Promise<LazyLoadResult> {
  let lastHeight = await page.evaluate(readScrollHeight);
  let scrolls = 0;

  while (scrolls < options.maxScrolls) {
    await page.evaluate(scrollToBottom);
    await page.waitForTimeout(options.scrollDelayMs);
    scrolls++;

    const newHeight = await page.evaluate(readScrollHeight);
    if (newHeight === lastHeight) {
      logger.debug('Page height settled', { scrolls, height: newHeight });
      return { scrolls, finalHeight: newHeight, stabilized: true };
    }

    logger.debug('Page grew after scroll', { scrolls, from: lastHeight, to: newHeight });
    lastHeight = newHeight;
  }

  logger.warn(`Page height still changing after ${options.maxScrolls} scrolls, extracting what has loaded`, {
    finalHeight: lastHeight,
  });
  return { scrolls, finalHeight: lastHeight, stabilized: false };
}
