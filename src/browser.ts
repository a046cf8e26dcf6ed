import { chromium, type Browser } from 'playwright-core';
import type { BrowserPage } from './types';

export interface BrowserLaunchOptions {
  headless: boolean;
  /** Installed browser to drive instead of Playwright's bundled Chromium, e.g. "chrome". */
  channel?: string;
}

export interface BrowserSession {
  page: BrowserPage;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: BrowserLaunchOptions) => Promise<BrowserSession>;

/**
 * Launch Chromium with a single page. Closing the session closes the browser.
 */
export const launchBrowser: BrowserLauncher = async (options) => {
  const browser: Browser = await chromium.launch({
    headless: options.headless,
    channel: options.channel,
  });

  try {
    const page: BrowserPage = await browser.newPage();
    return {
      page,
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
};
