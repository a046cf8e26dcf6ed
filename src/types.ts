/**
 * The slice of Playwright's `Locator` the scraper relies on.
 */
export interface ElementLocator {
  count(): Promise<number>;
  first(): ElementLocator;
  nth(index: number): ElementLocator;
  locator(selector: string): ElementLocator;
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  click(): Promise<void>;
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

/**
 * The slice of Playwright's `Page` the scraper relies on.
 */
export interface BrowserPage {
  goto(url: string, options?: { waitUntil?: WaitUntil; timeout?: number }): Promise<unknown>;
  url(): string;
  content(): Promise<string>;
  waitForTimeout(timeout: number): Promise<void>;
  locator(selector: string): ElementLocator;
  getByRole(role: 'button', options: { name: string }): ElementLocator;
  evaluate<R>(pageFunction: () => R): Promise<R>;
}

export interface ProductDetails {
  productName: string;
  price: string;
  ounces: string;
}

export interface ProductRecord extends ProductDetails {
  date: string;
  category: string;
}
