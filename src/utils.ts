import { COLLECTION_PATH_MARKERS, SITE_ORIGIN } from './selectors';

/**
 * Resolve a link href against the storefront origin.
 * Root-relative paths get the origin prepended; anything else is returned as-is.
 * Examples:
 *   "/store/aldi/collections/n-123" -> "https://shop.aldi.us/store/aldi/collections/n-123"
 *   "https://shop.aldi.us/store/aldi/collections/rc-9" -> unchanged
 */
export function toAbsoluteUrl(href: string, origin: string = SITE_ORIGIN): string {
  return href.startsWith('/') ? `${origin}${href}` : href;
}

export function isCollectionUrl(url: string): boolean {
  return COLLECTION_PATH_MARKERS.some((marker) => url.includes(marker));
}

/**
 * Isolate the amount from screen-reader price text such as "Current price: $3.99".
 * Takes the segment between the first and second "$"; text without a "$" is returned whole.
 */
export function parsePriceText(text: string): string {
  if (!text.includes('$')) {
    return text;
  }
  return text.split('$')[1];
}

/** Local-time `YYYY-MM-DD` stamp for a scrape run. */
export function formatRunDate(date: Date = new Date()): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}
