// Markup hooks for shop.aldi.us. The class names are generated by the site's
// CSS-in-JS build and change without notice; a mismatch shows up as
// "Not found" values in the output rather than as an error.

export const SITE_ORIGIN = 'https://shop.aldi.us';
export const STOREFRONT_URL = `${SITE_ORIGIN}/store/aldi/storefront`;

export const CONFIRM_BUTTON_NAME = 'Confirm';

export const DEPARTMENT_LIST = 'ul.e-19g896u';
export const DEPARTMENT_LINKS = `${DEPARTMENT_LIST} > li > a.e-v0wv1`;

export const COLLECTION_LINKS = 'a[href*="/store/aldi/collections"]';
export const COLLECTION_PATH_MARKERS = ['/collections/n-', '/collections/rc-'] as const;

export const CATEGORY_HEADING = 'h1.e-4jb28s';
export const PRODUCT_ITEM = 'h3.e-ti75j2';

/** Price containers, in the order they are tried. */
export const PRICE_CONTAINERS = ['div.e-2feaft', 'div.e-s71gfs'] as const;
export const PRICE_TEXT = 'span.screen-reader-only';
export const PRODUCT_NAME = 'div.e-147kl2c';
export const PRODUCT_WEIGHT = 'div.e-an4oxa';

export const NOT_FOUND = 'Not found';
export const UNKNOWN_CATEGORY = 'Unknown Category';
