export type { DiscoveryOptions } from './types';
export {
  discoverCategoryUrls,
  dismissConfirmDialog,
  getDepartmentUrls,
  getSubcategoryUrls,
} from './discovery';
