/**
 * Timing and addressing for walking the department → sub-category hierarchy.
 */
export interface DiscoveryOptions {
  storefrontUrl: string;
  siteOrigin: string;
  navigationTimeoutMs: number;
  storefrontSettleMs: number;
  confirmSettleMs: number;
  departmentSettleMs: number;
}
