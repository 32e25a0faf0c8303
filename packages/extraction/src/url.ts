export const STORE_BASE_URL = "https://www.bestbuy.ca";

const TRACKING_PARAM_PREFIXES = ["utm_", "fbclid", "gclid", "msclkid", "icmp", "ref", "source"];

export function resolveProductUrl(seoUrl: string | null, sku: string | null, baseUrl = STORE_BASE_URL): string | null {
  const path = seoUrl?.trim() || (sku ? `/en-ca/product/${encodeURIComponent(sku)}` : "");
  if (!path) {
    return null;
  }

  try {
    return normalizeProductUrl(path, baseUrl);
  } catch {
    return null;
  }
}

/**
 * Absolute product URL used as the dedupe key: relative paths resolve against
 * the store, tracking parameters and fragments go, the rest are sorted.
 */
export function normalizeProductUrl(input: string, baseUrl = STORE_BASE_URL): string {
  const url = new URL(input, baseUrl);
  const kept = [...url.searchParams]
    .filter(([key]) => !isTrackingParam(key))
    .sort(([a], [b]) => a.localeCompare(b));

  url.hash = "";
  url.search = new URLSearchParams(kept).toString();
  url.pathname = url.pathname.replace(/(.)\/+$/, "$1");

  return url.toString();
}

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return TRACKING_PARAM_PREFIXES.some((prefix) => lower.startsWith(prefix));
}
