function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseLimit(raw: string | undefined): number | null {
  if (!raw) return null;
  const n = parseInt(raw, 10);
  return isNaN(n) || n < 0 ? null : n;
}

/** Integer setting; unset or unparseable falls back to the default */
function parseIntSetting(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return isNaN(n) ? fallback : n;
}

export const config = {
  siteBaseUrl: process.env.SITE_BASE_URL || "https://www.gsmarena.com",
  brandIndexPath: process.env.BRAND_INDEX_PATH || "makers.php3",
  sourceTag: process.env.SOURCE_TAG || "gsmarena",

  dbPath: process.env.DB_PATH || "data/device-specs.db",
  phonesCollection: process.env.COLLECTION_NAME || "phones",
  phoneListCollection: process.env.PHONE_LIST_COLLECTION_NAME || "phone_list",

  maxBrands: parseLimit(process.env.MAX_BRANDS),
  maxItemsPerBrand: parseLimit(process.env.PHONES_PER_BRAND),
  skipExisting: process.env.SKIP_EXISTING !== "false",
  concurrency: Math.max(1, parseIntSetting(process.env.PARALLEL_THREADS, 1)),

  itemDelayMs: parseIntSetting(process.env.DELAY_BETWEEN_PHONES_MS, 500),
  brandDelayMs: parseIntSetting(process.env.DELAY_BETWEEN_BRANDS_MS, 2000),
  pageDelayMs: parseIntSetting(process.env.PAGE_DELAY_MS, 200),

  maxRetries: parseIntSetting(process.env.MAX_RETRIES, 3),
  retryBaseDelayMs: parseIntSetting(process.env.RETRY_BASE_DELAY_MS, 1000),
  requestTimeoutMs: parseIntSetting(process.env.REQUEST_TIMEOUT_MS, 15000),
  renderProxyTimeoutMs: parseIntSetting(process.env.RENDER_PROXY_TIMEOUT_MS, 60000),

  listingChannel: process.env.LISTING_CHANNEL || "direct",
  detailChannel: process.env.DETAIL_CHANNEL || "direct",
  hybridBatchSize: parseIntSetting(process.env.HYBRID_BATCH_SIZE, 10),

  renderProxyEndpoint:
    process.env.RENDER_PROXY_ENDPOINT || "https://app.scrapingbee.com/api/v1/",
  renderProxyApiKeys: parseList(process.env.RENDER_PROXY_API_KEYS),

  proxyUrls: parseList(process.env.PROXY_URLS),
  proxyListUrl: process.env.PROXY_LIST_URL || "",
  proxyListProjectId: process.env.PROXY_LIST_PROJECT_ID || "",
  proxyListApiKey: process.env.PROXY_LIST_API_KEY || "",

  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};

export { parseList, parseLimit, parseIntSetting };
