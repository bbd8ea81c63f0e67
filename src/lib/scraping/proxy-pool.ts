import { config } from "../config";
import { FetchError, FetchErrorKind } from "./errors";
import { httpGet } from "./utils";

export interface ProxyEndpoint {
  endpoint: string; // full URL, e.g. "http://10.0.0.1:8080"
  transportType: string; // "http", "https", "socks4", "socks5"
  status: string;
}

const USABLE_STATUSES = new Set(["active", "working"]);
const SUPPORTED_TRANSPORTS = new Set(["http", "https"]);

/**
 * Proxy rotation state. Shuffled once when loaded, then handed out
 * round-robin.
 */
export class ProxyPool {
  private readonly proxies: ProxyEndpoint[];
  private cursor = 0;

  constructor(proxies: ProxyEndpoint[], random: () => number = Math.random) {
    this.proxies = shuffle(proxies, random);
  }

  get size(): number {
    return this.proxies.length;
  }

  next(): ProxyEndpoint {
    if (this.proxies.length === 0) {
      throw new FetchError(FetchErrorKind.NETWORK, "Proxy pool is empty");
    }
    const proxy = this.proxies[this.cursor];
    this.cursor = (this.cursor + 1) % this.proxies.length;
    return proxy;
  }
}

/** Fisher-Yates over a copy */
export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Prefix the scheme implied by the transport type when the entry has none */
export function formatProxyUrl(raw: string, transportType: string): string {
  const type = transportType.toLowerCase();
  if (/^[a-z0-9]+:\/\//i.test(raw)) return raw;
  if (type === "https") return `https://${raw}`;
  if (type === "socks4" || type === "socks5") return `${type}://${raw}`;
  return `http://${raw}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

/**
 * Turn a remote document list into usable endpoints: only active/working
 * entries, and only transports undici's ProxyAgent can tunnel through.
 */
export function parseProxyDocuments(body: string): ProxyEndpoint[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    console.warn("[proxy] Proxy list is not valid JSON");
    return [];
  }

  const documents: unknown[] =
    isRecord(data) && Array.isArray(data.documents) ? data.documents : Array.isArray(data) ? data : [];

  const proxies: ProxyEndpoint[] = [];
  let skippedTransport = 0;

  for (const doc of documents) {
    if (!isRecord(doc)) continue;
    const raw = asString(doc.proxy) ?? asString(doc.endpoint);
    const status = asString(doc.status) ?? "";
    if (!raw || !USABLE_STATUSES.has(status.toLowerCase())) continue;

    const transportType = (asString(doc.type) ?? asString(doc.transport_type) ?? "http").toLowerCase();
    if (!SUPPORTED_TRANSPORTS.has(transportType)) {
      skippedTransport++;
      continue;
    }

    proxies.push({ endpoint: formatProxyUrl(raw, transportType), transportType, status });
  }

  if (skippedTransport > 0) {
    console.warn(`[proxy] Skipped ${skippedTransport} proxies with unsupported transport (socks)`);
  }
  return proxies;
}

export interface ProxyListSource {
  url: string;
  projectId?: string;
  apiKey?: string;
}

export async function loadProxyList(source: ProxyListSource): Promise<ProxyEndpoint[]> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/json",
  };
  if (source.projectId) headers["X-Appwrite-Project"] = source.projectId;
  if (source.apiKey) headers["X-Appwrite-Key"] = source.apiKey;

  const body = await httpGet(source.url, { headers, timeoutMs: 30000 });
  const proxies = parseProxyDocuments(body);
  console.log(`[proxy] Loaded ${proxies.length} active proxies from ${new URL(source.url).hostname}`);
  return proxies;
}

/** Static PROXY_URLS first, then the remote list when one is configured */
export async function loadConfiguredProxies(): Promise<ProxyEndpoint[]> {
  const proxies: ProxyEndpoint[] = config.proxyUrls.map((url) => ({
    endpoint: formatProxyUrl(url, "http"),
    transportType: url.toLowerCase().startsWith("https://") ? "https" : "http",
    status: "active",
  }));

  if (config.proxyListUrl) {
    proxies.push(
      ...(await loadProxyList({
        url: config.proxyListUrl,
        projectId: config.proxyListProjectId,
        apiKey: config.proxyListApiKey,
      }))
    );
  }
  return proxies;
}
