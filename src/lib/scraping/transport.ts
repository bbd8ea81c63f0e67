import { config } from "../config";
import { ChannelKind } from "../types";
import { DirectChannel, ProxyChannel, type Channel } from "./channels";
import { isCredentialsExhausted } from "./errors";
import { ProxyPool } from "./proxy-pool";
import { KeyRing, RenderProxyChannel, type RenderProxyOptions } from "./render-proxy";

/** Values accepted by LISTING_CHANNEL / DETAIL_CHANNEL */
export type ChannelSetting = "direct" | "proxy" | "render" | "hybrid";

export function parseChannelSetting(value: string | undefined, fallback: ChannelSetting = "direct"): ChannelSetting {
  switch ((value ?? "").trim().toLowerCase()) {
    case "direct":
      return "direct";
    case "proxy":
      return "proxy";
    case "render":
    case "scrapingbee":
      return "render";
    case "hybrid":
      return "hybrid";
    case "":
      return fallback;
    default:
      throw new Error(`Unknown channel "${value}" (expected direct, proxy, render or hybrid)`);
  }
}

export interface TransportSelectorOptions {
  /** Required for ChannelKind.PROXY */
  proxyPool?: ProxyPool;
  /** Required for ChannelKind.RENDER_PROXY */
  keyRing?: KeyRing;
  requestTimeoutMs?: number;
  renderProxy?: RenderProxyOptions;
}

/**
 * Owns the rotation state for a run and hands out channels bound to it.
 * Two selectors never share a cursor.
 */
export class TransportSelector {
  private readonly proxyPool: ProxyPool | null;
  private readonly keyRing: KeyRing | null;
  private readonly requestTimeoutMs: number;
  private readonly renderProxy: RenderProxyOptions;

  constructor(options: TransportSelectorOptions = {}) {
    this.proxyPool = options.proxyPool ?? null;
    this.keyRing = options.keyRing ?? null;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.requestTimeoutMs;
    this.renderProxy = options.renderProxy ?? {};
  }

  acquireChannel(kind: ChannelKind): Channel {
    switch (kind) {
      case ChannelKind.DIRECT:
        return new DirectChannel(this.requestTimeoutMs);
      case ChannelKind.PROXY:
        if (!this.proxyPool || this.proxyPool.size === 0) {
          throw new Error("Proxy channel requested but the proxy pool is empty (set PROXY_URLS or PROXY_LIST_URL)");
        }
        return new ProxyChannel(this.proxyPool, this.requestTimeoutMs);
      case ChannelKind.RENDER_PROXY:
        if (!this.keyRing || this.keyRing.size === 0) {
          throw new Error("Render-proxy channel requested but no API keys are configured (set RENDER_PROXY_API_KEYS)");
        }
        return new RenderProxyChannel(this.keyRing, this.renderProxy);
    }
  }

  /** Resolve a config setting, including the hybrid mode, to a channel */
  channelFor(setting: ChannelSetting, hybridBatchSize: number = config.hybridBatchSize): Channel {
    switch (setting) {
      case "direct":
        return this.acquireChannel(ChannelKind.DIRECT);
      case "proxy":
        return this.acquireChannel(ChannelKind.PROXY);
      case "render":
        return this.acquireChannel(ChannelKind.RENDER_PROXY);
      case "hybrid":
        return new AlternatingChannel(
          this.acquireChannel(ChannelKind.DIRECT),
          this.acquireChannel(ChannelKind.RENDER_PROXY),
          hybridBatchSize
        );
    }
  }
}

/**
 * Hybrid mode: `batchSize` fetches through the primary channel, then
 * `batchSize` through the secondary, and so on, starting with the primary.
 * Once the secondary runs out of credentials it is dropped for good.
 */
export class AlternatingChannel implements Channel {
  private fetches = 0;
  private secondaryExhausted = false;

  constructor(
    private readonly primary: Channel,
    private readonly secondary: Channel,
    private readonly batchSize: number
  ) {}

  get kind(): ChannelKind {
    return this.current().kind;
  }

  describe(): string {
    return this.secondaryExhausted
      ? `${this.primary.describe()} (hybrid, ${this.secondary.describe()} exhausted)`
      : `hybrid ${this.primary.describe()} / ${this.secondary.describe()} every ${this.batchSize}`;
  }

  private current(): Channel {
    if (this.secondaryExhausted || this.batchSize <= 0) return this.primary;
    return Math.floor(this.fetches / this.batchSize) % 2 === 0 ? this.primary : this.secondary;
  }

  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    const channel = this.current();
    this.fetches++;
    try {
      return await channel.fetch(url, signal);
    } catch (error) {
      if (channel === this.secondary && isCredentialsExhausted(error)) {
        console.warn(`[transport] ${this.secondary.describe()} exhausted, continuing with ${this.primary.describe()} only`);
        this.secondaryExhausted = true;
        return this.primary.fetch(url, signal);
      }
      throw error;
    }
  }

  rotate(): void {
    this.current().rotate?.();
  }
}
