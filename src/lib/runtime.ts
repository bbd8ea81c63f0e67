import { config } from "./config";
import type { Channel } from "./scraping/channels";
import { ProxyPool, loadConfiguredProxies } from "./scraping/proxy-pool";
import { KeyRing } from "./scraping/render-proxy";
import { TransportSelector, parseChannelSetting, type ChannelSetting } from "./scraping/transport";

export interface ConfiguredTransport {
  selector: TransportSelector;
  listingChannel: Channel;
  detailChannel: Channel;
}

/**
 * Build the channels named by LISTING_CHANNEL / DETAIL_CHANNEL. Throws when
 * a selected channel lacks the credentials or proxies it needs.
 */
export async function createConfiguredTransport(): Promise<ConfiguredTransport> {
  const listingSetting = parseChannelSetting(config.listingChannel);
  const detailSetting = parseChannelSetting(config.detailChannel);
  if (listingSetting === "hybrid") {
    throw new Error("LISTING_CHANNEL=hybrid is not supported; use it for DETAIL_CHANNEL");
  }

  const settings: ChannelSetting[] = [listingSetting, detailSetting];
  const needsProxies = settings.includes("proxy");
  const needsKeys = settings.includes("render") || settings.includes("hybrid");

  let proxyPool: ProxyPool | undefined;
  if (needsProxies) {
    proxyPool = new ProxyPool(await loadConfiguredProxies());
    if (proxyPool.size === 0) {
      throw new Error("Proxy channel selected but no usable proxies were found (PROXY_URLS / PROXY_LIST_URL)");
    }
  }

  if (needsKeys && config.renderProxyApiKeys.length === 0) {
    throw new Error("Render-proxy channel selected but RENDER_PROXY_API_KEYS is empty");
  }
  const keyRing = needsKeys ? new KeyRing(config.renderProxyApiKeys) : undefined;

  const selector = new TransportSelector({
    proxyPool,
    keyRing,
    requestTimeoutMs: config.requestTimeoutMs,
    renderProxy: { timeoutMs: config.renderProxyTimeoutMs },
  });

  return {
    selector,
    listingChannel: selector.channelFor(listingSetting),
    detailChannel: selector.channelFor(detailSetting),
  };
}

/** AbortController tripped by the first Ctrl-C; a second one exits immediately */
export function abortOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(130);
    console.warn("\nInterrupted, finishing current work (Ctrl-C again to exit now)...");
    controller.abort();
  });
  return controller;
}
