import { ProxyAgent } from "undici";
import { ChannelKind } from "../types";
import type { ProxyEndpoint, ProxyPool } from "./proxy-pool";
import { httpGet } from "./utils";

/** One concrete way of issuing an outbound fetch */
export interface Channel {
  readonly kind: ChannelKind;
  describe(): string;
  fetch(url: string, signal?: AbortSignal): Promise<string>;
  /** Move to a fresh identity (next proxy). Absent when the channel has none. */
  rotate?(): void;
}

export class DirectChannel implements Channel {
  readonly kind = ChannelKind.DIRECT;

  constructor(private readonly timeoutMs?: number) {}

  describe(): string {
    return "direct";
  }

  fetch(url: string, signal?: AbortSignal): Promise<string> {
    return httpGet(url, { timeoutMs: this.timeoutMs, signal });
  }
}

/**
 * Bound to one proxy of the pool at a time. A 403/429 is surfaced as-is;
 * the retry layer decides when to call rotate().
 */
export class ProxyChannel implements Channel {
  readonly kind = ChannelKind.PROXY;
  private current: ProxyEndpoint;
  private agent: ProxyAgent;

  constructor(
    private readonly pool: ProxyPool,
    private readonly timeoutMs?: number
  ) {
    this.current = pool.next();
    this.agent = new ProxyAgent(this.current.endpoint);
  }

  get endpoint(): string {
    return this.current.endpoint;
  }

  describe(): string {
    return `proxy ${this.current.endpoint}`;
  }

  fetch(url: string, signal?: AbortSignal): Promise<string> {
    return httpGet(url, { timeoutMs: this.timeoutMs, signal, dispatcher: this.agent });
  }

  rotate(): void {
    const previous = this.agent;
    this.current = this.pool.next();
    this.agent = new ProxyAgent(this.current.endpoint);
    previous.close().catch((err: unknown) => {
      console.warn("[proxy] Failed to close proxy agent:", err instanceof Error ? err.message : err);
    });
    console.log(`[proxy] Rotated to ${this.current.endpoint}`);
  }
}
