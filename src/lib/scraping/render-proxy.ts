import { config } from "../config";
import { ChannelKind } from "../types";
import type { Channel } from "./channels";
import { FetchError, FetchErrorKind, isRateLimited } from "./errors";
import { delay, httpGet } from "./utils";

/**
 * Round-robin cursor over the render-proxy API keys. One ring is shared by
 * every channel and worker of a run. Each call claims one start offset and
 * walks the keys from there, so concurrent calls never disturb each other's
 * sequence.
 */
export class KeyRing {
  private readonly keys: string[];
  private cursor = 0;

  constructor(keys: string[]) {
    this.keys = [...keys];
  }

  get size(): number {
    return this.keys.length;
  }

  /** Advances the shared cursor by one and returns the offset it held */
  claimStart(): number {
    if (this.keys.length === 0) {
      throw new FetchError(FetchErrorKind.CREDENTIALS_EXHAUSTED, "No render-proxy API keys configured");
    }
    const start = this.cursor;
    this.cursor = (this.cursor + 1) % this.keys.length;
    return start;
  }

  keyAt(offset: number): string {
    return this.keys[offset % this.keys.length];
  }
}

export interface RenderProxyOptions {
  endpoint?: string;
  timeoutMs?: number;
  /** pause before trying the next key after a 403/429 */
  keySwitchDelayMs?: number;
  renderJs?: boolean;
}

export function buildRenderProxyUrl(endpoint: string, apiKey: string, targetUrl: string, renderJs = false): string {
  const params = new URLSearchParams({
    api_key: apiKey,
    url: targetUrl,
    render_js: String(renderJs),
  });
  return `${endpoint}?${params.toString()}`;
}

/**
 * Fetches through the third-party rendering API. A 403/429 from the API
 * means the key is spent or blocked, so the next key is tried; each key is
 * tried at most once per call.
 */
export class RenderProxyChannel implements Channel {
  readonly kind = ChannelKind.RENDER_PROXY;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly keySwitchDelayMs: number;
  private readonly renderJs: boolean;

  constructor(
    private readonly keys: KeyRing,
    options: RenderProxyOptions = {}
  ) {
    this.endpoint = options.endpoint ?? config.renderProxyEndpoint;
    this.timeoutMs = options.timeoutMs ?? config.renderProxyTimeoutMs;
    this.keySwitchDelayMs = options.keySwitchDelayMs ?? 500;
    this.renderJs = options.renderJs ?? false;
  }

  describe(): string {
    return `render-proxy (${this.keys.size} keys)`;
  }

  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    const total = this.keys.size;
    const start = this.keys.claimStart();

    for (let attempt = 1; attempt <= total; attempt++) {
      const apiKey = this.keys.keyAt(start + attempt - 1);
      try {
        return await httpGet(buildRenderProxyUrl(this.endpoint, apiKey, url, this.renderJs), {
          timeoutMs: this.timeoutMs,
          signal,
        });
      } catch (error) {
        if (!isRateLimited(error)) {
          throw rewriteUrl(error, url);
        }
        console.warn(
          `[render-proxy] API key ${attempt}/${total} exhausted or blocked (${error instanceof FetchError ? error.status : "?"}), switching key`
        );
        if (attempt < total) await delay(this.keySwitchDelayMs, signal);
      }
    }

    throw new FetchError(
      FetchErrorKind.CREDENTIALS_EXHAUSTED,
      `All ${total} render-proxy API keys exhausted for ${url}`,
      { url }
    );
  }
}

/** Errors carry the proxied URL (with the key in it); report the target instead */
function rewriteUrl(error: unknown, url: string): unknown {
  if (!(error instanceof FetchError)) return error;
  const message =
    error.kind === FetchErrorKind.HTTP_STATUS
      ? `Render proxy returned HTTP ${error.status} for ${url}`
      : `Render proxy request failed for ${url}`;
  return new FetchError(error.kind, message, { url, status: error.status, cause: error });
}
