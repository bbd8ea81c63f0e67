import { config } from "../config";
import { fetch as undiciFetch, type Dispatcher } from "undici";
import { FetchError, FetchErrorKind, cancelledError, httpStatusError } from "./errors";

/** Sleep that rejects with a cancelled FetchError as soon as the signal aborts */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw cancelledError();
  if (ms <= 0) return;
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface HttpGetOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  dispatcher?: Dispatcher;
  headers?: Record<string, string>;
}

/**
 * Single GET with no retry. Non-2xx becomes an http_status FetchError,
 * anything else thrown by undici a network one.
 */
export async function httpGet(url: string, options: HttpGetOptions = {}): Promise<string> {
  const { timeoutMs = config.requestTimeoutMs, signal, dispatcher, headers } = options;
  if (signal?.aborted) throw cancelledError(url);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await undiciFetch(url, {
      headers: {
        "User-Agent": config.getRandomUserAgent(),
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
        ...headers,
      },
      signal: controller.signal,
      dispatcher,
    });

    if (!response.ok) {
      // release the connection before reporting
      await response.body?.cancel();
      throw httpStatusError(url, response.status);
    }
    return await response.text();
  } catch (error: unknown) {
    if (error instanceof FetchError) throw error;
    if (signal?.aborted) throw cancelledError(url);
    if (error instanceof Error && error.name === "AbortError") {
      throw new FetchError(FetchErrorKind.NETWORK, `Timed out after ${timeoutMs}ms: ${url}`, {
        url,
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new FetchError(FetchErrorKind.NETWORK, `${message}: ${url}`, { url, cause: error });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}

/** "apple-phones-48.php" -> "apple-phones-48" */
export function stripPhpExtension(href: string): string {
  return href.replace(/\.php$/, "");
}

/** Last path segment of a link target, without the .php extension */
export function pathIdentifier(href: string): string {
  const path = href.split(/[?#]/)[0] ?? "";
  const segments = path.split("/").filter((s) => s.length > 0);
  return stripPhpExtension(segments[segments.length - 1] ?? "");
}

export function resolveUrl(href: string, baseUrl: string = config.siteBaseUrl): string {
  if (/^https?:\/\//i.test(href)) return href;
  if (href.startsWith("//")) return `https:${href}`;
  return `${baseUrl.replace(/\/+$/, "")}/${href.replace(/^\/+/, "")}`;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
