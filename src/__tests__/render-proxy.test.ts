import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetch as undiciFetch } from "undici";
import { KeyRing, RenderProxyChannel, buildRenderProxyUrl } from "../lib/scraping/render-proxy";
import { FetchErrorKind } from "../lib/scraping/errors";
import { withRetry } from "../lib/scraping/retry";

const mockFetch = undiciFetch as ReturnType<typeof vi.fn>;
const ENDPOINT = "https://render.example.test/api/v1/";
const TARGET = "https://site.test/acme_x1-100.php";

function respond(status: number, body = "") {
  return { ok: status >= 200 && status < 300, status, text: () => Promise.resolve(body) };
}

function keyOf(call: unknown[]): string | null {
  return new URL(String(call[0])).searchParams.get("api_key");
}

describe("buildRenderProxyUrl", () => {
  it("encodes key, target and render flag", () => {
    expect(buildRenderProxyUrl(ENDPOINT, "test-key-1", "https://site.test/a b.php")).toBe(
      "https://render.example.test/api/v1/?api_key=test-key-1&url=https%3A%2F%2Fsite.test%2Fa+b.php&render_js=false"
    );
  });
});

describe("KeyRing", () => {
  it("hands out start offsets round-robin", () => {
    const ring = new KeyRing(["a", "b", "c"]);
    expect([ring.claimStart(), ring.claimStart(), ring.claimStart(), ring.claimStart()]).toEqual([0, 1, 2, 0]);
  });

  it("wraps key offsets past the end", () => {
    const ring = new KeyRing(["a", "b", "c"]);
    expect([ring.keyAt(1), ring.keyAt(3), ring.keyAt(5)]).toEqual(["b", "a", "c"]);
  });

  it("throws credentials_exhausted when empty", () => {
    let error: unknown;
    try {
      new KeyRing([]).claimStart();
    } catch (e) {
      error = e;
    }
    expect(error).toMatchObject({ kind: FetchErrorKind.CREDENTIALS_EXHAUSTED });
  });
});

describe("RenderProxyChannel", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns the body from the first working key", async () => {
    mockFetch.mockResolvedValue(respond(200, "<html>ok</html>"));
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1"]), { endpoint: ENDPOINT, keySwitchDelayMs: 0 });

    await expect(channel.fetch(TARGET)).resolves.toBe("<html>ok</html>");
    expect(new URL(String(mockFetch.mock.calls[0][0])).searchParams.get("url")).toBe(TARGET);
  });

  it("switches key on 429", async () => {
    mockFetch.mockResolvedValueOnce(respond(429)).mockResolvedValueOnce(respond(200, "<html>second</html>"));
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1", "test-key-2"]), {
      endpoint: ENDPOINT,
      keySwitchDelayMs: 0,
    });

    await expect(channel.fetch(TARGET)).resolves.toBe("<html>second</html>");
    expect(mockFetch.mock.calls.map(keyOf)).toEqual(["test-key-1", "test-key-2"]);
  });

  it("gives up with credentials_exhausted after each key was tried once, even under retry", async () => {
    mockFetch.mockResolvedValue(respond(429));
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1", "test-key-2", "test-key-3"]), {
      endpoint: ENDPOINT,
      keySwitchDelayMs: 0,
    });

    await expect(withRetry(() => channel.fetch(TARGET), { maxAttempts: 3, baseDelayMs: 0 })).rejects.toMatchObject({
      kind: FetchErrorKind.CREDENTIALS_EXHAUSTED,
    });
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(new Set(mockFetch.mock.calls.map(keyOf)).size).toBe(3);
  });

  it("tries every key once per call when calls on one ring overlap", async () => {
    mockFetch.mockImplementation((input: unknown) =>
      Promise.resolve(keyOf([input]) === "test-key-1" ? respond(429) : respond(200, "<html>ok</html>"))
    );
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1", "test-key-2"]), {
      endpoint: ENDPOINT,
      keySwitchDelayMs: 0,
    });

    const results = await Promise.allSettled([
      channel.fetch("https://site.test/acme_x1-100.php"),
      channel.fetch("https://site.test/acme_x2-101.php"),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    expect(mockFetch.mock.calls.map(keyOf).sort()).toEqual(["test-key-1", "test-key-2", "test-key-2"]);
  });

  it("reports other statuses as http_status without the key in the message", async () => {
    mockFetch.mockResolvedValue(respond(500));
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1", "test-key-2"]), {
      endpoint: ENDPOINT,
      keySwitchDelayMs: 0,
    });

    const error = await channel.fetch(TARGET).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: FetchErrorKind.HTTP_STATUS, status: 500, url: TARGET });
    expect(error instanceof Error && error.message).toBe(`Render proxy returned HTTP 500 for ${TARGET}`);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("reports connection failures as network errors", async () => {
    mockFetch.mockRejectedValue(new Error("ECONNREFUSED"));
    const channel = new RenderProxyChannel(new KeyRing(["test-key-1"]), { endpoint: ENDPOINT, keySwitchDelayMs: 0 });

    await expect(channel.fetch(TARGET)).rejects.toMatchObject({ kind: FetchErrorKind.NETWORK, url: TARGET });
  });
});
