import { describe, it, expect, vi, beforeEach } from "vitest";
import { httpGet } from "../src/http.js";
import { TransportError } from "../src/errors.js";

const okResponse = (body: unknown, init: ResponseInit = { status: 200 }): Response =>
  new Response(JSON.stringify(body), { headers: { "content-type": "application/json" }, ...init });

describe("httpGet", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("returns response on success and sets user-agent", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(okResponse({ hello: "world" }));
    const res = await httpGet("https://example.com/api");
    expect(res.ok).toBe(true);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const args = fetchSpy.mock.calls[0][1];
    const headers = args?.headers as Record<string, string>;
    expect(headers).toEqual({ accept: "application/json", "user-agent": "sdk-downloads-report/0.1.0" });
  });

  it("returns non-2xx responses without throwing", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("nope", { status: 404 }));
    const res = await httpGet("https://example.com/missing");
    expect(res.status).toBe(404);
  });

  it("does not retry a failed request", async () => {
    const fetchSpy = vi
      .spyOn(globalThis, "fetch")
      .mockRejectedValueOnce(new Error("network"))
      .mockResolvedValueOnce(okResponse({ ok: true }));
    await expect(httpGet("https://example.com/x")).rejects.toThrow("request failed: network");
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("wraps non-Error rejections in a TransportError", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValueOnce("boom");
    const err = await httpGet("https://x.test/").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect((err as TransportError).url).toBe("https://x.test/");
  });

  it("aborts on timeout and throws", async () => {
    vi.useFakeTimers();
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation((_input, init) => {
      const signal = init?.signal ?? undefined;
      return new Promise<Response>((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("AbortError")));
      });
    });
    const p = httpGet("https://slow.example.com", { timeoutMs: 10 });
    vi.advanceTimersByTime(20);
    await expect(p).rejects.toThrow("request timed out after 10ms: https://slow.example.com");
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    vi.useRealTimers();
  });
});
