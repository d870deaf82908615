import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createBraveClient } from "./client.js";
import { searchTools } from "./tools.js";

const fetchMock = vi.fn<typeof fetch>();

const client = () =>
  createBraveClient({
    apiKey: "test-brave-key",
    url: "https://search.example.test/web",
    timeoutMs: 1000,
    retries: 0,
  });

describe("brave client", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requires an api key", () => {
    expect(() => createBraveClient({ apiKey: " ", url: "https://x.test", timeoutMs: 1, retries: 0 })).toThrow(
      "Missing BRAVE_API_KEY in .env"
    );
  });

  it("queries with the subscription token and keeps results that have a url", async () => {
    fetchMock.mockResolvedValue(
      new Response(
        JSON.stringify({
          web: {
            results: [
              { title: "Lamp", url: "https://www.amazon.com/dp/A1", description: "A lamp", extra: true },
              { title: "No link" },
              { url: "https://www.amazon.com/dp/A2" },
            ],
          },
        })
      )
    );

    const out = await client().search({ query: "desk lamp", count: 3 });

    expect(out).toEqual({
      web: {
        results: [
          { title: "Lamp", url: "https://www.amazon.com/dp/A1", description: "A lamp" },
          { title: "", url: "https://www.amazon.com/dp/A2", description: "" },
        ],
      },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://search.example.test/web?q=desk+lamp&count=3");
    expect(init?.headers).toMatchObject({ "x-subscription-token": "test-brave-key" });
  });

  it("treats a reply without web results as empty", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ type: "search" })));
    expect(await client().search({ query: "x" })).toEqual({ web: { results: [] } });
  });
});

describe("web_search tool", () => {
  it("returns the search payload", async () => {
    const search = vi.fn().mockResolvedValue({ web: { results: [] } });
    const [tool] = searchTools({ client: { search } });

    expect(tool.id).toBe("web_search");
    expect(tool.category).toBe("web_search");
    expect(await tool.run({ account: "test-account" }, { query: "lamp" })).toEqual({
      ok: true,
      data: { web: { results: [] } },
    });
    expect(search).toHaveBeenCalledWith({ query: "lamp" }, undefined);
  });

  it("reports a failed search as a result", async () => {
    const search = vi.fn().mockRejectedValue(new Error("brave HTTP 500: oops"));
    const [tool] = searchTools({ client: { search } });

    expect(await tool.run({ account: "test-account" }, { query: "lamp" })).toEqual({
      ok: false,
      error: { code: "SEARCH_FAILED", message: "brave HTTP 500: oops" },
    });
  });

  it("validates its input", () => {
    const [tool] = searchTools({ client: { search: vi.fn() } });
    expect(tool.input.safeParse({ query: "" }).success).toBe(false);
    expect(tool.input.safeParse({ query: "lamp", count: 5 }).success).toBe(true);
  });
});
