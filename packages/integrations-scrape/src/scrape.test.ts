import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFirecrawlClient } from "./client.js";
import { scrapeTools } from "./tools.js";

const fetchMock = vi.fn<typeof fetch>();

describe("firecrawl client", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const client = () =>
    createFirecrawlClient({
      apiKey: "test-firecrawl-key",
      url: "https://scrape.example.test/v1/scrape",
      timeoutMs: 1000,
      retries: 0,
    });

  it("posts the page url and returns its markdown", async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ success: true, data: { markdown: "# Desk Lamp", metadata: {} } }))
    );

    expect(await client().scrape("https://www.amazon.com/dp/A1")).toBe("# Desk Lamp");

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(
      JSON.stringify({ url: "https://www.amazon.com/dp/A1", formats: ["markdown"], onlyMainContent: true })
    );
    expect(init?.headers).toMatchObject({ authorization: "Bearer test-firecrawl-key" });
  });

  it("throws when the service reports a failure", async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ success: false, error: "blocked" })));
    await expect(client().scrape("https://www.amazon.com/dp/A1")).rejects.toThrow("blocked");
  });
});

describe("batch_scrape tool", () => {
  it("scrapes pages in order and reports failures inline", async () => {
    const scrape = vi.fn(async (url: string) => {
      if (url.endsWith("B")) throw new Error("timeout");
      return `content of ${url}`;
    });
    const [tool] = scrapeTools({ client: { scrape } });

    const out = await tool.run(
      { account: "test-account" },
      { urls: ["https://www.amazon.com/dp/A", "https://www.amazon.com/dp/B"] }
    );

    expect(out).toEqual({
      ok: true,
      data: [
        { url: "https://www.amazon.com/dp/A", content: "content of https://www.amazon.com/dp/A" },
        { url: "https://www.amazon.com/dp/B", content: "", error: "timeout" },
      ],
    });
    expect(scrape.mock.calls.map((c) => c[0])).toEqual(["https://www.amazon.com/dp/A", "https://www.amazon.com/dp/B"]);
  });

  it("fails when every page fails", async () => {
    const [tool] = scrapeTools({ client: { scrape: vi.fn().mockRejectedValue(new Error("down")) } });

    const out = await tool.run({ account: "test-account" }, { urls: ["https://www.amazon.com/dp/A"] });

    expect(out.ok).toBe(false);
    expect(!out.ok && out.error).toEqual({
      code: "SCRAPE_FAILED",
      message: "All 1 pages failed to scrape",
      details: [{ url: "https://www.amazon.com/dp/A", content: "", error: "down" }],
    });
  });

  it("accepts one to five urls", () => {
    const [tool] = scrapeTools({ client: { scrape: vi.fn() } });
    expect(tool.input.safeParse({ urls: [] }).success).toBe(false);
    expect(tool.input.safeParse({ urls: Array(6).fill("https://www.amazon.com/dp/A") }).success).toBe(false);
    expect(tool.input.safeParse({ urls: ["not a url"] }).success).toBe(false);
  });
});
