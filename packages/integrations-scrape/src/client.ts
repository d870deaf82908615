// packages/integrations-scrape/src/client.ts
import { z } from "zod";
import { fetchJson, redact } from "@echobuy/core";

export type FirecrawlClientOptions = {
  apiKey: string;
  url: string;
  timeoutMs: number;
  retries: number;
  debug?: boolean;
};

const ScrapeResponseSchema = z.object({
  success: z.boolean(),
  data: z.object({ markdown: z.string().optional() }).optional(),
  error: z.string().optional(),
});

export type FirecrawlClient = ReturnType<typeof createFirecrawlClient>;

export function createFirecrawlClient(opts: FirecrawlClientOptions) {
  const apiKey = opts.apiKey.trim();
  const endpoint = opts.url.trim();

  if (!apiKey) throw new Error("Missing FIRECRAWL_API_KEY in .env");
  if (!endpoint) throw new Error("Missing FIRECRAWL_API_URL in .env");

  if (opts.debug) {
    console.log("[firecrawl url]", endpoint);
    console.log("[firecrawl key]", redact(apiKey));
  }

  return {
    /** Main-content markdown of one page. */
    async scrape(url: string, signal?: AbortSignal): Promise<string> {
      const raw = await fetchJson(endpoint, {
        label: "firecrawl",
        method: "POST",
        headers: { authorization: `Bearer ${apiKey}` },
        body: { url, formats: ["markdown"], onlyMainContent: true },
        timeoutMs: opts.timeoutMs,
        retries: opts.retries,
        signal,
        debug: opts.debug,
      });

      const parsed = ScrapeResponseSchema.safeParse(raw);
      if (!parsed.success) throw new Error("firecrawl returned an unexpected response shape");
      if (!parsed.data.success) throw new Error(parsed.data.error ?? "firecrawl could not scrape the page");

      return parsed.data.data?.markdown ?? "";
    },
  };
}
