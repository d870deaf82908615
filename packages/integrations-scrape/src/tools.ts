// packages/integrations-scrape/src/tools.ts
import { z } from "zod";
import { errorMessage, fail, ok, type ToolSpec } from "@echobuy/core";
import type { FirecrawlClient } from "./client.js";

export const MAX_BATCH_URLS = 5;

export const BatchScrapeInput = z.object({
  urls: z.array(z.string().url()).min(1).max(MAX_BATCH_URLS),
});

export type ScrapedPage = {
  url: string;
  content: string;
  error?: string;
};

export function scrapeTools(deps: { client: Pick<FirecrawlClient, "scrape"> }): ToolSpec[] {
  const batchScrape: ToolSpec<typeof BatchScrapeInput, ScrapedPage[]> = {
    id: "batch_scrape",
    category: "page_scrape",
    description:
      "Fetch the text of up to 5 product pages (use the links web_search returned) to read name, price, rating and features.",
    input: BatchScrapeInput,
    async run(ctx, input) {
      const pages: ScrapedPage[] = [];

      // One page at a time; a failed page is reported inline.
      for (const url of input.urls) {
        try {
          pages.push({ url, content: await deps.client.scrape(url, ctx.signal) });
        } catch (e) {
          if (ctx.debug) console.log(`[firecrawl] ${url} failed:`, errorMessage(e));
          pages.push({ url, content: "", error: errorMessage(e) });
        }
      }

      if (pages.every((p) => p.error !== undefined)) {
        return fail("SCRAPE_FAILED", `All ${pages.length} pages failed to scrape`, pages);
      }
      return ok(pages);
    },
  };

  return [batchScrape];
}
