// packages/integrations-search/src/tools.ts
import { z } from "zod";
import { errorMessage, fail, ok, type ToolSpec } from "@echobuy/core";
import type { BraveClient } from "./client.js";

export const WebSearchInput = z.object({
  query: z.string().min(1),
  count: z.number().int().min(1).max(20).optional(),
});

export function searchTools(deps: { client: Pick<BraveClient, "search"> }): ToolSpec[] {
  const webSearch: ToolSpec<typeof WebSearchInput> = {
    id: "web_search",
    category: "web_search",
    description:
      "Search the web. Use it to find Amazon product pages: include 'amazon' and the product type, brand or budget in the query.",
    input: WebSearchInput,
    async run(ctx, input) {
      try {
        return ok(await deps.client.search(input, ctx.signal));
      } catch (e) {
        if (ctx.debug) console.log("[brave] search failed:", errorMessage(e));
        return fail("SEARCH_FAILED", errorMessage(e));
      }
    },
  };

  return [webSearch];
}
