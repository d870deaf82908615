// packages/integrations-search/src/client.ts
import { z } from "zod";
import { fetchJson, redact } from "@echobuy/core";

export type BraveClientOptions = {
  apiKey: string;
  url: string;
  timeoutMs: number;
  retries: number;
  debug?: boolean;
};

export type BraveSearchParams = {
  query: string;
  count?: number;
};

export type BraveWebResult = {
  title: string;
  url: string;
  description: string;
};

export type BraveSearchResponse = {
  web: { results: BraveWebResult[] };
};

const ResponseSchema = z.object({
  web: z.object({ results: z.array(z.unknown()) }).optional(),
});

const ResultSchema = z.object({
  title: z.string().default(""),
  url: z.string().min(1),
  description: z.string().default(""),
});

export type BraveClient = ReturnType<typeof createBraveClient>;

export function createBraveClient(opts: BraveClientOptions) {
  const apiKey = opts.apiKey.trim();
  const url = opts.url.trim();

  if (!apiKey) throw new Error("Missing BRAVE_API_KEY in .env");
  if (!url) throw new Error("Missing BRAVE_API_URL in .env");

  if (opts.debug) {
    console.log("[brave url]", url);
    console.log("[brave key]", redact(apiKey));
  }

  return {
    async search(params: BraveSearchParams, signal?: AbortSignal): Promise<BraveSearchResponse> {
      const u = new URL(url);
      u.searchParams.set("q", params.query);
      u.searchParams.set("count", String(params.count ?? 10));

      const raw = await fetchJson(u.toString(), {
        label: "brave",
        headers: { "x-subscription-token": apiKey },
        timeoutMs: opts.timeoutMs,
        retries: opts.retries,
        signal,
        debug: opts.debug,
      });

      const parsed = ResponseSchema.safeParse(raw);
      if (!parsed.success) throw new Error("brave returned an unexpected response shape");

      // Entries without a url are of no use downstream.
      const results: BraveWebResult[] = [];
      for (const item of parsed.data.web?.results ?? []) {
        const r = ResultSchema.safeParse(item);
        if (r.success) results.push(r.data);
      }
      return { web: { results } };
    },
  };
}
