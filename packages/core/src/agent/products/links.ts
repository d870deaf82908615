// packages/core/src/agent/products/links.ts
import { z } from "zod";

export const MAX_PRODUCT_LINKS = 5;

export const NO_PRODUCTS_NOTICE =
  "No specific products found in this search. Let me try a different approach or get more details.";

const SearchPayloadSchema = z.object({
  data: z.object({
    web: z.object({ results: z.array(z.unknown()) }),
  }),
});

const ResultUrlSchema = z.object({ url: z.string() });

export function isProductDetailUrl(url: string): boolean {
  return (
    url.includes("amazon.com") &&
    (url.includes("/dp/") || url.includes("/gp/product/")) &&
    !url.includes("/s?") &&
    !url.includes("/b?")
  );
}

/** Drops the query string and any /ref=... referral suffix. */
export function canonicalProductUrl(url: string): string {
  return url.split("?")[0].split("/ref=")[0];
}

/**
 * Up to five unique product detail-page URLs from a web-search payload
 * (`{ data: { web: { results: [{ url }] } } }`), in first-seen order.
 */
export function extractProductLinks(payload: unknown, limit = MAX_PRODUCT_LINKS): string[] {
  const parsed = SearchPayloadSchema.safeParse(payload);
  if (!parsed.success) return [];

  const seen = new Set<string>();
  for (const item of parsed.data.data.web.results) {
    const r = ResultUrlSchema.safeParse(item);
    if (!r.success || !isProductDetailUrl(r.data.url)) continue;
    seen.add(canonicalProductUrl(r.data.url));
    if (seen.size >= limit) break;
  }
  return [...seen];
}

export type SearchToolContent = { links: string[] } | { message: string };

export function searchToolContent(payload: unknown): SearchToolContent {
  const links = extractProductLinks(payload);
  return links.length > 0 ? { links } : { message: NO_PRODUCTS_NOTICE };
}
