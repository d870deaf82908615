// packages/core/src/agent/products/extract.ts
import { z } from "zod";

export type Product = {
  url: string;
  name: string;
  price: string;
  rating: string;
  keyFeatures: string[];
  availability: string;
  primeEligible: boolean;
};

export type ExtractionResult =
  | { status: "ok"; product: Product }
  | { status: "degraded"; product: Product; reason: string };

export type ProductBatch = {
  /** product_1, product_2, ... by position in the scrape payload */
  products: Record<string, Product>;
  results: ExtractionResult[];
  /** Blocks that could not become a Product at all (no url). */
  skipped: Array<{ index: number; reason: string }>;
};

export const NAME_NOT_FOUND = "Amazon Product";
export const PRICE_NOT_FOUND = "Price not found";
export const RATING_NOT_FOUND = "Rating not found";
export const AVAILABILITY_UNKNOWN = "Check Amazon";

const PRICE_PATTERNS = [/\$(\d+\.?\d*)/i, /Price:\s*\$(\d+\.?\d*)/i, /(\d+\.?\d*)\s*dollars?/i];
const RATING_PATTERNS = [/(\d\.?\d*)\s*out of 5 stars/i, /Rating:\s*(\d\.?\d*)/i, /(\d\.?\d*)\s*stars?/i];
const FEATURE_LINE = /[•\-*]\s*([^•\-*\n]{10,100})/g;

function firstCapture(text: string, patterns: RegExp[]): string | null {
  for (const re of patterns) {
    const m = text.match(re);
    if (m?.[1]) return m[1];
  }
  return null;
}

function degradedProduct(url: string): Product {
  return {
    url,
    name: NAME_NOT_FOUND,
    price: "See Amazon",
    rating: "N/A",
    keyFeatures: [],
    availability: AVAILABILITY_UNKNOWN,
    primeEligible: false,
  };
}

/** Pulls a product record out of one page's scraped text. */
export function extractProduct(url: string, content: unknown): ExtractionResult {
  if (typeof content !== "string") {
    return { status: "degraded", product: degradedProduct(url), reason: `content is ${typeof content}, expected text` };
  }

  const lower = content.toLowerCase();
  const product: Product = {
    url,
    name: NAME_NOT_FOUND,
    price: PRICE_NOT_FOUND,
    rating: RATING_NOT_FOUND,
    keyFeatures: [],
    availability: AVAILABILITY_UNKNOWN,
    primeEligible: false,
  };

  if (content.includes("Amazon.com:")) {
    const m = content.match(/Amazon\.com:\s*([^|]+)/);
    if (m) product.name = m[1].trim();
  }

  const price = firstCapture(content, PRICE_PATTERNS);
  if (price) product.price = `$${price}`;

  const rating = firstCapture(content, RATING_PATTERNS);
  if (rating) product.rating = `${rating}/5 stars`;

  if (lower.includes("features") || lower.includes("specifications")) {
    product.keyFeatures = [...content.matchAll(FEATURE_LINE)].slice(0, 3).map((m) => m[1].trim());
  }

  product.primeEligible = lower.includes("prime") && (lower.includes("eligible") || lower.includes("free"));

  return { status: "ok", product };
}

const ScrapePayloadSchema = z.object({ data: z.array(z.unknown()) });
const BlockSchema = z.object({
  url: z.string().trim().min(1),
  content: z.unknown(),
  error: z.string().optional(),
});

/**
 * Runs extraction over a scrape payload shaped `{ data: [{ url, content, error? }, ...] }`.
 * Never throws: unusable blocks are skipped, unreadable content degrades to sentinels.
 */
export function extractProductBatch(payload: unknown): ProductBatch {
  const batch: ProductBatch = { products: {}, results: [], skipped: [] };

  const parsed = ScrapePayloadSchema.safeParse(payload);
  if (!parsed.success) return batch;

  parsed.data.data.forEach((raw, i) => {
    const block = BlockSchema.safeParse(raw);
    if (!block.success) {
      batch.skipped.push({ index: i, reason: "block has no url" });
      return;
    }
    const { url, content, error } = block.data;
    const result: ExtractionResult = error
      ? { status: "degraded", product: degradedProduct(url), reason: `scrape failed: ${error}` }
      : extractProduct(url, content === undefined ? "" : content);
    batch.results.push(result);
    batch.products[`product_${i + 1}`] = result.product;
  });

  return batch;
}
