// packages/core/src/agent/response/annotations.ts
import { scanDirectives, splitFields, stripDirectives } from "./directives.js";
import { optimizeForVoice } from "./voice.js";

export type DisplayLink = { name: string; url: string };

export type ProductCard = {
  name: string;
  url: string;
  price: string;
  rating: string;
  feature1: string;
  feature2: string;
  imageHint: string;
};

export type PurchaseIntentData = { productName: string; url: string; price: string };

export type ProcessedResponse = {
  spokenText: string;
  linksToDisplay: DisplayLink[];
  productCards: ProductCard[];
  comparisonData: string | null;
  purchaseIntentData: PurchaseIntentData | null;
};

export type Annotations = Omit<ProcessedResponse, "spokenText"> & {
  /** Raw text with every directive removed, before voice rewriting. */
  strippedText: string;
};

const nonEmpty = (fields: string[], n: number) => fields.slice(0, n).every((f) => f.length > 0);

/**
 * Extracts every directive from one model reply.
 * Cards and links accumulate; for comparison and purchase intent the last
 * well-formed occurrence wins. Malformed directives are removed from the
 * text but yield nothing.
 */
export function parseAnnotations(raw: string): Annotations {
  const spans = scanDirectives(raw);
  const out: Annotations = {
    strippedText: stripDirectives(raw, spans),
    linksToDisplay: [],
    productCards: [],
    comparisonData: null,
    purchaseIntentData: null,
  };

  for (const span of spans) {
    if (!span.terminated) continue;

    switch (span.tag) {
      case "DISPLAY_LINK": {
        const f = splitFields(span.body, 2);
        if (f.length === 2 && nonEmpty(f, 2)) out.linksToDisplay.push({ name: f[0], url: f[1] });
        break;
      }
      case "PRODUCT_CARD": {
        const f = splitFields(span.body, 7);
        if (f.length < 4 || !nonEmpty(f, 4)) break;
        out.productCards.push({
          name: f[0],
          url: f[1],
          price: f[2],
          rating: f[3],
          feature1: f[4] ?? "",
          feature2: f[5] ?? "",
          imageHint: f[6] ?? "",
        });
        break;
      }
      case "COMPARE_PRODUCTS": {
        const body = span.body.trim();
        if (body) out.comparisonData = body;
        break;
      }
      case "PURCHASE_INTENT": {
        const f = splitFields(span.body, 3);
        if (f.length === 3 && nonEmpty(f, 3)) {
          out.purchaseIntentData = { productName: f[0], url: f[1], price: f[2] };
        }
        break;
      }
    }
  }

  return out;
}

export function processResponse(raw: string): ProcessedResponse {
  const { strippedText, ...directives } = parseAnnotations(raw);
  return { spokenText: optimizeForVoice(strippedText), ...directives };
}
