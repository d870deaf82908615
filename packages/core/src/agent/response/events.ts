// packages/core/src/agent/response/events.ts
import type { DisplayLink, ProcessedResponse, ProductCard, PurchaseIntentData } from "./annotations.js";

export type UiEvent =
  | { type: "product_cards"; cards: ProductCard[] }
  | { type: "purchase_intent"; data: PurchaseIntentData }
  | { type: "comparison"; data: string }
  | { type: "display_links"; links: DisplayLink[] };

/**
 * Transport events for one response, in dispatch order.
 * Plain links are only sent when the turn produced no product cards.
 */
export function toUiEvents(res: ProcessedResponse): UiEvent[] {
  const events: UiEvent[] = [];

  if (res.productCards.length > 0) events.push({ type: "product_cards", cards: res.productCards });
  if (res.purchaseIntentData) events.push({ type: "purchase_intent", data: res.purchaseIntentData });
  if (res.comparisonData) events.push({ type: "comparison", data: res.comparisonData });
  if (res.linksToDisplay.length > 0 && res.productCards.length === 0) {
    events.push({ type: "display_links", links: res.linksToDisplay });
  }

  return events;
}
