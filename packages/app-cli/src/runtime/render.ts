// packages/app-cli/src/runtime/render.ts
import { toUiEvents, type ProcessedResponse, type UiEvent } from "@echobuy/core";

const INDENT = "       ";

/** Terminal lines for one UI event. */
export function renderUiEvent(event: UiEvent): string[] {
  switch (event.type) {
    case "product_cards":
      return event.cards.flatMap((c) => {
        const features = [c.feature1, c.feature2].filter(Boolean);
        return [
          `[card] ${c.name} | ${c.price} | ${c.rating}`,
          ...(features.length > 0 ? [`${INDENT}${features.join("; ")}`] : []),
          `${INDENT}${c.url}`,
        ];
      });
    case "purchase_intent":
      return [`[buy] ${event.data.productName} | ${event.data.price}`, `${INDENT}${event.data.url}`];
    case "comparison":
      return [`[compare] ${event.data}`];
    case "display_links":
      return event.links.map((l) => `[link] ${l.name}: ${l.url}`);
  }
}

export function renderEvents(res: ProcessedResponse): string[] {
  return toUiEvents(res).flatMap(renderUiEvent);
}
