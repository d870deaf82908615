import { describe, it, expect } from "vitest";
import { processResponse } from "@echobuy/core";
import { renderEvents, renderUiEvent } from "./render.js";

describe("renderUiEvent", () => {
  it("prints a card with its features and link", () => {
    expect(
      renderUiEvent({
        type: "product_cards",
        cards: [
          {
            name: "Desk Lamp",
            url: "https://www.amazon.com/dp/A1",
            price: "$30",
            rating: "4.2/5 stars",
            feature1: "Dimmable",
            feature2: "",
            imageHint: "white lamp",
          },
        ],
      })
    ).toEqual(["[card] Desk Lamp | $30 | 4.2/5 stars", "       Dimmable", "       https://www.amazon.com/dp/A1"]);
  });

  it("prints links one per line", () => {
    expect(
      renderUiEvent({
        type: "display_links",
        links: [
          { name: "Lamp A", url: "https://www.amazon.com/dp/A" },
          { name: "Lamp B", url: "https://www.amazon.com/dp/B" },
        ],
      })
    ).toEqual(["[link] Lamp A: https://www.amazon.com/dp/A", "[link] Lamp B: https://www.amazon.com/dp/B"]);
  });
});

describe("renderEvents", () => {
  it("renders a processed reply in event order", () => {
    const res = processResponse(
      "Good pick! [COMPARE_PRODUCTS: A is brighter than B] [PURCHASE_INTENT: Lamp A | https://www.amazon.com/dp/A | $25]"
    );

    expect(renderEvents(res)).toEqual([
      "[buy] Lamp A | $25",
      "       https://www.amazon.com/dp/A",
      "[compare] A is brighter than B",
    ]);
  });
});
