import { describe, it, expect } from "vitest";
import { extractProduct, extractProductBatch } from "./extract.js";

const MOUSE_PAGE = [
  "Amazon.com: Wireless Mouse | Electronics",
  "Price: $19.99",
  "4.5 out of 5 stars",
  "Features:",
  "• Silent clicks for quiet offices",
  "• Rechargeable battery lasts 70 days",
  "* Ergonomic shape for all day use",
  "• Fourth feature line here",
  "Prime eligible with free delivery",
].join("\n");

describe("extractProduct", () => {
  it("pulls name, price, rating, features and prime from a product page", () => {
    const r = extractProduct("https://www.amazon.com/dp/B0TEST", MOUSE_PAGE);
    expect(r.status).toBe("ok");
    expect(r.product).toEqual({
      url: "https://www.amazon.com/dp/B0TEST",
      name: "Wireless Mouse",
      price: "$19.99",
      rating: "4.5/5 stars",
      keyFeatures: [
        "Silent clicks for quiet offices",
        "Rechargeable battery lasts 70 days",
        "Ergonomic shape for all day use",
      ],
      availability: "Check Amazon",
      primeEligible: true,
    });
  });

  it("falls back to the 'dollars' and bare 'stars' patterns", () => {
    const { product } = extractProduct("https://www.amazon.com/dp/B1", "Now only 25 dollars. Rated 4 stars.");
    expect(product.name).toBe("Amazon Product");
    expect(product.price).toBe("$25");
    expect(product.rating).toBe("4/5 stars");
  });

  it("reads 'Rating: N'", () => {
    expect(extractProduct("u", "Rating: 3.8").product.rating).toBe("3.8/5 stars");
  });

  it("keeps sentinels when nothing matches", () => {
    const { product } = extractProduct("u", "Just some words");
    expect(product.price).toBe("Price not found");
    expect(product.rating).toBe("Rating not found");
    expect(product.keyFeatures).toEqual([]);
    expect(product.primeEligible).toBe(false);
  });

  it("only looks for bullets on pages that mention features or specifications", () => {
    expect(extractProduct("u", "• A long bullet line without the keyword").product.keyFeatures).toEqual([]);
  });

  it("needs eligible or free next to prime", () => {
    expect(extractProduct("u", "Prime members only").product.primeEligible).toBe(false);
  });

  it("degrades instead of throwing on non-text content", () => {
    const r = extractProduct("https://www.amazon.com/dp/B2", 42);
    expect(r).toEqual({
      status: "degraded",
      reason: "content is number, expected text",
      product: {
        url: "https://www.amazon.com/dp/B2",
        name: "Amazon Product",
        price: "See Amazon",
        rating: "N/A",
        keyFeatures: [],
        availability: "Check Amazon",
        primeEligible: false,
      },
    });
  });
});

describe("extractProductBatch", () => {
  it("keys products by position and skips blocks without a url", () => {
    const batch = extractProductBatch({
      ok: true,
      data: [
        { url: "https://www.amazon.com/dp/A1", content: "Amazon.com: Desk Lamp | Home $30" },
        { content: "no url here" },
        { url: "https://www.amazon.com/dp/A3", content: null },
        { url: "https://www.amazon.com/dp/A4", content: "", error: "HTTP 500" },
      ],
    });

    expect(Object.keys(batch.products)).toEqual(["product_1", "product_3", "product_4"]);
    expect(batch.products.product_1.name).toBe("Desk Lamp");
    expect(batch.products.product_1.price).toBe("$30");
    expect(batch.skipped).toEqual([{ index: 1, reason: "block has no url" }]);
    expect(batch.results.map((r) => r.status)).toEqual(["ok", "degraded", "degraded"]);

    const failed = batch.results[2];
    expect(failed.status === "degraded" && failed.reason).toBe("scrape failed: HTTP 500");
  });

  it("returns an empty batch for an unexpected payload", () => {
    expect(extractProductBatch("oops")).toEqual({ products: {}, results: [], skipped: [] });
  });
});
