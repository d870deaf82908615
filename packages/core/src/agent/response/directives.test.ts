import { describe, it, expect } from "vitest";
import { scanDirectives, splitFields, stripDirectives } from "./directives.js";

describe("scanDirectives", () => {
  it("reports tag, body and span", () => {
    expect(scanDirectives("x [DISPLAY_LINK: n | u] y")).toEqual([
      { tag: "DISPLAY_LINK", body: " n | u", start: 2, end: 23, terminated: true },
    ]);
  });

  it("ignores brackets that do not open a known tag", () => {
    expect(scanDirectives("[note] [PRODUCT_CARDS: x]")).toEqual([]);
  });
});

describe("stripDirectives", () => {
  it("removes every span and keeps the text between them", () => {
    expect(stripDirectives("a[COMPARE_PRODUCTS: x]b[PURCHASE_INTENT: p|u|$1]c")).toBe("abc");
  });
});

describe("splitFields", () => {
  it("trims and folds the overflow into the last field", () => {
    expect(splitFields(" a | b | c | d ", 2)).toEqual(["a", "b | c | d"]);
    expect(splitFields("a|b", 7)).toEqual(["a", "b"]);
  });
});
