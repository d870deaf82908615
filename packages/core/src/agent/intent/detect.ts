// packages/core/src/agent/intent/detect.ts

export type Intent = {
  purchaseIntent: boolean;
  comparisonRequest: boolean;
  budgetMentioned: number | null;
};

const PURCHASE_KEYWORDS = ["buy", "purchase", "order", "i want", "i'll take", "add to cart", "checkout"];
const COMPARISON_KEYWORDS = ["compare", "difference", "which is better", "vs", "versus"];

// Priority order: the first pattern that matches wins.
const BUDGET_PATTERNS = [/\$(\d+)/, /under (\d+)/, /budget.*?(\d+)/, /spend.*?(\d+)/];

export function parseBudget(text: string): number | null {
  const t = text.toLowerCase();
  for (const re of BUDGET_PATTERNS) {
    const m = t.match(re);
    if (m) return Number(m[1]);
  }
  return null;
}

/**
 * Keyword/regex intent detection on a raw utterance.
 * Plain substring matching, so "order" also fires on "border".
 */
export function detectIntent(utterance: string): Intent {
  const t = utterance.toLowerCase();
  return {
    purchaseIntent: PURCHASE_KEYWORDS.some((k) => t.includes(k)),
    comparisonRequest: COMPARISON_KEYWORDS.some((k) => t.includes(k)),
    budgetMentioned: parseBudget(t),
  };
}
