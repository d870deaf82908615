// packages/core/src/agent/session/context.ts
import type { Intent } from "../intent/detect.js";
import type { Session } from "./state.js";

/** One-line session summary embedded in every system prompt of a turn. */
export function buildContextSummary(session: Session, intent: Intent): string {
  let out = "";
  if (session.budgetRange) out += `User budget: $${session.budgetRange}. `;
  if (session.productsViewed.length > 0) out += `Products discussed: ${session.productsViewed.length} items. `;
  if (intent.purchaseIntent) out += "User showing PURCHASE INTENT - guide to checkout! ";
  if (intent.comparisonRequest) out += "User wants to COMPARE products - show comparison! ";
  return out;
}
