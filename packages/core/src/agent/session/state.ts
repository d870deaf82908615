// packages/core/src/agent/session/state.ts
import type { ChatTurn } from "../../models/chat.js";
import type { Intent } from "../intent/detect.js";
import type { Product } from "../products/extract.js";
import type { PurchaseIntentData } from "../response/annotations.js";
import { GREETING, primerInstructions } from "../prompt.js";

export type ContextEntry = {
  utterance: string;
  intent: Intent;
  at: string; // ISO timestamp
};

export type Session = {
  productsViewed: Product[];
  userPreferences: Record<string, string>;
  budgetRange: number | null;
  comparisonMode: boolean;
  purchaseIntent: PurchaseIntentData | null;
  conversationContext: ContextEntry[];

  /** Products from the latest scrape batch, keyed product_1, product_2, ... */
  currentProducts: Record<string, Product>;

  /** Transcript sent to the chat model on every call. */
  messages: ChatTurn[];
};

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** What callers outside the orchestrator get to see: a detached, read-only copy. */
export type SessionView = DeepReadonly<Session>;

export function snapshotSession(session: Session): SessionView {
  return structuredClone(session);
}

export function primerMessages(): ChatTurn[] {
  return [
    { role: "user", content: primerInstructions() },
    { role: "assistant", content: GREETING },
  ];
}

export function createSession(): Session {
  return {
    productsViewed: [],
    userPreferences: {},
    budgetRange: null,
    comparisonMode: false,
    purchaseIntent: null,
    conversationContext: [],
    currentProducts: {},
    messages: primerMessages(),
  };
}

/**
 * Applies everything an utterance's intent changes in one step,
 * so the budget and the context log never disagree.
 */
export function recordUtterance(session: Session, utterance: string, intent: Intent, now = new Date()) {
  if (intent.budgetMentioned != null) session.budgetRange = intent.budgetMentioned;
  session.comparisonMode = intent.comparisonRequest;
  session.conversationContext.push({ utterance, intent, at: now.toISOString() });
}

/** Replaces the current batch and appends every product to the viewing history. */
export function absorbProducts(session: Session, batch: Record<string, Product>) {
  session.currentProducts = batch;
  session.productsViewed.push(...Object.values(batch));
}
