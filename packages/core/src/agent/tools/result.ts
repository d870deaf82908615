// packages/core/src/agent/tools/result.ts
import type { ToolResult } from "../../tools/types.js";
import { searchToolContent } from "../products/links.js";

/**
 * Normalize a tool output to the string placed in a tool_result turn.
 * Strings pass through; everything else is sent as JSON.
 */
export function toolResultToString(raw: unknown): string {
  if (raw == null) return "";
  if (typeof raw === "string") return raw;
  return JSON.stringify(raw);
}

/**
 * What the model sees after a web search: just the product links it can scrape,
 * or a notice that there were none. Failures go through untouched.
 */
export function searchResultToString(result: ToolResult): string {
  return toolResultToString(result.ok ? searchToolContent(result) : result);
}
