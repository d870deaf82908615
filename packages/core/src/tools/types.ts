import { z } from "zod";

export type ToolId = string;

/** How the orchestrator post-processes a tool's result before the model sees it. */
export type ToolCategory = "web_search" | "page_scrape" | "other";

export type ToolResult<T = unknown> =
  | { ok: true; data: T }
  | { ok: false; error: { code: string; message: string; details?: unknown } };

export type ToolContext = {
  // linked account the call is made for
  account: string;
  signal?: AbortSignal;
  debug?: boolean;
};

export type ToolSpec<I extends z.ZodTypeAny = z.ZodTypeAny, O = unknown> = {
  id: ToolId;
  description: string;
  category: ToolCategory;
  input: I; // zod schema
  run(ctx: ToolContext, input: z.infer<I>): Promise<ToolResult<O>>;
};

/** What the chat model is told about a tool. */
export type ToolDefinition = {
  name: ToolId;
  description: string;
  category: ToolCategory;
  schema: z.ZodTypeAny;
};

export interface ToolExecutor {
  definitions(): ToolDefinition[];
  invoke(name: ToolId, args: unknown, account: string, signal?: AbortSignal): Promise<ToolResult>;
}

export function ok<T>(data: T): ToolResult<T> {
  return { ok: true, data };
}

export function fail(code: string, message: string, details?: unknown): ToolResult<never> {
  return details === undefined
    ? { ok: false, error: { code, message } }
    : { ok: false, error: { code, message, details } };
}
