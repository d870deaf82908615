// packages/core/src/env.ts
import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((v) => {
    const t = (v ?? "").trim().toLowerCase();
    return t === "1" || t === "true" || t === "yes";
  });

export const EnvSchema = z.object({
  // Ollama
  OLLAMA_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("qwen2.5:7b-instruct"),

  // Web search (Brave)
  BRAVE_API_KEY: z.string().default(""),
  BRAVE_API_URL: z.string().url().default("https://api.search.brave.com/res/v1/web/search"),

  // Page scraping (Firecrawl)
  FIRECRAWL_API_KEY: z.string().default(""),
  FIRECRAWL_API_URL: z.string().url().default("https://api.firecrawl.dev/v1/scrape"),

  // Account the tools act on behalf of
  TOOL_ACCOUNT: z.string().min(1).default("echobuy"),

  // Turn guards
  MAX_TOOL_ROUNDS: z.coerce.number().int().min(1).max(20).default(6),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // CLI
  OUTPUT_CHAR_DELAY_MS: z.coerce.number().int().min(0).default(0),

  // Debug
  AGENT_DEBUG: flag,
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  // Empty strings in .env mean "unset", so the defaults apply.
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  return EnvSchema.parse(cleaned);
}

export function redact(s?: string) {
  if (!s) return "(none)";
  return `${s.slice(0, 3)}***${s.slice(-3)}`;
}
