// packages/core/src/agent/commands.ts
import { z } from "zod";
import { MalformedCommandError } from "../errors.js";

export const DEFAULT_INTRO = "Hello! I'm your shopping assistant.";

export const CommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("reset") }),
  z.object({ type: z.literal("intro"), text: z.string().optional() }),
]);

export type Command = z.infer<typeof CommandSchema>;

export type CommandOutcome = { type: "reset_complete" } | { type: "intro"; text: string };

/** Parses a control command from its JSON text (or an already-decoded value). */
export function parseCommand(raw: unknown): Command {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      throw new MalformedCommandError("Invalid command format: not JSON");
    }
  }

  const parsed = CommandSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedCommandError(`Invalid command: ${issue?.message ?? "unrecognised shape"}`);
  }
  return parsed.data;
}
