// packages/core/src/agent/response/voice.ts
import { stripDirectives } from "./directives.js";

const LIST_MARKERS = ["1.", "2.", "3.", "4.", "5.", "•", "-"];

// Applied once each, in this order, as plain substring substitutions.
const CASUAL_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["I apologize", "Sorry about that"],
  ["Could you please", "Can you"],
  ["I would be happy to", "I'd love to"],
  ["assistance", "help"],
  ["purchase", "buy"],
  ["provide me with", "tell me"],
  ["information", "info"],
  ["however", "but"],
  ["therefore", "so"],
  ["additionally", "also"],
  ["Furthermore", "Plus"],
  ["In order to", "To"],
  ["I recommend", "I'd suggest"],
  ["specifications", "details"],
  ["http", ""],
  ["www.", ""],
  ["amazon.com", "Amazon"],
];

const MAX_SENTENCES = 4;
const KEPT_SENTENCES = 3;

/** Rewrites directive-free text into something short enough to say out loud. */
export function optimizeForVoice(text: string): string {
  const lines = text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l && !LIST_MARKERS.some((m) => l.startsWith(m)));

  let result = stripDirectives(lines.join(" ")).trim();

  for (const [formal, casual] of CASUAL_REPLACEMENTS) {
    result = result.split(formal).join(casual);
  }

  const sentences = result.split(".");
  if (sentences.length > MAX_SENTENCES) {
    result = sentences.slice(0, KEPT_SENTENCES).join(". ") + ".";
  }

  return result.trim();
}
