// packages/core/src/agent/response/directives.ts

export const DIRECTIVE_TAGS = ["DISPLAY_LINK", "PRODUCT_CARD", "COMPARE_PRODUCTS", "PURCHASE_INTENT"] as const;

export type DirectiveTag = (typeof DIRECTIVE_TAGS)[number];

export type DirectiveSpan = {
  tag: DirectiveTag;
  /** Text between "TAG:" and the closing bracket, untrimmed. */
  body: string;
  start: number;
  end: number; // exclusive
  terminated: boolean;
};

/**
 * Finds `[TAG: ...]` spans left to right. A span ends at the first "]" after
 * its opening bracket; an opening without any "]" runs to the end of the text
 * and is reported as unterminated.
 */
export function scanDirectives(text: string): DirectiveSpan[] {
  const spans: DirectiveSpan[] = [];
  let i = text.indexOf("[");

  while (i !== -1) {
    const tag = DIRECTIVE_TAGS.find((t) => text.startsWith(`${t}:`, i + 1));
    if (!tag) {
      i = text.indexOf("[", i + 1);
      continue;
    }

    const bodyStart = i + tag.length + 2;
    const close = text.indexOf("]", bodyStart);
    if (close === -1) {
      spans.push({ tag, body: text.slice(bodyStart), start: i, end: text.length, terminated: false });
      break;
    }

    spans.push({ tag, body: text.slice(bodyStart, close), start: i, end: close + 1, terminated: true });
    i = text.indexOf("[", close + 1);
  }

  return spans;
}

export function stripDirectives(text: string, spans = scanDirectives(text)): string {
  let out = "";
  let cursor = 0;
  for (const s of spans) {
    out += text.slice(cursor, s.start);
    cursor = s.end;
  }
  return out + text.slice(cursor);
}

/**
 * Splits a directive body on "|" into at most `max` trimmed fields;
 * the last field keeps any further pipes.
 */
export function splitFields(body: string, max: number): string[] {
  const parts = body.split("|");
  const fields = parts.length <= max ? parts : [...parts.slice(0, max - 1), parts.slice(max - 1).join("|")];
  return fields.map((f) => f.trim());
}
