// packages/app-cli/src/cli.ts
import readline from "node:readline";

export function makeCli() {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  /** Resolves null once stdin is closed (Ctrl-D, or Ctrl-C while idle). */
  const ask = (q: string) =>
    new Promise<string | null>((resolve) => {
      if (closed) {
        resolve(null);
        return;
      }
      const onClose = () => resolve(null);
      rl.once("close", onClose);
      rl.question(q, (answer) => {
        rl.off("close", onClose);
        resolve(answer);
      });
    });

  return { rl, ask };
}

export type CliInput =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "command"; raw: string }
  | { kind: "utterance"; text: string };

/**
 * `{...}` lines are JSON control commands; `/reset` and `/intro [text]` are
 * shorthands for them. Everything else is something the user said.
 */
export function classifyInput(line: string): CliInput {
  const t = line.trim();
  if (!t) return { kind: "empty" };
  if (t === "/quit" || t === "/exit") return { kind: "quit" };
  if (t.startsWith("{")) return { kind: "command", raw: t };
  if (t === "/reset") return { kind: "command", raw: JSON.stringify({ type: "reset" }) };
  if (t === "/intro" || t.startsWith("/intro ")) {
    const text = t.slice("/intro".length).trim();
    return { kind: "command", raw: JSON.stringify(text ? { type: "intro", text } : { type: "intro" }) };
  }
  return { kind: "utterance", text: t };
}

export async function typewriterPrint(text: string, delayMs: number) {
  if (!delayMs || delayMs <= 0) {
    process.stdout.write(text + "\n");
    return;
  }
  for (const ch of text) {
    process.stdout.write(ch);
    await new Promise((r) => setTimeout(r, delayMs));
  }
  process.stdout.write("\n");
}

/**
 * Minimal CLI spinner (no deps). Only drawn on a TTY.
 * Call stop() in finally.
 */
export function startSpinner(label = "Thinking") {
  const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  const tty = process.stdout.isTTY === true;
  let i = 0;
  let stopped = false;

  const render = () => {
    const frame = frames[i++ % frames.length];
    process.stdout.write(`\r${frame} ${label}...`);
  };

  if (tty) {
    process.stdout.write("\x1B[?25l");
    render();
  }
  const timer = tty ? setInterval(render, 80) : undefined;

  const stop = () => {
    if (stopped) return;
    stopped = true;
    clearInterval(timer);
    if (tty) process.stdout.write("\r\x1b[2K\x1B[?25h");
  };

  return { stop };
}

export async function withSpinner<T>(label: string, fn: () => Promise<T>) {
  const sp = startSpinner(label);
  try {
    return await fn();
  } finally {
    sp.stop();
  }
}
