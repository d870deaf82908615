// packages/core/src/agent/assistant.ts
import { randomUUID } from "node:crypto";
import { MalformedCommandError, UnknownSessionError } from "../errors.js";
import { DEFAULT_INTRO, parseCommand, type CommandOutcome } from "./commands.js";
import { Orchestrator, type OrchestratorOptions, type TurnOptions } from "./orchestrator.js";
import type { ProcessedResponse } from "./response/annotations.js";
import type { SessionView } from "./session/state.js";

export type SessionHandle = { readonly id: string };

export type ShoppingAssistantOptions = OrchestratorOptions & {
  newId?: () => string;
};

/**
 * The surface a transport talks to. One Orchestrator per session handle;
 * the model and tool collaborators are shared and read-only.
 */
export class ShoppingAssistant {
  private readonly sessions = new Map<string, Orchestrator>();

  constructor(private readonly opts: ShoppingAssistantOptions) {}

  startSession(): SessionHandle {
    const id = (this.opts.newId ?? randomUUID)();
    this.sessions.set(id, new Orchestrator(this.opts));
    if (this.opts.debug) console.log(`[assistant] session ${id} started`);
    return { id };
  }

  resetSession(handle: SessionHandle) {
    this.get(handle).reset();
  }

  async submitUtterance(handle: SessionHandle, text: string, opts: TurnOptions = {}): Promise<ProcessedResponse> {
    const orchestrator = this.get(handle);
    if (!text.trim()) throw new MalformedCommandError("Utterance is empty");
    return orchestrator.submit(text, opts);
  }

  /** Applies a control command. A malformed one changes nothing. */
  handleCommand(handle: SessionHandle, raw: unknown): CommandOutcome {
    const orchestrator = this.get(handle);
    const cmd = parseCommand(raw);

    switch (cmd.type) {
      case "reset":
        orchestrator.reset();
        return { type: "reset_complete" };
      case "intro":
        return { type: "intro", text: cmd.text ?? DEFAULT_INTRO };
    }
  }

  endSession(handle: SessionHandle): boolean {
    return this.sessions.delete(handle.id);
  }

  sessionState(handle: SessionHandle): SessionView {
    return this.get(handle).state;
  }

  private get(handle: SessionHandle): Orchestrator {
    const o = this.sessions.get(handle.id);
    if (!o) throw new UnknownSessionError(handle.id);
    return o;
  }
}
