// packages/core/src/errors.ts
import type { ToolResult } from "./tools/types.js";

export type AgentErrorCode =
  | "MODEL_SERVICE_FAILED"
  | "TOOL_FAILED"
  | "MALFORMED_COMMAND"
  | "TURN_ABORTED"
  | "TURN_IN_PROGRESS"
  | "TIMEOUT"
  | "UNKNOWN_SESSION";

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TimeoutError extends AgentError {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
  }
}

/**
 * The chat model call failed (transport error, timeout, bad response).
 * Fatal to the current turn only; the session stays usable.
 */
export class ModelServiceError extends AgentError {
  constructor(cause: unknown) {
    super("MODEL_SERVICE_FAILED", `Chat model call failed: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * A tool threw or timed out. The orchestrator never rethrows this: it is turned
 * into a failed ToolResult and handed back to the model.
 */
export class ToolInvocationError extends AgentError {
  constructor(readonly toolName: string, cause: unknown) {
    super("TOOL_FAILED", `Tool "${toolName}" failed: ${errorMessage(cause)}`, { cause });
  }

  toToolResult(): ToolResult<never> {
    const code = this.cause instanceof AgentError ? this.cause.code : this.code;
    return { ok: false, error: { code, message: this.message } };
  }
}

export class MalformedCommandError extends AgentError {
  constructor(message: string) {
    super("MALFORMED_COMMAND", message);
  }
}

export class TurnAbortedError extends AgentError {
  constructor() {
    super("TURN_ABORTED", "Turn abandoned by the caller");
  }
}

/** A session runs one turn at a time; a second submit while one is running is refused. */
export class TurnInProgressError extends AgentError {
  constructor() {
    super("TURN_IN_PROGRESS", "A turn is already running for this session");
  }
}

export class UnknownSessionError extends AgentError {
  constructor(readonly sessionId: string) {
    super("UNKNOWN_SESSION", `No active session with id ${sessionId}`);
  }
}
