// packages/core/src/models/chat.ts
import type { ToolDefinition } from "../tools/types.js";

export type ToolUseContent = {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
};

export type ToolResultContent = {
  type: "tool_result";
  toolUseId: string;
  /** JSON text handed back to the model. */
  content: string;
};

/**
 * One transcript entry. Plain turns carry text; a tool round trip is an
 * assistant turn holding one tool_use followed by a user turn holding its result.
 */
export type ChatTurn =
  | { role: "user" | "assistant"; content: string }
  | { role: "assistant"; content: ToolUseContent[] }
  | { role: "user"; content: ToolResultContent[] };

export type ModelReply =
  | { kind: "text"; body: string }
  | {
      kind: "toolUse";
      name: string;
      args: Record<string, unknown>;
      callId: string;
      /** Text the model emitted alongside the tool request, if any. */
      preamble?: string;
    };

export interface ChatModelService {
  complete(
    messages: readonly ChatTurn[],
    systemPrompt: string,
    toolDefs: readonly ToolDefinition[],
    signal?: AbortSignal
  ): Promise<ModelReply>;
}
