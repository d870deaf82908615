// packages/core/src/models/langchain.ts
import { randomUUID } from "node:crypto";
import { ChatOllama } from "@langchain/ollama";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type AIMessageChunk,
  type BaseMessage,
} from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import type { ToolDefinition } from "../tools/types.js";
import type { ChatModelService, ChatTurn, ModelReply } from "./chat.js";

export type LangChainChatModelOptions = {
  baseUrl: string;
  model: string;
  temperature?: number;
  debug?: boolean;
};

/** Transcript turns -> LangChain messages, system prompt first. */
export function toLangChainMessages(systemPrompt: string, turns: readonly ChatTurn[]): BaseMessage[] {
  const out: BaseMessage[] = [new SystemMessage(systemPrompt)];

  for (const turn of turns) {
    if (typeof turn.content === "string") {
      out.push(turn.role === "user" ? new HumanMessage(turn.content) : new AIMessage(turn.content));
      continue;
    }

    const toolCalls: ToolCall[] = [];
    for (const part of turn.content) {
      if (part.type === "tool_use") {
        toolCalls.push({ id: part.id, name: part.name, args: part.input, type: "tool_call" });
      } else {
        out.push(new ToolMessage({ content: part.content, tool_call_id: part.toolUseId }));
      }
    }
    if (toolCalls.length > 0) out.push(new AIMessage({ content: "", tool_calls: toolCalls }));
  }

  return out;
}

export function contentText(content: AIMessageChunk["content"]): string {
  if (typeof content === "string") return content;
  return content.map((part) => ("text" in part && typeof part.text === "string" ? part.text : "")).join("");
}

/**
 * Reads one model response. When several tools are requested at once only the
 * last is honoured: the conversation runs one tool per round trip.
 */
export function toModelReply(msg: Pick<AIMessageChunk, "content" | "tool_calls">): ModelReply {
  const text = contentText(msg.content);
  const call = msg.tool_calls?.at(-1);
  if (!call) return { kind: "text", body: text };

  const preamble = text.trim();
  return {
    kind: "toolUse",
    name: call.name,
    args: call.args,
    callId: call.id || randomUUID(),
    ...(preamble ? { preamble } : {}),
  };
}

/** Chat Model Service on a local Ollama model via LangChain tool calling. */
export class LangChainChatModel implements ChatModelService {
  private readonly llm: ChatOllama;

  constructor(private readonly opts: LangChainChatModelOptions) {
    this.llm = new ChatOllama({
      baseUrl: opts.baseUrl,
      model: opts.model,
      temperature: opts.temperature ?? 0.4,
    });
  }

  async complete(
    messages: readonly ChatTurn[],
    systemPrompt: string,
    toolDefs: readonly ToolDefinition[],
    signal?: AbortSignal
  ): Promise<ModelReply> {
    const bound = this.llm.bindTools(
      toolDefs.map((d) => ({ name: d.name, description: d.description, schema: d.schema }))
    );

    const res = await bound.invoke(toLangChainMessages(systemPrompt, messages), { signal });
    const reply = toModelReply(res);

    if (this.opts.debug) {
      console.log(
        `[model] ${this.opts.model} ->`,
        reply.kind === "toolUse" ? `tool ${reply.name} ${JSON.stringify(reply.args)}` : `text (${reply.body.length} chars)`
      );
    }
    return reply;
  }
}
