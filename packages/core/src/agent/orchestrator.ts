// packages/core/src/agent/orchestrator.ts
import { ModelServiceError, ToolInvocationError, TurnAbortedError, TurnInProgressError } from "../errors.js";
import type { ChatModelService, ModelReply } from "../models/chat.js";
import type { ToolDefinition, ToolExecutor, ToolResult } from "../tools/types.js";
import { withTimeout } from "../utils/timeout.js";
import { detectIntent } from "./intent/detect.js";
import { extractProductBatch } from "./products/extract.js";
import { continuationSystemPrompt, MAX_ROUNDS_FALLBACK, turnSystemPrompt } from "./prompt.js";
import { processResponse, type ProcessedResponse } from "./response/annotations.js";
import { buildContextSummary } from "./session/context.js";
import {
  absorbProducts,
  createSession,
  recordUtterance,
  snapshotSession,
  type Session,
  type SessionView,
} from "./session/state.js";
import { searchResultToString, toolResultToString } from "./tools/result.js";

export type OrchestratorOptions = {
  model: ChatModelService;
  tools: ToolExecutor;
  /** Account passed to every tool invocation. */
  account: string;
  maxToolRounds?: number;
  modelTimeoutMs?: number;
  toolTimeoutMs?: number;
  debug?: boolean;
  now?: () => Date;
};

export type TurnOptions = { signal?: AbortSignal };

const DEFAULT_MAX_TOOL_ROUNDS = 6;
const DEFAULT_MODEL_TIMEOUT_MS = 60_000;
const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

/**
 * Runs one conversation: user turn -> (model <-> tool)* -> final text -> ProcessedResponse.
 * Owns its Session; nothing here is shared with other conversations except the tool set.
 */
export class Orchestrator {
  private session: Session = createSession();
  private turnInFlight = false;
  private readonly toolDefs: ToolDefinition[];
  private readonly maxToolRounds: number;
  private readonly modelTimeoutMs: number;
  private readonly toolTimeoutMs: number;
  private readonly now: () => Date;

  constructor(private readonly opts: OrchestratorOptions) {
    this.toolDefs = opts.tools.definitions();
    this.maxToolRounds = opts.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.modelTimeoutMs = opts.modelTimeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;
    this.toolTimeoutMs = opts.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.now = opts.now ?? (() => new Date());
  }

  /** A copy; changing it never reaches the live session. */
  get state(): SessionView {
    return snapshotSession(this.session);
  }

  /** Back to the two-turn primer with empty shopping state. */
  reset() {
    this.session = createSession();
  }

  /**
   * Processes one utterance. On a model failure or an abandoned turn the
   * transcript is restored to where it was before the turn; the intent log
   * keeps the utterance together with its budget update.
   * Turns never overlap: a submit while another is running is refused.
   */
  async submit(utterance: string, opts: TurnOptions = {}): Promise<ProcessedResponse> {
    if (this.turnInFlight) throw new TurnInProgressError();
    this.turnInFlight = true;
    try {
      return await this.runTurn(utterance, opts);
    } finally {
      this.turnInFlight = false;
    }
  }

  private async runTurn(utterance: string, opts: TurnOptions): Promise<ProcessedResponse> {
    const s = this.session;
    const mark = s.messages.length;

    s.messages.push({ role: "user", content: utterance });
    const intent = detectIntent(utterance);
    recordUtterance(s, utterance, intent, this.now());
    const context = buildContextSummary(s, intent);

    this.log(`turn: intent=${JSON.stringify(intent)} context="${context.trim()}"`);

    let raw: string;
    try {
      raw = await this.runToolLoop(context, opts.signal);
    } catch (e) {
      s.messages.splice(mark);
      throw e;
    }

    const processed = processResponse(raw);
    if (processed.purchaseIntentData) s.purchaseIntent = processed.purchaseIntentData;

    // History keeps the directives so the model can refer back to them.
    s.messages.push({ role: "assistant", content: raw });
    return processed;
  }

  private async runToolLoop(context: string, signal?: AbortSignal): Promise<string> {
    const s = this.session;
    let system = turnSystemPrompt(context);
    let partial = "";

    for (let round = 0; ; round++) {
      if (signal?.aborted) throw new TurnAbortedError();

      const reply = await this.callModel(system);
      if (reply.kind === "text") return reply.body;

      if (reply.preamble) partial = reply.preamble;
      if (round >= this.maxToolRounds) {
        console.warn(`[orchestrator] stopped after ${this.maxToolRounds} tool rounds; model still wanted ${reply.name}`);
        return partial || MAX_ROUNDS_FALLBACK;
      }

      s.messages.push({
        role: "assistant",
        content: [{ type: "tool_use", id: reply.callId, name: reply.name, input: reply.args }],
      });

      const content = await this.runTool(reply.name, reply.args);

      s.messages.push({
        role: "user",
        content: [{ type: "tool_result", toolUseId: reply.callId, content }],
      });

      system = continuationSystemPrompt(context);
    }
  }

  private async callModel(system: string): Promise<ModelReply> {
    const transcript = [...this.session.messages];
    try {
      return await withTimeout("chat model", this.modelTimeoutMs, (signal) =>
        this.opts.model.complete(transcript, system, this.toolDefs, signal)
      );
    } catch (e) {
      throw new ModelServiceError(e);
    }
  }

  private async runTool(name: string, args: Record<string, unknown>): Promise<string> {
    this.log(`tool ${name} ${JSON.stringify(args)}`);

    let result: ToolResult;
    try {
      result = await withTimeout(`tool ${name}`, this.toolTimeoutMs, (signal) =>
        this.opts.tools.invoke(name, args, this.opts.account, signal)
      );
    } catch (e) {
      result = new ToolInvocationError(name, e).toToolResult();
    }

    if (!result.ok) this.log(`tool ${name} failed: ${result.error.code} ${result.error.message}`);

    const category = this.toolDefs.find((d) => d.name === name)?.category ?? "other";
    switch (category) {
      case "web_search":
        return searchResultToString(result);
      case "page_scrape":
        if (result.ok) this.absorbScrape(result);
        return toolResultToString(result);
      default:
        return toolResultToString(result);
    }
  }

  private absorbScrape(result: ToolResult) {
    const batch = extractProductBatch(result);

    for (const r of batch.results) {
      if (r.status === "degraded") console.warn(`[products] degraded extraction for ${r.product.url}: ${r.reason}`);
    }
    for (const sk of batch.skipped) {
      console.warn(`[products] skipped scrape block ${sk.index}: ${sk.reason}`);
    }

    absorbProducts(this.session, batch.products);
    this.log(`products: ${Object.keys(batch.products).length} in batch, ${this.session.productsViewed.length} viewed`);
  }

  private log(line: string) {
    if (this.opts.debug) console.log(`[orchestrator] ${line}`);
  }
}
