// packages/app-cli/src/runtime/runAgent.ts
import {
  AgentError,
  errorMessage,
  GREETING,
  LangChainChatModel,
  loadEnv,
  RegistryToolExecutor,
  ShoppingAssistant,
  ToolRegistry,
  type SessionHandle,
} from "@echobuy/core";
import { createBraveClient, searchTools } from "@echobuy/integrations-search";
import { createFirecrawlClient, MAX_BATCH_URLS, scrapeTools } from "@echobuy/integrations-scrape";

import { classifyInput, makeCli, typewriterPrint, withSpinner } from "../cli.js";
import { toolBudgetMs } from "./budget.js";
import { renderEvents } from "./render.js";

const DIDNT_CATCH = "I didn't catch that. Could you say it again?";
const TURN_FAILED = "Sorry, I had trouble with that one. Please try again.";

export async function runAgent() {
  const env = loadEnv();
  const debug = env.AGENT_DEBUG;

  const registry = new ToolRegistry();
  registry.registerMany(
    searchTools({
      client: createBraveClient({
        apiKey: env.BRAVE_API_KEY,
        url: env.BRAVE_API_URL,
        timeoutMs: env.TOOL_TIMEOUT_MS,
        retries: env.HTTP_RETRIES,
        debug,
      }),
    })
  );
  registry.registerMany(
    scrapeTools({
      client: createFirecrawlClient({
        apiKey: env.FIRECRAWL_API_KEY,
        url: env.FIRECRAWL_API_URL,
        timeoutMs: env.TOOL_TIMEOUT_MS,
        retries: env.HTTP_RETRIES,
        debug,
      }),
    })
  );

  const assistant = new ShoppingAssistant({
    model: new LangChainChatModel({ baseUrl: env.OLLAMA_URL, model: env.OLLAMA_MODEL, debug }),
    tools: new RegistryToolExecutor(registry, { debug }),
    account: env.TOOL_ACCOUNT,
    maxToolRounds: env.MAX_TOOL_ROUNDS,
    modelTimeoutMs: env.MODEL_TIMEOUT_MS,
    toolTimeoutMs: toolBudgetMs({
      requestTimeoutMs: env.TOOL_TIMEOUT_MS,
      retries: env.HTTP_RETRIES,
      requests: MAX_BATCH_URLS,
    }),
    debug,
  });
  const handle = assistant.startSession();

  const { rl, ask } = makeCli();
  const say = (text: string) => typewriterPrint(text, env.OUTPUT_CHAR_DELAY_MS);

  // Ctrl-C abandons the running turn; when idle it leaves.
  let inFlight: AbortController | null = null;
  rl.on("SIGINT", () => {
    if (inFlight) {
      inFlight.abort();
      process.stdout.write("\n[cli] dropping this turn after the current step...\n");
    } else {
      rl.close();
    }
  });

  console.log("Shopping assistant ready. /reset starts over, /quit leaves.\n");
  await say(GREETING);

  while (true) {
    const line = await ask("> ");
    if (line === null) break;

    const input = classifyInput(line);
    if (input.kind === "quit") break;
    if (input.kind === "empty") {
      await say(DIDNT_CATCH);
      continue;
    }

    if (input.kind === "command") {
      try {
        const out = assistant.handleCommand(handle, input.raw);
        if (out.type === "intro") await say(out.text);
        else console.log("[cli] conversation reset");
      } catch (e) {
        console.error("[cli]", errorMessage(e));
      }
      continue;
    }

    await runTurn(assistant, handle, input.text, {
      say,
      track: (c) => {
        inFlight = c;
      },
    });
  }

  assistant.endSession(handle);
  rl.close();
}

async function runTurn(
  assistant: ShoppingAssistant,
  handle: SessionHandle,
  text: string,
  io: { say: (text: string) => Promise<void>; track: (c: AbortController | null) => void }
) {
  const controller = new AbortController();
  io.track(controller);

  try {
    const res = await withSpinner("Thinking", () =>
      assistant.submitUtterance(handle, text, { signal: controller.signal })
    );
    if (res.spokenText.trim()) await io.say(res.spokenText);
    for (const l of renderEvents(res)) console.log(l);
  } catch (e) {
    if (e instanceof AgentError && e.code === "TURN_ABORTED") {
      await io.say("Okay, let's drop that one.");
    } else {
      console.error("[cli] turn failed:", errorMessage(e));
      await io.say(TURN_FAILED);
    }
  } finally {
    io.track(null);
  }
}
