// packages/core/src/index.ts
export * from "./env.js";
export * from "./errors.js";

export * from "./tools/types.js";
export * from "./tools/registry.js";
export * from "./tools/executor.js";

export * from "./utils/http.js";
export * from "./utils/timeout.js";

export * from "./models/chat.js";
export * from "./models/langchain.js";

export * from "./agent/intent/detect.js";
export * from "./agent/products/extract.js";
export * from "./agent/products/links.js";
export * from "./agent/response/annotations.js";
export * from "./agent/response/voice.js";
export * from "./agent/response/events.js";
export * from "./agent/session/state.js";
export * from "./agent/session/context.js";
export * from "./agent/prompt.js";
export * from "./agent/commands.js";
export * from "./agent/orchestrator.js";
export * from "./agent/assistant.js";
