export * from "./client.js";
export * from "./tools.js";
