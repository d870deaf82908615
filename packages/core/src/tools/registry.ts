import type { ToolSpec } from "./types.js";

export class ToolRegistry {
  private tools = new Map<string, ToolSpec>();

  register(tool: ToolSpec) {
    if (this.tools.has(tool.id)) throw new Error(`Tool already registered: ${tool.id}`);
    this.tools.set(tool.id, tool);
  }

  registerMany(tools: ToolSpec[]) {
    for (const t of tools) this.register(t);
  }

  get(id: string) {
    return this.tools.get(id);
  }

  list() {
    return [...this.tools.values()];
  }
}
