// packages/core/src/tools/executor.ts
import { errorMessage } from "../errors.js";
import type { ToolRegistry } from "./registry.js";
import { fail, type ToolDefinition, type ToolExecutor, type ToolResult } from "./types.js";

/**
 * Tool Executor backed by a ToolRegistry.
 * Arguments are validated against the tool's zod schema; anything a tool throws
 * comes back as a failed ToolResult so the model can react to it.
 */
export class RegistryToolExecutor implements ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly opts: { debug?: boolean } = {},
  ) {}

  definitions(): ToolDefinition[] {
    return this.registry.list().map((spec) => ({
      name: spec.id,
      description: spec.description,
      category: spec.category,
      schema: spec.input,
    }));
  }

  async invoke(name: string, args: unknown, account: string, signal?: AbortSignal): Promise<ToolResult> {
    const spec = this.registry.get(name);
    if (!spec) return fail("UNKNOWN_TOOL", `Unknown tool: ${name}`);

    const parsed = spec.input.safeParse(args);
    if (!parsed.success) {
      return fail("INVALID_ARGS", `Invalid arguments for ${name}`, parsed.error.flatten());
    }

    try {
      return await spec.run({ account, signal, debug: this.opts.debug }, parsed.data);
    } catch (e) {
      if (this.opts.debug) console.log(`[tools] ${name} threw:`, errorMessage(e));
      return fail("TOOL_FAILED", errorMessage(e));
    }
  }
}
