import { randomUUID } from "node:crypto";
import { isToolArgs } from "./define.js";
import { ToolError, invalidArgs, toToolError, toolNotFound } from "./errors.js";
import type { ToolResult } from "./result.js";
import type { Tool, ToolContext, ToolOutcome } from "./types.js";

function byName(left: Tool, right: Tool): number {
  return left.name.localeCompare(right.name);
}

export function createToolContext(source: ToolContext["source"], cwd = process.cwd()): ToolContext {
  return {
    requestId: `${source}-${randomUUID()}`,
    cwd,
    source,
  };
}

/**
 * Catalogue of tools and the only path through which a tool runs.
 *
 * Every mutation is a single synchronous step on the map, so two registrants
 * racing for one name can never both succeed. Listings are copies.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register(tool: Tool): void {
    const name = typeof tool.name === "string" ? tool.name.trim() : "";
    if (!name || name !== tool.name) {
      throw invalidArgs(String(tool.name), "Tool name must be a non-empty string without surrounding whitespace");
    }
    if (this.tools.has(name)) {
      throw new ToolError(`Tool with name '${name}' already exists`, {
        toolName: name,
        errorCode: "duplicate_tool",
      });
    }
    this.tools.set(name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  lookup(name: string): Tool | undefined {
    if (typeof name !== "string") {
      return undefined;
    }
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys()).sort((left, right) => left.localeCompare(right));
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values()).sort(byName);
  }

  size(): number {
    return this.tools.size;
  }

  // Test isolation only.
  clear(): void {
    this.tools.clear();
  }

  async execute(name: string, args: unknown, context?: ToolContext): Promise<ToolOutcome> {
    const tool = this.lookup(name);
    if (!tool) {
      return { ok: false, error: toolNotFound(name) };
    }

    try {
      const validationError = tool.validateArgs(args);
      if (validationError) {
        return { ok: false, error: validationError };
      }
      if (!isToolArgs(args)) {
        return { ok: false, error: invalidArgs(tool.name, "Arguments must be an object") };
      }
      return await tool.execute({ ...args }, context ?? createToolContext("cli"));
    } catch (error) {
      return { ok: false, error: toToolError(error, tool.name) };
    }
  }

  async executeOrThrow(name: string, args: unknown, context?: ToolContext): Promise<ToolResult> {
    const outcome = await this.execute(name, args, context);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.result;
  }
}
