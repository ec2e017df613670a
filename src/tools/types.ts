import type { ToolError } from "./errors.js";
import type { ToolResult } from "./result.js";

export type ToolSource = "cli" | "rpc";

export interface ToolContext {
  requestId: string;
  cwd: string;
  source: ToolSource;
}

export type ToolPropertyType = "string" | "number" | "boolean" | "object" | "array";

export interface ToolInputProperty {
  type: ToolPropertyType;
  description?: string;
  enum?: string[];
  items?: { type: ToolPropertyType };
}

export interface ToolInputSchema {
  type: "object";
  required?: string[];
  properties: Record<string, ToolInputProperty>;
}

export type ToolArgs = Record<string, unknown>;

export type ToolOutcome =
  | { ok: true; result: ToolResult }
  | { ok: false; error: ToolError };

/**
 * A named capability the registry can advertise and invoke.
 *
 * `validateArgs` must reject bad input before any side effect happens, and
 * `execute` reports failure through the returned outcome instead of throwing.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  validateArgs(args: unknown): ToolError | undefined;
  execute(args: ToolArgs, context: ToolContext): Promise<ToolOutcome>;
}

export type ToolCatalogEntry = Pick<Tool, "name" | "description" | "inputSchema">;
