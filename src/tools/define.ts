import type { z } from "zod";
import { invalidArgs, toToolError, type ToolError } from "./errors.js";
import type { ToolResult } from "./result.js";
import type { Tool, ToolArgs, ToolContext, ToolInputSchema, ToolOutcome } from "./types.js";

export interface ToolDefinition<TSchema extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: TSchema;
  run: (args: z.output<TSchema>, context: ToolContext) => Promise<ToolResult> | ToolResult;
}

export function isToolArgs(value: unknown): value is ToolArgs {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Baseline check every tool inherits: the argument map must exist and be an object. */
export function validateArgMap(toolName: string, args: unknown): ToolError | undefined {
  if (args === null || args === undefined) {
    return invalidArgs(toolName, "Arguments cannot be null");
  }
  if (!isToolArgs(args)) {
    return invalidArgs(toolName, "Arguments must be an object");
  }
  return undefined;
}

export function formatIssues(error: z.ZodError, root = "arguments"): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : root;
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}

export function defineTool<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): Tool {
  const { name, description, inputSchema, args: schema, run } = definition;

  const parseArgs = (args: unknown): { ok: true; value: z.output<TSchema> } | { ok: false; error: ToolError } => {
    const baseline = validateArgMap(name, args);
    if (baseline) {
      return { ok: false, error: baseline };
    }
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      return { ok: false, error: invalidArgs(name, formatIssues(parsed.error)) };
    }
    return { ok: true, value: parsed.data };
  };

  return {
    name,
    description,
    inputSchema,
    validateArgs(args: unknown): ToolError | undefined {
      const parsed = parseArgs(args);
      return parsed.ok ? undefined : parsed.error;
    },
    async execute(args: ToolArgs, context: ToolContext): Promise<ToolOutcome> {
      const parsed = parseArgs(args);
      if (!parsed.ok) {
        return { ok: false, error: parsed.error };
      }
      try {
        const result = await Promise.resolve(run(parsed.value, context));
        return { ok: true, result };
      } catch (error) {
        return { ok: false, error: toToolError(error, name) };
      }
    },
  };
}
