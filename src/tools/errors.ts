export type ToolErrorCode = "duplicate_tool" | "tool_not_found" | "invalid_args" | "execution_error";

export interface ToolErrorOptions {
  toolName?: string;
  errorCode?: ToolErrorCode;
  cause?: unknown;
}

export class ToolError extends Error {
  public readonly toolName?: string;
  public readonly errorCode?: ToolErrorCode;

  constructor(message: string, options: ToolErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ToolError";
    this.toolName = options.toolName;
    this.errorCode = options.errorCode;
  }

  override toString(): string {
    const tool = this.toolName ? ` [${this.toolName}]` : "";
    const code = this.errorCode ? ` (${this.errorCode})` : "";
    return `${this.name}${tool}${code}: ${this.message}`;
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// Wraps anything thrown by a tool so that only ToolError leaves the registry.
export function toToolError(error: unknown, toolName: string): ToolError {
  if (error instanceof ToolError) {
    return error;
  }
  const message = asErrorMessage(error).trim() || "tool execution failed";
  return new ToolError(message, { toolName, errorCode: "execution_error", cause: error });
}

export function toolNotFound(name: string): ToolError {
  return new ToolError(`Tool not found: ${name}`, { errorCode: "tool_not_found" });
}

export function invalidArgs(toolName: string, message: string): ToolError {
  return new ToolError(message, { toolName, errorCode: "invalid_args" });
}
