export type ToolMetadata = Readonly<Record<string, unknown>>;

export interface ToolSuccessResult {
  readonly success: true;
  readonly content: string;
  readonly metadata?: ToolMetadata;
  readonly artifacts?: readonly string[];
}

export interface ToolFailureResult {
  readonly success: false;
  readonly errorMessage: string;
}

export type ToolResult = ToolSuccessResult | ToolFailureResult;

export function successResult(content: string, metadata?: Record<string, unknown>): ToolSuccessResult {
  return Object.freeze({
    success: true as const,
    content,
    ...(metadata ? { metadata: Object.freeze({ ...metadata }) } : {}),
  });
}

export function artifactResult(
  content: string,
  artifacts: string[],
  metadata?: Record<string, unknown>,
): ToolSuccessResult {
  return Object.freeze({
    success: true as const,
    content,
    artifacts: Object.freeze([...artifacts]),
    ...(metadata ? { metadata: Object.freeze({ ...metadata }) } : {}),
  });
}

export function failureResult(errorMessage: string): ToolFailureResult {
  return Object.freeze({
    success: false as const,
    errorMessage,
  });
}
