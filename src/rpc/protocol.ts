import { z } from "zod";
import type { ToolError } from "../tools/errors.js";
import type { ToolResult } from "../tools/result.js";
import type { ToolCatalogEntry } from "../tools/types.js";

export const JSONRPC_VERSION = "2.0" as const;

export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export const RPC_METHODS = {
  INITIALIZE: "initialize",
  TOOLS_LIST: "tools/list",
  TOOLS_CALL: "tools/call",
} as const;

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface InitializeResult {
  protocolVersion: string;
  capabilities: { tools: { listChanged: boolean } };
  serverInfo: { name: string; version: string };
}

export interface ToolsListResult {
  tools: ToolCatalogEntry[];
}

export interface TextContent {
  type: "text";
  text: string;
}

export interface CallToolResult {
  content: TextContent[];
  meta?: Record<string, unknown>;
  isError?: true;
}

const idSchema = z.union([z.string(), z.number(), z.null()]);

const requestSchema = z.object({
  jsonrpc: z.string().optional(),
  id: idSchema.optional(),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

export type ParsedRequestLine =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; response: JsonRpcErrorResponse };

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: Record<string, unknown>,
): JsonRpcErrorResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error: {
      code,
      message,
      ...(data ? { data } : {}),
    },
  };
}

function recoverId(value: unknown): JsonRpcId {
  if (typeof value !== "object" || value === null || !("id" in value)) {
    return null;
  }
  const parsed = idSchema.safeParse(value.id);
  return parsed.success ? parsed.data : null;
}

export function parseRequestLine(line: string): ParsedRequestLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      response: errorResponse(null, RPC_ERROR_CODES.PARSE_ERROR, `Parse error: ${detail}`),
    };
  }

  const parsed = requestSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: errorResponse(recoverId(raw), RPC_ERROR_CODES.INVALID_REQUEST, "Invalid request"),
    };
  }

  return {
    ok: true,
    request: {
      id: parsed.data.id ?? null,
      method: parsed.data.method,
      params: parsed.data.params,
    },
  };
}

/** Artifacts land in `meta.artifacts` and take precedence over a metadata key of that name. */
export function toCallToolResult(result: ToolResult): CallToolResult {
  if (!result.success) {
    return {
      content: [{ type: "text", text: `Error: ${result.errorMessage}` }],
      isError: true,
    };
  }

  const meta: Record<string, unknown> = {
    ...(result.metadata ?? {}),
    ...(result.artifacts ? { artifacts: [...result.artifacts] } : {}),
  };
  return {
    content: [{ type: "text", text: result.content }],
    ...(Object.keys(meta).length > 0 ? { meta } : {}),
  };
}

export function toolErrorCode(error: ToolError): number {
  if (error.errorCode === "tool_not_found" || error.errorCode === "invalid_args") {
    return RPC_ERROR_CODES.INVALID_PARAMS;
  }
  return RPC_ERROR_CODES.INTERNAL_ERROR;
}

export function toolErrorData(error: ToolError): Record<string, unknown> | undefined {
  const data: Record<string, unknown> = {
    ...(error.toolName ? { tool: error.toolName } : {}),
    ...(error.errorCode ? { code: error.errorCode } : {}),
  };
  return Object.keys(data).length > 0 ? data : undefined;
}
