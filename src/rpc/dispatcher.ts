import { once } from "node:events";
import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { formatIssues } from "../tools/define.js";
import { asErrorMessage } from "../tools/errors.js";
import { createToolContext, type ToolRegistry } from "../tools/registry.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import {
  RPC_ERROR_CODES,
  RPC_METHODS,
  errorResponse,
  parseRequestLine,
  successResponse,
  toCallToolResult,
  toolCallParamsSchema,
  toolErrorCode,
  toolErrorData,
  type InitializeResult,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type ToolsListResult,
} from "./protocol.js";

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DispatcherOptions {
  registry: ToolRegistry;
  serverInfo: ServerInfo;
  protocolVersion: string;
  cwd?: string;
  logger?: Logger;
}

/**
 * Turns one protocol line into at most one response line.
 *
 * Requests on one stream are handled strictly in order: `run` awaits each
 * response before reading the next line. Nothing a single request does can
 * stop the loop; only the end of the input does.
 */
export class RequestDispatcher {
  private readonly logger: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async handleLine(line: string): Promise<JsonRpcResponse | undefined> {
    if (line.trim().length === 0) {
      return undefined;
    }

    const parsed = parseRequestLine(line);
    if (!parsed.ok) {
      this.logger.warn(`rejected request line: ${parsed.response.error.message}`);
      return parsed.response;
    }

    const { request } = parsed;
    this.logger.debug(`-> ${request.method} id=${JSON.stringify(request.id)}`);
    try {
      return await this.dispatch(request);
    } catch (error) {
      this.logger.error(`${request.method} failed unexpectedly: ${asErrorMessage(error)}`);
      return errorResponse(request.id, RPC_ERROR_CODES.INTERNAL_ERROR, "Internal error");
    }
  }

  async run(input: Readable, output: Writable): Promise<void> {
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        const response = await this.handleLine(line);
        if (!response) {
          continue;
        }
        if (!output.write(`${this.serialize(response)}\n`)) {
          await once(output, "drain");
        }
      }
    } finally {
      lines.close();
    }
  }

  // Tool metadata is open-ended and may hold values JSON cannot encode.
  private serialize(response: JsonRpcResponse): string {
    try {
      return JSON.stringify(response);
    } catch (error) {
      this.logger.error(`response id=${String(response.id)} not serializable: ${asErrorMessage(error)}`);
      return JSON.stringify(errorResponse(response.id, RPC_ERROR_CODES.INTERNAL_ERROR, "Internal error"));
    }
  }

  private async dispatch(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    switch (request.method) {
      case RPC_METHODS.INITIALIZE:
        return successResponse(request.id, this.initialize());
      case RPC_METHODS.TOOLS_LIST:
        return successResponse(request.id, this.listTools());
      case RPC_METHODS.TOOLS_CALL:
        return this.callTool(request);
      default:
        return errorResponse(request.id, RPC_ERROR_CODES.METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }

  private initialize(): InitializeResult {
    return {
      protocolVersion: this.options.protocolVersion,
      capabilities: { tools: { listChanged: true } },
      serverInfo: {
        name: this.options.serverInfo.name,
        version: this.options.serverInfo.version,
      },
    };
  }

  private listTools(): ToolsListResult {
    return {
      tools: this.options.registry.listTools().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  }

  private async callTool(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const params = toolCallParamsSchema.safeParse(request.params);
    if (!params.success) {
      return errorResponse(
        request.id,
        RPC_ERROR_CODES.INVALID_PARAMS,
        `Invalid params: ${formatIssues(params.error, "params")}`,
      );
    }

    const { name } = params.data;
    const args = params.data.arguments === undefined ? {} : params.data.arguments;
    const context = createToolContext("rpc", this.options.cwd);
    const outcome = await this.options.registry.execute(name, args, context);

    if (!outcome.ok) {
      this.logger.warn(`tool ${name} failed: ${outcome.error.toString()}`);
      return errorResponse(
        request.id,
        toolErrorCode(outcome.error),
        `Tool execution failed: ${outcome.error.message}`,
        toolErrorData(outcome.error),
      );
    }

    this.logger.debug(`<- ${name} success=${outcome.result.success}`);
    return successResponse(request.id, toCallToolResult(outcome.result));
  }
}
