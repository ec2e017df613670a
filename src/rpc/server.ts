import type { Readable, Writable } from "node:stream";
import type { ServerConfig } from "../config/serverConfig.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { registerBuiltinTools } from "../tools/builtin/index.js";
import { ToolRegistry } from "../tools/registry.js";
import { RequestDispatcher } from "./dispatcher.js";

export interface StdioServerOptions {
  registry?: ToolRegistry;
  input?: Readable;
  output?: Writable;
  logger?: Logger;
}

export function createDispatcher(config: ServerConfig, registry: ToolRegistry, logger: Logger): RequestDispatcher {
  return new RequestDispatcher({
    registry,
    serverInfo: { name: config.serverName, version: config.serverVersion },
    protocolVersion: config.protocolVersion,
    cwd: config.cwd,
    logger,
  });
}

export async function runStdioServer(config: ServerConfig, options: StdioServerOptions = {}): Promise<void> {
  const logger = options.logger ?? createLogger("rpc", { debug: config.debug });
  const registry = options.registry ?? new ToolRegistry();
  if (!options.registry) {
    registerBuiltinTools(registry, { allowList: config.toolAllowList });
  }

  logger.info(`${config.serverName} v${config.serverVersion} listening on stdio, cwd=${config.cwd}`);
  logger.info(`registered tools: ${registry.listNames().join(", ") || "(none)"}`);

  const dispatcher = createDispatcher(config, registry, logger);
  await dispatcher.run(options.input ?? process.stdin, options.output ?? process.stdout);
  logger.info("input closed, shutting down");
}
