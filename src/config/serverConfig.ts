import { resolveBooleanFlag } from "../shared/envFlags.js";
import { VERSION } from "../cli/version.js";

export const PROTOCOL_VERSION = "2024-11-05";
export const SERVER_NAME = "toolwire";

export interface ServerConfig {
  serverName: string;
  serverVersion: string;
  protocolVersion: string;
  cwd: string;
  debug: boolean;
  toolAllowList: string[];
}

export interface ServerConfigOverrides {
  cwd?: string;
  debug?: boolean;
  toolAllowList?: string[];
}

export function parseToolAllowList(raw: string | undefined): string[] {
  if (typeof raw !== "string") {
    return [];
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function resolveServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ServerConfigOverrides = {},
): ServerConfig {
  const envAllowList = parseToolAllowList(env.TOOLWIRE_TOOL_ALLOW);
  return {
    serverName: SERVER_NAME,
    serverVersion: VERSION,
    protocolVersion: PROTOCOL_VERSION,
    cwd: overrides.cwd ?? process.cwd(),
    debug: overrides.debug ?? resolveBooleanFlag(env.TOOLWIRE_DEBUG),
    toolAllowList: overrides.toolAllowList && overrides.toolAllowList.length > 0
      ? [...overrides.toolAllowList]
      : envAllowList,
  };
}
