import { echoTool } from "./echo.js";
import { listDirTool } from "./listDir.js";
import { readFileTool } from "./readFile.js";
import { timeNowTool } from "./timeNow.js";
import { writeFileTool } from "./writeFile.js";
import type { ToolRegistry } from "../registry.js";
import type { Tool } from "../types.js";

export const builtinTools: Tool[] = [
  echoTool,
  timeNowTool,
  readFileTool,
  writeFileTool,
  listDirTool,
];

export interface BuiltinToolOptions {
  allowList?: string[];
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function normalizeAllowList(allowList?: string[]): Set<string> {
  const normalized = new Set<string>();
  for (const raw of allowList ?? []) {
    const name = normalizeName(raw);
    if (name) {
      normalized.add(name);
    }
  }
  return normalized;
}

export function isToolAllowed(name: string, allowList?: string[]): boolean {
  const allowSet = normalizeAllowList(allowList);
  if (allowSet.size === 0) {
    return true;
  }
  return allowSet.has(normalizeName(name));
}

/** Registers the built-ins that pass the allow list and returns their names. */
export function registerBuiltinTools(registry: ToolRegistry, options: BuiltinToolOptions = {}): string[] {
  const registered: string[] = [];
  for (const tool of builtinTools) {
    if (!isToolAllowed(tool.name, options.allowList)) {
      continue;
    }
    registry.register(tool);
    registered.push(tool.name);
  }
  return registered;
}
