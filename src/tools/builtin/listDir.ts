import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { defineTool } from "../define.js";
import { asErrorMessage } from "../errors.js";
import { failureResult, successResult } from "../result.js";

const DEFAULT_MAX_DEPTH = 4;

type DirEntry = {
  type: "file" | "directory";
  name: string;
  path: string;
};

type DirNode = {
  depth: number;
  path: string;
  children: DirEntry[];
};

async function listDirEntries(targetPath: string, recursive: boolean, maxDepth: number, currentDepth = 0): Promise<DirNode[]> {
  const dirNode: DirNode = {
    depth: currentDepth,
    path: targetPath,
    children: [],
  };
  const result: DirNode[] = [dirNode];

  if (currentDepth >= maxDepth) {
    return result;
  }

  const entries = await fs.readdir(targetPath, { withFileTypes: true });
  entries.sort((left, right) => left.name.localeCompare(right.name));

  for (const entry of entries) {
    const resolved = path.join(targetPath, entry.name);
    if (entry.isDirectory()) {
      dirNode.children.push({ type: "directory", name: entry.name, path: resolved });
      if (recursive) {
        result.push(...(await listDirEntries(resolved, true, maxDepth, currentDepth + 1)));
      }
      continue;
    }

    dirNode.children.push({ type: "file", name: entry.name, path: resolved });
  }

  return result;
}

export const listDirTool = defineTool({
  name: "fs.list_dir",
  description: "Lists directory contents",
  inputSchema: {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "Directory to list, default is the working directory",
      },
      recursive: {
        type: "boolean",
        description: "Descend into subdirectories",
      },
      maxDepth: {
        type: "number",
        description: `Recursion depth limit, default ${DEFAULT_MAX_DEPTH}`,
      },
    },
  },
  args: z
    .object({
      path: z.string().trim().min(1).optional(),
      recursive: z.boolean().optional(),
      maxDepth: z.number().int().min(1).optional(),
    })
    .strict(),
  run: async (args, context) => {
    const target = path.resolve(context.cwd, args.path ?? ".");
    const recursive = args.recursive === true;
    const maxDepth = args.maxDepth ?? DEFAULT_MAX_DEPTH;

    try {
      const nodes = await listDirEntries(target, recursive, maxDepth);
      return successResult(`listed ${nodes.length} paths under ${target}`, {
        target,
        recursive,
        maxDepth,
        nodes,
      });
    } catch (error) {
      return failureResult(asErrorMessage(error));
    }
  },
});
