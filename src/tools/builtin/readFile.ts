import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { defineTool } from "../define.js";
import { asErrorMessage } from "../errors.js";
import { failureResult, successResult } from "../result.js";

const DEFAULT_MAX_BYTES = 204800;

export const readFileTool = defineTool({
  name: "fs.read_file",
  description: "Reads a UTF-8 file below a size limit",
  inputSchema: {
    type: "object",
    required: ["path"],
    properties: {
      path: {
        type: "string",
        description: "File path, relative to the working directory or absolute",
      },
      maxBytes: {
        type: "number",
        description: `Maximum file size in bytes, default ${DEFAULT_MAX_BYTES}`,
      },
    },
  },
  args: z
    .object({
      path: z.string().trim().min(1),
      maxBytes: z.number().int().positive().optional(),
    })
    .strict(),
  run: async (args, context) => {
    const maxBytes = args.maxBytes ?? DEFAULT_MAX_BYTES;
    const target = path.resolve(context.cwd, args.path);

    try {
      const stat = await fs.stat(target);
      if (!stat.isFile()) {
        return failureResult(`target path is not a file: ${target}`);
      }
      if (stat.size > maxBytes) {
        return failureResult(`file size exceeds maxBytes (${stat.size} > ${maxBytes})`);
      }

      const content = await fs.readFile(target, "utf-8");
      return successResult(content, {
        path: target,
        size: stat.size,
        maxBytes,
      });
    } catch (error) {
      return failureResult(asErrorMessage(error));
    }
  },
});
