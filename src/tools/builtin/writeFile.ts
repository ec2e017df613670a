import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { defineTool } from "../define.js";
import { asErrorMessage } from "../errors.js";
import { artifactResult, failureResult } from "../result.js";

export const writeFileTool = defineTool({
  name: "fs.write_file",
  description: "Writes text content to a file, replacing what was there",
  inputSchema: {
    type: "object",
    required: ["path", "content"],
    properties: {
      path: {
        type: "string",
        description: "Target file path, relative to the working directory or absolute",
      },
      content: {
        type: "string",
        description: "Text content to write",
      },
      createDir: {
        type: "boolean",
        description: "Create missing parent directories",
      },
    },
  },
  args: z
    .object({
      path: z.string().trim().min(1),
      content: z.string(),
      createDir: z.boolean().optional(),
    })
    .strict(),
  run: async (args, context) => {
    const target = path.resolve(context.cwd, args.path);
    try {
      if (args.createDir === true) {
        await fs.mkdir(path.dirname(target), { recursive: true });
      }
      await fs.writeFile(target, args.content, "utf-8");
    } catch (error) {
      return failureResult(asErrorMessage(error));
    }
    return artifactResult(`wrote ${target}`, [target], {
      bytes: Buffer.byteLength(args.content, "utf-8"),
    });
  },
});
