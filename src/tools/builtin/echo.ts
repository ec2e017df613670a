import { z } from "zod";
import { defineTool } from "../define.js";
import { successResult } from "../result.js";

export const echoTool = defineTool({
  name: "echo",
  description: "Echoes input",
  inputSchema: {
    type: "object",
    required: ["message"],
    properties: {
      message: {
        type: "string",
        description: "Message to echo back",
      },
    },
  },
  args: z.object({ message: z.string() }).strict(),
  run: ({ message }) => successResult(message),
});
