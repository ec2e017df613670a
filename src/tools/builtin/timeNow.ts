import { z } from "zod";
import { defineTool } from "../define.js";
import { successResult } from "../result.js";

export const timeNowTool = defineTool({
  name: "time.now",
  description: "Returns the current timestamp and ISO time",
  inputSchema: {
    type: "object",
    properties: {},
  },
  args: z.object({}).strict(),
  run: () => {
    const now = new Date();
    return successResult(`timestamp=${now.getTime()}, iso=${now.toISOString()}`, {
      timestamp: now.getTime(),
      iso: now.toISOString(),
    });
  },
});
