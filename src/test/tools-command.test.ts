import assert from "node:assert/strict";
import { afterEach, test } from "node:test";
import { z } from "zod";
import { buildProgram } from "../cli/program.js";
import { runToolsCommand, type ToolsCommandDeps } from "../cli/commands/tools.js";
import { echoTool } from "../tools/builtin/echo.js";
import { defineTool } from "../tools/define.js";
import { ToolRegistry } from "../tools/registry.js";
import { failureResult } from "../tools/result.js";

const refusingTool = defineTool({
  name: "refuse",
  description: "Always refuses",
  inputSchema: { type: "object", properties: {} },
  args: z.object({}),
  run: () => failureResult("not today"),
});

function createDeps(): ToolsCommandDeps {
  const registry = new ToolRegistry();
  registry.register(echoTool);
  registry.register(refusingTool);
  return { registry, cwd: process.cwd() };
}

afterEach(() => {
  process.exitCode = undefined;
});

test("tools list prints the catalogue as JSON", async (t) => {
  const log = t.mock.method(console, "log", () => undefined);

  const code = await runToolsCommand({ kind: "list" }, createDeps());

  assert.equal(code, 0);
  assert.equal(log.mock.calls.length, 1);
  const printed = JSON.parse(String(log.mock.calls[0].arguments[0]));
  assert.deepEqual(
    printed.map((tool: { name: string; description: string }) => [tool.name, tool.description]),
    [
      ["echo", "Echoes input"],
      ["refuse", "Always refuses"],
    ],
  );
});

test("tools info prints one entry or fails for unknown names", async (t) => {
  const log = t.mock.method(console, "log", () => undefined);
  const error = t.mock.method(console, "error", () => undefined);

  assert.equal(await runToolsCommand({ kind: "info", name: "echo" }, createDeps()), 0);
  assert.deepEqual(JSON.parse(String(log.mock.calls[0].arguments[0])), {
    name: "echo",
    description: "Echoes input",
    inputSchema: echoTool.inputSchema,
  });

  assert.equal(await runToolsCommand({ kind: "info", name: "nope" }, createDeps()), 1);
  assert.equal(error.mock.calls[0].arguments[0], "Tool not found: nope");
});

test("tools invoke prints the result and maps failures to exit code 1", async (t) => {
  const log = t.mock.method(console, "log", () => undefined);

  const ok = await runToolsCommand(
    { kind: "invoke", name: "echo", rawArgs: JSON.stringify({ message: "hi" }) },
    createDeps(),
  );
  assert.equal(ok, 0);
  assert.equal(log.mock.calls[0].arguments[0], JSON.stringify({ success: true, content: "hi" }, null, 2));

  const refused = await runToolsCommand({ kind: "invoke", name: "refuse" }, createDeps());
  assert.equal(refused, 1);
  assert.equal(
    log.mock.calls[1].arguments[0],
    JSON.stringify({ success: false, errorMessage: "not today" }, null, 2),
  );
});

test("tools invoke renders argument and lookup errors", async (t) => {
  const error = t.mock.method(console, "error", () => undefined);

  assert.equal(await runToolsCommand({ kind: "invoke", name: "echo", rawArgs: "{bad" }, createDeps()), 1);
  assert.match(String(error.mock.calls[0].arguments[0]), /^Invalid --args json: /);

  assert.equal(await runToolsCommand({ kind: "invoke", name: "nope" }, createDeps()), 1);
  assert.equal(error.mock.calls[1].arguments[0], "ERROR: [tool_not_found] Tool not found: nope");

  assert.equal(await runToolsCommand({ kind: "invoke", name: "echo" }, createDeps()), 1);
  assert.equal(error.mock.calls[2].arguments[0], "ERROR: [invalid_args] message: Required");
});

test("program routes tools invoke through commander", async (t) => {
  const log = t.mock.method(console, "log", () => undefined);

  await buildProgram().parseAsync(["node", "toolwire", "tools", "invoke", "echo", "--args", '{"message":"hey"}']);

  assert.equal(log.mock.calls[0].arguments[0], JSON.stringify({ success: true, content: "hey" }, null, 2));
  assert.equal(process.exitCode, 0);
});

test("program prints its version", async (t) => {
  const log = t.mock.method(console, "log", () => undefined);

  await buildProgram().parseAsync(["node", "toolwire", "--version"]);

  assert.equal(log.mock.calls[0].arguments[0], "toolwire v0.1.0");
});
