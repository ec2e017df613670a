import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { isToolAllowed, registerBuiltinTools } from "../tools/builtin/index.js";
import { ToolRegistry, createToolContext } from "../tools/registry.js";

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "toolwire-builtin-"));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function createBuiltinRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry);
  return registry;
}

test("builtin registration honours a case-insensitive allow list", () => {
  assert.deepEqual(registerBuiltinTools(new ToolRegistry()), [
    "echo",
    "time.now",
    "fs.read_file",
    "fs.write_file",
    "fs.list_dir",
  ]);

  const registry = new ToolRegistry();
  assert.deepEqual(registerBuiltinTools(registry, { allowList: ["ECHO", " fs.read_file ", ""] }), [
    "echo",
    "fs.read_file",
  ]);
  assert.deepEqual(registry.listNames(), ["echo", "fs.read_file"]);

  assert.equal(isToolAllowed("time.now", []), true);
  assert.equal(isToolAllowed("time.now", ["echo"]), false);
});

test("echo returns its message and rejects unknown arguments", async () => {
  const registry = createBuiltinRegistry();

  const echoed = await registry.execute("echo", { message: "hi" });
  assert.ok(echoed.ok);
  assert.deepEqual(echoed.result, { success: true, content: "hi" });

  const rejected = await registry.execute("echo", { message: "hi", extra: 1 });
  assert.ok(!rejected.ok);
  assert.equal(rejected.error.errorCode, "invalid_args");
  assert.match(rejected.error.message, /Unrecognized key/);
});

test("time.now reports the current time", async () => {
  const before = Date.now();
  const outcome = await createBuiltinRegistry().execute("time.now", {});

  assert.ok(outcome.ok);
  assert.ok(outcome.result.success);
  assert.match(outcome.result.content, /^timestamp=\d+, iso=\d{4}-\d{2}-\d{2}T/);
  const timestamp = outcome.result.metadata?.timestamp;
  assert.equal(typeof timestamp, "number");
  assert.ok(typeof timestamp === "number" && timestamp >= before);
});

test("write_file reports the written path as an artifact and read_file reads it back", async () => {
  await withTempDir(async (dir) => {
    const registry = createBuiltinRegistry();
    const context = createToolContext("cli", dir);
    const target = path.join(dir, "out", "a.txt");

    const written = await registry.execute(
      "fs.write_file",
      { path: "out/a.txt", content: "hello", createDir: true },
      context,
    );
    assert.ok(written.ok);
    assert.deepEqual(written.result, {
      success: true,
      content: `wrote ${target}`,
      artifacts: [target],
      metadata: { bytes: 5 },
    });

    const read = await registry.execute("fs.read_file", { path: "out/a.txt" }, context);
    assert.ok(read.ok);
    assert.deepEqual(read.result, {
      success: true,
      content: "hello",
      metadata: { path: target, size: 5, maxBytes: 204800 },
    });
  });
});

test("read_file reports business failures as failed results", async () => {
  await withTempDir(async (dir) => {
    const registry = createBuiltinRegistry();
    const context = createToolContext("cli", dir);
    await fs.writeFile(path.join(dir, "big.txt"), "hello", "utf-8");

    const tooLarge = await registry.execute("fs.read_file", { path: "big.txt", maxBytes: 2 }, context);
    assert.ok(tooLarge.ok);
    assert.deepEqual(tooLarge.result, {
      success: false,
      errorMessage: "file size exceeds maxBytes (5 > 2)",
    });

    const directory = await registry.execute("fs.read_file", { path: "." }, context);
    assert.ok(directory.ok);
    assert.deepEqual(directory.result, {
      success: false,
      errorMessage: `target path is not a file: ${dir}`,
    });

    const missing = await registry.execute("fs.read_file", { path: "nope.txt" }, context);
    assert.ok(missing.ok);
    assert.ok(!missing.result.success);
    assert.match(missing.result.errorMessage, /ENOENT/);
  });
});

test("write_file without createDir fails when the parent is missing", async () => {
  await withTempDir(async (dir) => {
    const outcome = await createBuiltinRegistry().execute(
      "fs.write_file",
      { path: "missing/a.txt", content: "x" },
      createToolContext("cli", dir),
    );
    assert.ok(outcome.ok);
    assert.ok(!outcome.result.success);
    assert.match(outcome.result.errorMessage, /ENOENT/);
  });
});

test("list_dir lists sorted entries and descends when recursive", async () => {
  await withTempDir(async (dir) => {
    await fs.mkdir(path.join(dir, "src"));
    await fs.writeFile(path.join(dir, "src", "main.ts"), "export {};\n", "utf-8");
    await fs.writeFile(path.join(dir, "notes.txt"), "", "utf-8");
    const registry = createBuiltinRegistry();
    const context = createToolContext("cli", dir);

    const flat = await registry.execute("fs.list_dir", {}, context);
    assert.ok(flat.ok);
    assert.ok(flat.result.success);
    assert.equal(flat.result.content, `listed 1 paths under ${dir}`);
    assert.deepEqual(flat.result.metadata?.nodes, [
      {
        depth: 0,
        path: dir,
        children: [
          { type: "file", name: "notes.txt", path: path.join(dir, "notes.txt") },
          { type: "directory", name: "src", path: path.join(dir, "src") },
        ],
      },
    ]);

    const deep = await registry.execute("fs.list_dir", { recursive: true }, context);
    assert.ok(deep.ok);
    assert.ok(deep.result.success);
    assert.equal(deep.result.content, `listed 2 paths under ${dir}`);
  });
});
