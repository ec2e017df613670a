import { Command } from 'commander';
import { resolveServerConfig } from '../../config/serverConfig.js';
import { registerBuiltinTools } from '../../tools/builtin/index.js';
import { ToolRegistry, createToolContext } from '../../tools/registry.js';
import type { ToolCatalogEntry } from '../../tools/types.js';
import { runCommand } from '../shared/result.js';
import { setExitCode } from '../shared/exitCode.js';

export type ToolsCommandInput =
  | { kind: 'list' }
  | { kind: 'info'; name: string }
  | { kind: 'invoke'; name: string; rawArgs?: string };

export interface ToolsCommandDeps {
  registry: ToolRegistry;
  cwd: string;
}

function toCatalogEntry(tool: ToolCatalogEntry): ToolCatalogEntry {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
  };
}

export function createCliDeps(env: NodeJS.ProcessEnv = process.env): ToolsCommandDeps {
  const config = resolveServerConfig(env);
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, { allowList: config.toolAllowList });
  return { registry, cwd: config.cwd };
}

export async function runToolsCommand(parsed: ToolsCommandInput, deps: ToolsCommandDeps): Promise<number> {
  return runCommand(async () => {
    if (parsed.kind === 'list') {
      const tools = deps.registry.listTools().map(toCatalogEntry);
      console.log(JSON.stringify(tools, null, 2));
      return 0;
    }

    if (parsed.kind === 'info') {
      const tool = deps.registry.lookup(parsed.name);
      if (!tool) {
        console.error(`Tool not found: ${parsed.name}`);
        return 1;
      }
      console.log(JSON.stringify(toCatalogEntry(tool), null, 2));
      return 0;
    }

    let parsedArgs: unknown = {};
    if (typeof parsed.rawArgs === 'string' && parsed.rawArgs.length > 0) {
      try {
        parsedArgs = JSON.parse(parsed.rawArgs);
      } catch (error) {
        console.error(`Invalid --args json: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
      }
    }

    // Same gateway as the protocol server; a ToolError propagates to runCommand.
    const result = await deps.registry.executeOrThrow(parsed.name, parsedArgs, createToolContext('cli', deps.cwd));
    console.log(JSON.stringify(result, null, 2));
    return result.success ? 0 : 1;
  });
}

export function buildToolsCommand(program: Command, resolveDeps: () => ToolsCommandDeps = createCliDeps): Command {
  const tools = program.command('tools').description('Inspect and invoke registered tools');

  tools.addHelpText(
    'after',
    [
      'Examples:',
      '  toolwire tools list',
      '  toolwire tools info <name>',
      '  toolwire tools invoke echo --args "{\\"message\\":\\"hi\\"}"',
    ].join('\n'),
  );

  tools
    .command('list')
    .description('List tools.')
    .action(async () => {
      const code = await runToolsCommand({ kind: 'list' }, resolveDeps());
      setExitCode(code);
    });

  tools
    .command('info')
    .description('Show tool info.')
    .argument('<name>', 'Tool name.')
    .action(async (name: string) => {
      const code = await runToolsCommand({ kind: 'info', name }, resolveDeps());
      setExitCode(code);
    });

  tools
    .command('invoke')
    .description('Invoke tool.')
    .argument('<name>', 'Tool name.')
    .option('--args <json>', 'Tool arguments in json string.')
    .action(async (name: string, options: { args?: string }) => {
      const code = await runToolsCommand({ kind: 'invoke', name, rawArgs: options.args }, resolveDeps());
      setExitCode(code);
    });

  return tools;
}
