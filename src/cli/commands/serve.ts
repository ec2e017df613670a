import { Command } from 'commander';
import { parseToolAllowList, resolveServerConfig } from '../../config/serverConfig.js';
import { runStdioServer } from '../../rpc/server.js';
import { runCommand } from '../shared/result.js';
import { setExitCode } from '../shared/exitCode.js';

interface ServeOptions {
  toolAllow?: string;
  debug?: boolean;
  cwd?: string;
}

export function buildServeCommand(program: Command): Command {
  return program
    .command('serve')
    .description('Serve registered tools over line-delimited JSON-RPC on stdin/stdout')
    .option('--tool-allow <tool1,tool2>', 'Limit registered tool names.')
    .option('--debug', 'Log every request to stderr.')
    .option('--cwd <path>', 'Working directory handed to tools.')
    .action(async (options: ServeOptions) => {
      const code = await runCommand(async () => {
        const config = resolveServerConfig(process.env, {
          debug: options.debug,
          cwd: options.cwd,
          toolAllowList: parseToolAllowList(options.toolAllow),
        });
        await runStdioServer(config);
        return 0;
      });
      setExitCode(code);
    });
}
