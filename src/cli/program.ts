import { Command } from 'commander';
import { buildServeCommand } from './commands/serve.js';
import { buildToolsCommand } from './commands/tools.js';
import { setExitCode } from './shared/exitCode.js';
import { VERSION } from './version.js';

export function buildProgram(): Command {
  const program = new Command('toolwire');

  program
    .description('Pluggable tool registry served over JSON-RPC and the command line')
    .helpOption('-h, --help', 'display help for command')
    .option('-v, --version', 'display version')
    .allowExcessArguments(true)
    .action((_options, command: Command) => {
      if (command.opts().version) {
        console.log(`toolwire v${VERSION}`);
        setExitCode(0);
        return;
      }

      if (command.args.length > 0) {
        console.error(`Unknown command: ${command.args[0]}`);
        setExitCode(1);
        return;
      }

      command.outputHelp();
      setExitCode(0);
    });

  buildServeCommand(program);
  buildToolsCommand(program);

  return program;
}
