/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createLogger, setLogger } from '../core/logger.js';
import { createPoliciesCommand } from './commands/policies.js';
import { createSimulateCommand } from './commands/simulate.js';

/** Where commands look for configuration (default: the process environment and `~/.ledgersched`) */
export interface CliContext {
  env?: NodeJS.ProcessEnv;
  globalDir?: string;
}

export function createCLI(context: CliContext = {}): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Policy-driven VM scheduling with a hash-chained decision ledger')
    .option('-v, --verbose', 'Log to the terminal instead of the log file')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogger(createLogger({ name: NAME, verbose: true }));
      }
    });

  program.addCommand(createPoliciesCommand());
  program.addCommand(createSimulateCommand(context));

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
