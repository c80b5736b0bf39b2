/**
 * CLI Configuration
 */

import { Command } from 'commander';
import { createCheckCommand, createTraceCommand } from './commands/check';
import { createConfigCommand } from './commands/config';
import { createCycleCommand, createGroupCommand } from './commands/group';
import { createPermissionsCommand } from './commands/permissions';
import { createExpandCommand, createNodesCommand, createResolveCommand } from './commands/resolve';
import { loadConfig } from './config/config-manager';
import { CliError } from './errors';
import type { GlobalOptions } from './session';
import { isOutputFormat, setOutputFormat, setQuietMode, setVerboseMode } from './utils/output';

export function createCli(): Command {
  const program = new Command();

  program
    .name('permgraph')
    .description('Inspect permission resolution over a snapshot of groups and users')
    .version('1.0.0');

  // Global options
  program
    .option('-o, --output <format>', 'Output format: json or table (default: config, else table)')
    .option('-q, --quiet', 'Quiet mode - minimal output')
    .option('-v, --verbose', 'Verbose mode - detailed output')
    .option('--snapshot <path>', 'Snapshot file (default: $PERMGRAPH_SNAPSHOT, else config)')
    .option('--tie-break <mode>', 'Order of equal-weight groups: insertion or name')
    .option('--no-strip', 'Do not retry checks with com./net./org./io./me. stripped')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      const output = opts.output ?? loadConfig().output ?? 'table';
      if (!isOutputFormat(output)) {
        throw new CliError(`Invalid output format: ${output} (expected json or table)`);
      }
      setOutputFormat(output);
      setQuietMode(opts.quiet ?? false);
      setVerboseMode(opts.verbose ?? false);
    });

  // Checks against a user
  program.addCommand(createCheckCommand());
  program.addCommand(createTraceCommand());
  program.addCommand(createResolveCommand());
  program.addCommand(createExpandCommand());
  program.addCommand(createNodesCommand());

  // Groups
  program.addCommand(createGroupCommand());
  program.addCommand(createCycleCommand());

  // Registry
  program.addCommand(createPermissionsCommand());

  // Config command
  program.addCommand(createConfigCommand());

  return program;
}
