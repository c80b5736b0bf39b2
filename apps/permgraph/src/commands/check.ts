/**
 * User check commands: check, trace
 */

import { getFriendlyName } from '@permgraph/core';
import { Command } from 'commander';
import { collect, type ContextOptions, type GlobalOptions, openSession, requireUser } from '../session';
import { formatResult, getOutputFormat, printJson } from '../utils/output';

type CheckOptions = GlobalOptions & ContextOptions;

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check a permission for a user (TRUE, FALSE or UNDEFINED)')
    .argument('<user>', 'User uuid or username')
    .argument('<permission>', 'Permission to check')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((userArg: string, permission: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<CheckOptions>();
      const session = openSession(options, options.context);
      const user = requireUser(session, userArg);
      const result = session.resolver.check(user, permission, session.contexts);

      if (getOutputFormat() === 'json') {
        printJson({
          user: getFriendlyName(user),
          permission: permission.toLowerCase(),
          result,
          contexts: session.contexts.toJSON(),
        });
        return;
      }
      console.log(formatResult(result));
    });
}

export function createTraceCommand(): Command {
  return new Command('trace')
    .description('Explain which node and group decided a permission check')
    .argument('<user>', 'User uuid or username')
    .argument('<permission>', 'Permission to check')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((userArg: string, permission: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<CheckOptions>();
      const session = openSession(options, options.context);
      const user = requireUser(session, userArg);
      const trace = session.resolver.checkWithTrace(user, permission, session.contexts);

      if (getOutputFormat() === 'json') {
        printJson(trace.toJSON());
        return;
      }
      console.log(trace.toVerboseString().trimEnd());
    });
}
