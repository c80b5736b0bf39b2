/**
 * Effective permission commands: resolve, expand
 */

import { formatExpiry, type ResolvedPermissions } from '@permgraph/core';
import { Command } from 'commander';
import { collect, type ContextOptions, type GlobalOptions, openSession, requireUser } from '../session';
import { formatValue, getOutputFormat, printData, printJson } from '../utils/output';

type ResolveOptions = GlobalOptions & ContextOptions;

interface PermissionRow {
  permission: string;
  value: boolean;
  source: string;
}

/**
 * Print an effective permission map, sorted by permission
 */
export function printResolved(resolved: ResolvedPermissions): void {
  const json = resolved.toJSON();
  if (getOutputFormat() === 'json') {
    printJson(json);
    return;
  }
  const rows: PermissionRow[] = [...json.permissions].sort((a, b) =>
    a.permission < b.permission ? -1 : a.permission > b.permission ? 1 : 0
  );
  printData(rows, {
    headers: ['PERMISSION', 'VALUE', 'SOURCE'],
    getRow: (row) => [row.permission, formatValue(row.value), row.source],
  });
}

export function createResolveCommand(): Command {
  return new Command('resolve')
    .description("Show a user's effective permissions and where each came from")
    .argument('<user>', 'User uuid or username')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((userArg: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<ResolveOptions>();
      const session = openSession(options, options.context);
      const user = requireUser(session, userArg);
      printResolved(session.resolver.resolve(user, session.contexts));
    });
}

export function createExpandCommand(): Command {
  return new Command('expand')
    .description("List a user's granted permissions with wildcards and aliases expanded")
    .argument('<user>', 'User uuid or username')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((userArg: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<ResolveOptions>();
      const session = openSession(options, options.context);
      const user = requireUser(session, userArg);
      const expanded = Array.from(
        session.resolver.resolve(user, session.contexts).getExpandedPermissions(session.snapshot.registry)
      ).sort();

      if (getOutputFormat() === 'json') {
        printJson(expanded);
        return;
      }
      for (const permission of expanded) {
        console.log(permission);
      }
    });
}

export function createNodesCommand(): Command {
  return new Command('nodes')
    .description("List a user's own nodes with their contexts and expiry")
    .argument('<user>', 'User uuid or username')
    .action((userArg: string, _options: unknown, command: Command) => {
      const session = openSession(command.optsWithGlobals<GlobalOptions>());
      const user = requireUser(session, userArg);
      const rows = user.nodes.map((node) => ({
        permission: node.permission,
        value: node.value,
        contexts: node.contexts.toJSON(),
        expiry: node.expiry === undefined ? null : new Date(node.expiry).toISOString(),
      }));

      printData(rows, {
        headers: ['PERMISSION', 'VALUE', 'CONTEXTS', 'EXPIRY'],
        getRow: (row) => [
          row.permission,
          formatValue(row.value),
          Object.entries(row.contexts)
            .flatMap(([key, values]) => values.map((v) => `${key}=${v}`))
            .join(', '),
          formatExpiry(row.expiry === null ? undefined : Date.parse(row.expiry)),
        ],
      });
    });
}
