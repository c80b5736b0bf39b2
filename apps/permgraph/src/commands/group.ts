/**
 * Group commands: group resolve|tree|check|chain, cycle
 */

import { type ContextSet, getGroupParents, type GroupLoader } from '@permgraph/core';
import chalk from 'chalk';
import { Command } from 'commander';
import {
  collect,
  type ContextOptions,
  type GlobalOptions,
  openSession,
  requireGroup,
} from '../session';
import { formatResult, getOutputFormat, printData, printJson } from '../utils/output';
import { printResolved } from './resolve';

type GroupOptions = GlobalOptions & ContextOptions;

export interface GroupTreeNode {
  name: string;
  weight: number;
  /** Set when the group is missing from the snapshot */
  missing?: true;
  /** Set when the group already appears above this point */
  cycle?: true;
  parents: GroupTreeNode[];
}

/**
 * Parent tree of a group in the given contexts. Each branch stops at a
 * group already on its path or missing from the snapshot.
 */
export function buildGroupTree(
  name: string,
  loader: GroupLoader,
  contexts: ContextSet,
  path: ReadonlySet<string> = new Set()
): GroupTreeNode {
  const lower = name.toLowerCase();
  const group = loader(lower);
  if (!group) {
    return { name: lower, weight: 0, missing: true, parents: [] };
  }
  if (path.has(lower)) {
    return { name: group.name, weight: group.weight, cycle: true, parents: [] };
  }

  const nextPath = new Set(path).add(lower);
  return {
    name: group.name,
    weight: group.weight,
    parents: getGroupParents(group, contexts).map((parent) =>
      buildGroupTree(parent, loader, contexts, nextPath)
    ),
  };
}

export function renderGroupTree(node: GroupTreeNode, depth = 0): string[] {
  let label = `${'  '.repeat(depth)}${node.name}`;
  if (node.missing) {
    label += chalk.yellow(' (missing)');
  } else {
    label += chalk.gray(` (${node.weight})`);
  }
  if (node.cycle) {
    label += chalk.red(' (cycle)');
  }
  return [label, ...node.parents.flatMap((parent) => renderGroupTree(parent, depth + 1))];
}

export function createGroupCommand(): Command {
  const group = new Command('group').description('Inspect groups and their inheritance');

  // group resolve
  group
    .command('resolve <group>')
    .description('Show the effective permissions of a group and its ancestors')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((name: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<GroupOptions>();
      const session = openSession(options, options.context);
      printResolved(session.resolver.resolveGroup(requireGroup(session, name), session.contexts));
    });

  // group check
  group
    .command('check <group> <permission>')
    .description('Check a permission against a group and its ancestors')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((name: string, permission: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<GroupOptions>();
      const session = openSession(options, options.context);
      const resolved = session.resolver.resolveGroup(requireGroup(session, name), session.contexts);
      const trace = resolved.checkWithTrace(permission);

      if (getOutputFormat() === 'json') {
        printJson(trace.toJSON());
        return;
      }
      console.log(formatResult(trace.result));
    });

  // group tree
  group
    .command('tree <group>')
    .description('Show the parent tree of a group')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((name: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<GroupOptions>();
      const session = openSession(options, options.context);
      const tree = buildGroupTree(requireGroup(session, name).name, session.groupLoader, session.contexts);

      if (getOutputFormat() === 'json') {
        printJson(tree);
        return;
      }
      for (const line of renderGroupTree(tree)) {
        console.log(line);
      }
    });

  // group chain
  group
    .command('chain <group>')
    .description('List a group and its ancestors in the order they are applied')
    .option('-c, --context <key=value>', 'Active context (repeatable)', collect, [])
    .action((name: string, _options: ContextOptions, command: Command) => {
      const options = command.optsWithGlobals<GroupOptions>();
      const session = openSession(options, options.context);
      const chain = session.resolver
        .getInheritanceGraph()
        .resolveInheritance([requireGroup(session, name).name], session.contexts);

      printData(
        chain.map((g) => ({ name: g.name, weight: g.weight })),
        {
          headers: ['GROUP', 'WEIGHT'],
          getRow: (row) => [row.name, String(row.weight)],
        }
      );
    });

  return group;
}

export function createCycleCommand(): Command {
  return new Command('cycle')
    .description('Check whether adding a parent to a group would create an inheritance cycle')
    .argument('<group>', 'Group to add the parent to')
    .argument('<parent>', 'Proposed parent group')
    .action((name: string, parent: string, _options: unknown, command: Command) => {
      const session = openSession(command.optsWithGlobals<GlobalOptions>());
      const group = requireGroup(session, name);
      const wouldCreateCycle = session.resolver.getInheritanceGraph().wouldCreateCycle(group, parent);

      if (getOutputFormat() === 'json') {
        printJson({ group: group.name, parent: parent.toLowerCase(), wouldCreateCycle });
        return;
      }
      console.log(
        wouldCreateCycle
          ? chalk.red(`Adding ${parent.toLowerCase()} as a parent of ${group.name} would create a cycle`)
          : chalk.green(`Adding ${parent.toLowerCase()} as a parent of ${group.name} is safe`)
      );
    });
}
