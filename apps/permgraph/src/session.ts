/**
 * Session
 *
 * Resolves the snapshot path and default contexts from the global options,
 * environment and config file, and builds a resolver over the snapshot.
 */

import {
  Context,
  ContextSet,
  createGroupLoader,
  createLogger,
  type Group,
  type GroupLoader,
  type LoggerOptions,
  PermissionResolver,
  type TieBreak,
  type User,
} from '@permgraph/core';
import { loadConfig } from './config/config-manager';
import { CliError } from './errors';
import { findUser, loadSnapshot, type Snapshot } from './snapshot/snapshot-loader';
import { isVerbose, verbose } from './utils/output';

export const SNAPSHOT_ENV = 'PERMGRAPH_SNAPSHOT';

export type GlobalOptions = {
  snapshot?: string;
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
  tieBreak?: string;
  strip?: boolean;
};

export type ContextOptions = {
  context: string[];
};

export interface Session {
  snapshot: Snapshot;
  groupLoader: GroupLoader;
  resolver: PermissionResolver;
  contexts: ContextSet;
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function isTieBreak(value: string): value is TieBreak {
  return value === 'insertion' || value === 'name';
}

/**
 * Snapshot path: --snapshot, then $PERMGRAPH_SNAPSHOT, then config
 */
export function resolveSnapshotPath(options: GlobalOptions): string {
  const path = options.snapshot ?? process.env[SNAPSHOT_ENV] ?? loadConfig().snapshot;
  if (!path) {
    throw new CliError(
      `No snapshot given. Pass --snapshot <path>, set ${SNAPSHOT_ENV} or run: permgraph config set snapshot <path>`
    );
  }
  return path;
}

/**
 * Configured default contexts followed by the command's own
 */
export function buildContexts(extra: readonly string[] = []): ContextSet {
  const builder = ContextSet.builder();
  for (const text of [...(loadConfig().contexts ?? []), ...extra]) {
    builder.add(Context.parse(text));
  }
  return builder.build();
}

export function openSession(options: GlobalOptions, contextArgs: readonly string[] = []): Session {
  const path = resolveSnapshotPath(options);
  const snapshot = loadSnapshot(path);
  verbose(
    `Loaded ${path}: ${snapshot.groups.length} groups, ${snapshot.users.length} users, ${snapshot.registry.size()} permissions`
  );

  const tieBreak = options.tieBreak ?? 'insertion';
  if (!isTieBreak(tieBreak)) {
    throw new CliError(`Invalid tie-break: ${tieBreak} (expected insertion or name)`);
  }

  const loggerOptions: LoggerOptions = isVerbose() ? { level: 'debug' } : {};
  const groupLoader = createGroupLoader(snapshot.groups);
  const resolver = new PermissionResolver(groupLoader, {
    aliases: snapshot.aliases,
    logger: createLogger('PermissionResolver', loggerOptions),
    tieBreak,
    stripNamespaces: options.strip ?? true,
  });

  const contexts = buildContexts(contextArgs);
  verbose(`Active contexts: ${contexts.toString()}`);

  return { snapshot, groupLoader, resolver, contexts };
}

export function requireUser(session: Session, idOrName: string): User {
  const user = findUser(session.snapshot, idOrName);
  if (!user) {
    throw new CliError(`User not found: ${idOrName}`);
  }
  return user;
}

export function requireGroup(session: Session, name: string): Group {
  const group = session.groupLoader(name);
  if (!group) {
    throw new CliError(`Group not found: ${name}`);
  }
  return group;
}
