/**
 * Permission Resolver
 *
 * Computes the effective permission map for a user or group:
 *   1. starting groups = user's groups + primary group
 *   2. ancestry via InheritanceGraph, lowest weight first
 *   3. each group's applicable nodes, in that order
 *   4. the user's own nodes last
 * Every node overwrites its literal key (last writer wins), so higher
 * weight groups override lower ones and the user overrides every group.
 *
 * Stateless: each call builds a fresh ResolvedPermissions.
 */

import { PermissionError } from '../errors/permission-error';
import { type AliasTable, EMPTY_ALIASES } from '../registry/permission-aliases';
import { ContextSet } from '../types/context';
import type { Group, GroupLoader } from '../types/group';
import { NEGATION_PREFIX, type Node } from '../types/node';
import type { TriState } from '../types/tri-state';
import { asBoolean } from '../types/tri-state';
import { getUserGroups, type User } from '../types/user';
import { type Logger, silentLogger } from '../utils/logger';
import { InheritanceGraph, type TieBreak } from './inheritance-graph';
import type { PermissionTrace } from './permission-trace';
import { ResolvedPermissions } from './resolved-permissions';

export interface PermissionResolverOptions {
  /** Alias table consulted when a check is UNDEFINED. Default: none */
  aliases?: AliasTable;
  logger?: Logger;
  /** Time source for node expiry, epoch milliseconds. Default: Date.now */
  clock?: () => number;
  /** Ordering of equal-weight groups. Default: 'insertion' */
  tieBreak?: TieBreak;
  /** Retry checks with com./net./org./io./me. stripped. Default: true */
  stripNamespaces?: boolean;
}

function assertUser(user: unknown): asserts user is User {
  if (typeof user !== 'object' || user === null) {
    throw new PermissionError('user is required', 'INVALID_ARGUMENT');
  }
  if (!('primaryGroup' in user) || typeof user.primaryGroup !== 'string') {
    throw new PermissionError('user.primaryGroup must be a string', 'INVALID_ARGUMENT');
  }
  if (!('nodes' in user) || !Array.isArray(user.nodes)) {
    throw new PermissionError('user.nodes must be an array', 'INVALID_ARGUMENT');
  }
  if (
    !('inheritedGroups' in user) ||
    !(Array.isArray(user.inheritedGroups) || user.inheritedGroups instanceof Set)
  ) {
    throw new PermissionError(
      'user.inheritedGroups must be an array or a Set',
      'INVALID_ARGUMENT'
    );
  }
}

function assertGroup(group: unknown): asserts group is Group {
  if (typeof group !== 'object' || group === null) {
    throw new PermissionError('group is required', 'INVALID_ARGUMENT');
  }
  if (!('name' in group) || typeof group.name !== 'string' || group.name.length === 0) {
    throw new PermissionError('group.name must be a non-empty string', 'INVALID_ARGUMENT');
  }
  if (!('weight' in group) || typeof group.weight !== 'number' || Number.isNaN(group.weight)) {
    throw new PermissionError('group.weight must be a number', 'INVALID_ARGUMENT');
  }
  if (!('nodes' in group) || !Array.isArray(group.nodes)) {
    throw new PermissionError('group.nodes must be an array', 'INVALID_ARGUMENT');
  }
}

function assertContexts(contexts: unknown): asserts contexts is ContextSet {
  if (!(contexts instanceof ContextSet)) {
    throw new PermissionError('contexts must be a ContextSet', 'INVALID_ARGUMENT');
  }
}

function assertPermission(permission: unknown): asserts permission is string {
  if (typeof permission !== 'string') {
    throw new PermissionError('permission must be a string', 'INVALID_ARGUMENT');
  }
}

export class PermissionResolver {
  private readonly inheritanceGraph: InheritanceGraph;
  private readonly aliases: AliasTable;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly stripNamespaces: boolean;

  constructor(groupLoader: GroupLoader, options: PermissionResolverOptions = {}) {
    if (typeof groupLoader !== 'function') {
      throw new PermissionError('groupLoader must be a function', 'INVALID_ARGUMENT');
    }
    this.aliases = options.aliases ?? EMPTY_ALIASES;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
    this.stripNamespaces = options.stripNamespaces ?? true;
    this.inheritanceGraph = new InheritanceGraph(groupLoader, {
      tieBreak: options.tieBreak,
      logger: this.logger,
      clock: this.clock,
    });
  }

  getInheritanceGraph(): InheritanceGraph {
    return this.inheritanceGraph;
  }

  /**
   * Effective permissions of a user in the given contexts
   */
  resolve(user: User, contexts: ContextSet): ResolvedPermissions {
    assertUser(user);
    assertContexts(contexts);

    const startGroups = getUserGroups(user, contexts, this.clock());
    const groups = this.inheritanceGraph.resolveInheritance(startGroups, contexts);

    this.logger.debug('Resolving user permissions', {
      user: user.uuid,
      groups: groups.map((g) => g.name),
      contexts: contexts.toString(),
    });

    return this.build(groups, user.nodes, contexts);
  }

  /**
   * Effective permissions of a group and its ancestors, without a user
   */
  resolveGroup(group: Group, contexts: ContextSet): ResolvedPermissions {
    assertGroup(group);
    assertContexts(contexts);

    const groups = this.inheritanceGraph.resolveInheritance([group.name], contexts);
    return this.build(groups, [], contexts);
  }

  check(user: User, permission: string, contexts: ContextSet): TriState {
    assertPermission(permission);
    return this.resolve(user, contexts).check(permission);
  }

  checkWithTrace(user: User, permission: string, contexts: ContextSet): PermissionTrace {
    assertPermission(permission);
    return this.resolve(user, contexts).checkWithTrace(permission);
  }

  /**
   * True only when the check is TRUE; UNDEFINED counts as denied
   */
  hasPermission(user: User, permission: string, contexts: ContextSet): boolean {
    return asBoolean(this.check(user, permission, contexts));
  }

  private build(
    groups: readonly Group[],
    userNodes: readonly Node[],
    contexts: ContextSet
  ): ResolvedPermissions {
    const now = this.clock();
    const permissions = new Map<string, boolean>();
    const sources = new Map<string, string | null>();

    const apply = (node: Node, source: string | null): void => {
      let permission = node.permission;
      let value = node.value;
      if (permission.startsWith(NEGATION_PREFIX)) {
        permission = permission.substring(NEGATION_PREFIX.length);
        value = !value;
      }

      permissions.set(permission, value);
      sources.set(permission, source);
    };

    for (const group of groups) {
      for (const node of this.inheritanceGraph.filterNodes(group.nodes, contexts, now)) {
        apply(node, group.name);
      }
    }
    for (const node of this.inheritanceGraph.filterNodes(userNodes, contexts, now)) {
      apply(node, null);
    }

    return new ResolvedPermissions(permissions, sources, contexts, this.aliases, {
      stripNamespaces: this.stripNamespaces,
    });
  }
}
