/**
 * Resolved Permissions
 *
 * Immutable effective permission map for one principal in one ContextSet,
 * plus the group each key came from. Answers checks with wildcard matching
 * and, when nothing matches, the alias table.
 */

import type { AliasTable } from '../registry/permission-aliases';
import type { PermissionUniverse } from '../registry/permission-registry';
import type { ContextSet } from '../types/context';
import type { MatchResult, TriState } from '../types/tri-state';
import { asBoolean, isMatched } from '../types/tri-state';
import { PermissionTrace } from './permission-trace';
import * as WildcardMatcher from './wildcard-matcher';
import type { MatchOptions } from './wildcard-matcher';

export interface ResolvedPermissionsJson {
  contexts: Record<string, string[]>;
  permissions: Array<{ permission: string; value: boolean; source: string }>;
}

function isWildcardPattern(permission: string): boolean {
  return permission === '*' || permission.endsWith('.*');
}

export class ResolvedPermissions {
  private readonly permissions: ReadonlyMap<string, boolean>;
  /** key -> group name, null when the key came from the user */
  private readonly sources: ReadonlyMap<string, string | null>;
  private readonly resolvedContexts: ContextSet;
  private readonly aliases: AliasTable;
  private readonly matchOptions: MatchOptions;

  constructor(
    permissions: ReadonlyMap<string, boolean>,
    sources: ReadonlyMap<string, string | null>,
    contexts: ContextSet,
    aliases: AliasTable,
    matchOptions: MatchOptions = {}
  ) {
    this.permissions = new Map(permissions);
    this.sources = new Map(sources);
    this.resolvedContexts = contexts;
    this.aliases = aliases;
    this.matchOptions = matchOptions;
  }

  /**
   * Check a permission; falls back to its aliases when nothing matches
   */
  check(permission: string): TriState {
    return this.match(permission).result;
  }

  /**
   * Check a permission and report which key, and which group, decided it
   */
  checkWithTrace(permission: string): PermissionTrace {
    const match = this.match(permission);
    if (!isMatched(match) || match.matchedNode === null) {
      return PermissionTrace.notFound(permission, this.resolvedContexts);
    }

    const sourceGroup = this.sources.get(match.matchedNode);
    if (typeof sourceGroup === 'string') {
      return PermissionTrace.fromGroup(
        permission,
        match.result,
        match.matchedNode,
        match.matchType,
        sourceGroup,
        this.resolvedContexts
      );
    }

    return PermissionTrace.fromUser(
      permission,
      match.result,
      match.matchedNode,
      match.matchType,
      this.resolvedContexts
    );
  }

  hasPermission(permission: string): boolean {
    return asBoolean(this.check(permission));
  }

  private match(permission: string): MatchResult {
    const lowerPermission = permission.toLowerCase();
    const direct = WildcardMatcher.checkWithTrace(lowerPermission, this.permissions, this.matchOptions);
    if (isMatched(direct) || lowerPermission.length === 0) {
      return direct;
    }

    // Simplified aliases of this permission, then what it maps to
    const candidates = [
      ...this.aliases.getAliases(lowerPermission),
      ...this.aliases.getActualPermissions(lowerPermission),
    ];
    for (const candidate of candidates) {
      const aliased = WildcardMatcher.checkWithTrace(candidate, this.permissions, this.matchOptions);
      if (isMatched(aliased)) {
        return aliased;
      }
    }

    return direct;
  }

  getPermissions(): ReadonlyMap<string, boolean> {
    return this.permissions;
  }

  /**
   * Group that set a key; null when set by the user, undefined when absent
   */
  getSource(permission: string): string | null | undefined {
    return this.sources.get(permission.toLowerCase());
  }

  getGrantedPermissions(): Set<string> {
    const granted = new Set<string>();
    for (const [permission, value] of this.permissions) {
      if (value) {
        granted.add(permission);
      }
    }
    return granted;
  }

  getDeniedPermissions(): Set<string> {
    const denied = new Set<string>();
    for (const [permission, value] of this.permissions) {
      if (!value) {
        denied.add(permission);
      }
    }
    return denied;
  }

  /**
   * Granted keys with wildcards and aliases expanded to concrete strings,
   * for hosts whose permission check is plain set membership
   */
  getExpandedPermissions(registry: PermissionUniverse): Set<string> {
    const granted = this.getGrantedPermissions();
    const expanded = new Set(granted);

    for (const permission of granted) {
      for (const actual of this.aliases.getActualPermissions(permission)) {
        expanded.add(actual);
        if (isWildcardPattern(permission) && actual.endsWith('.*')) {
          for (const concrete of registry.getMatchingPermissions(actual)) {
            expanded.add(concrete);
          }
        }
      }

      if (isWildcardPattern(permission)) {
        for (const concrete of registry.getMatchingPermissions(permission)) {
          expanded.add(concrete);
        }
      }
    }

    return expanded;
  }

  getResolvedContexts(): ContextSet {
    return this.resolvedContexts;
  }

  size(): number {
    return this.permissions.size;
  }

  isEmpty(): boolean {
    return this.permissions.size === 0;
  }

  toJSON(): ResolvedPermissionsJson {
    return {
      contexts: this.resolvedContexts.toJSON(),
      permissions: Array.from(this.permissions, ([permission, value]) => {
        const source = this.sources.get(permission);
        return {
          permission,
          value,
          source: typeof source === 'string' ? `group:${source}` : 'user',
        };
      }),
    };
  }
}
