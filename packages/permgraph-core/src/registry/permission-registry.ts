/**
 * Permission Registry
 *
 * The universe of known concrete permissions. Used to expand wildcards into
 * concrete strings for hosts that only test set membership.
 */

import { type Logger, silentLogger } from '../utils/logger';

/**
 * Anything that can list the concrete permissions a wildcard covers
 */
export interface PermissionUniverse {
  getMatchingPermissions(pattern: string): ReadonlySet<string>;
}

export interface PermissionInfo {
  permission: string;
  description: string;
  category: string;
  /** Plugin or module that declared the permission */
  source: string;
  isWildcard: boolean;
}

export const DEFAULT_SOURCE = 'permgraph';

function byPermission(a: PermissionInfo, b: PermissionInfo): number {
  if (a.permission === b.permission) {
    return 0;
  }
  return a.permission < b.permission ? -1 : 1;
}

export class PermissionRegistry implements PermissionUniverse {
  private readonly permissions = new Map<string, PermissionInfo>();
  private readonly byCategory = new Map<string, Set<string>>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register a permission; false when it was already registered
   */
  register(
    permission: string,
    description: string,
    category: string,
    source: string = DEFAULT_SOURCE
  ): boolean {
    const normalized = permission.toLowerCase();
    if (this.permissions.has(normalized)) {
      return false;
    }

    const normalizedCategory = category.toLowerCase();
    this.permissions.set(normalized, {
      permission: normalized,
      description,
      category: normalizedCategory,
      source,
      isWildcard: normalized === '*' || normalized.endsWith('.*'),
    });

    let categorySet = this.byCategory.get(normalizedCategory);
    if (!categorySet) {
      categorySet = new Set();
      this.byCategory.set(normalizedCategory, categorySet);
    }
    categorySet.add(normalized);

    this.logger.debug('Registered permission', {
      permission: normalized,
      category: normalizedCategory,
      source,
    });
    return true;
  }

  /**
   * Register permission -> description pairs under one category
   */
  registerAll(permissions: Record<string, string>, category: string, source?: string): void {
    for (const [permission, description] of Object.entries(permissions)) {
      this.register(permission, description, category, source);
    }
  }

  unregister(permission: string): boolean {
    const normalized = permission.toLowerCase();
    const removed = this.permissions.get(normalized);
    if (!removed) {
      return false;
    }
    this.permissions.delete(normalized);
    this.byCategory.get(removed.category)?.delete(normalized);
    return true;
  }

  get(permission: string): PermissionInfo | undefined {
    return this.permissions.get(permission.toLowerCase());
  }

  isRegistered(permission: string): boolean {
    return this.permissions.has(permission.toLowerCase());
  }

  getAll(): PermissionInfo[] {
    return Array.from(this.permissions.values());
  }

  getByCategory(category: string): PermissionInfo[] {
    const permissions = this.byCategory.get(category.toLowerCase());
    if (!permissions) {
      return [];
    }
    const result: PermissionInfo[] = [];
    for (const permission of permissions) {
      const info = this.permissions.get(permission);
      if (info) {
        result.push(info);
      }
    }
    return result.sort(byPermission);
  }

  getCategories(): string[] {
    return Array.from(this.byCategory.keys());
  }

  /**
   * Permissions whose name or description contains the query
   */
  search(query: string): PermissionInfo[] {
    const lowerQuery = query.toLowerCase();
    return this.getAll()
      .filter(
        (info) =>
          info.permission.includes(lowerQuery) ||
          info.description.toLowerCase().includes(lowerQuery)
      )
      .sort(byPermission);
  }

  getBySource(source: string): PermissionInfo[] {
    const lowerSource = source.toLowerCase();
    return this.getAll()
      .filter((info) => info.source.toLowerCase() === lowerSource)
      .sort(byPermission);
  }

  size(): number {
    return this.permissions.size;
  }

  clear(): void {
    this.permissions.clear();
    this.byCategory.clear();
  }

  /**
   * Concrete permissions covered by a wildcard.
   * "*" gives every non-wildcard entry; "a.*" every entry under "a."
   * except the pattern itself; anything else gives an empty set.
   */
  getMatchingPermissions(pattern: string): Set<string> {
    const lowerPattern = pattern.toLowerCase();
    const result = new Set<string>();

    if (lowerPattern === '*') {
      for (const permission of this.permissions.keys()) {
        if (!permission.includes('*')) {
          result.add(permission);
        }
      }
      return result;
    }

    if (lowerPattern.endsWith('.*')) {
      const prefix = lowerPattern.substring(0, lowerPattern.length - 1);
      for (const permission of this.permissions.keys()) {
        if (permission.startsWith(prefix) && permission !== lowerPattern) {
          result.add(permission);
        }
      }
    }

    return result;
  }
}
