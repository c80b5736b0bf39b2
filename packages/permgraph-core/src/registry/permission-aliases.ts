/**
 * Permission Aliases
 *
 * Maps between a simplified, plugin-facing permission namespace and the
 * actual permission nodes a host checks, e.g.
 *   server.command.gamemode -> server.command.gamemode.self, server.command.gamemode.other
 *
 * Consulted only when a direct or wildcard match is UNDEFINED.
 */

/**
 * Lookup the resolver consults for aliased permissions
 */
export interface AliasTable {
  /** Simplified aliases of an actual permission */
  getAliases(permission: string): ReadonlySet<string>;
  /** Actual permissions a simplified permission maps to */
  getActualPermissions(permission: string): ReadonlySet<string>;
}

const EMPTY_SET: ReadonlySet<string> = new Set();

export class PermissionAliases implements AliasTable {
  private readonly aliasToActual = new Map<string, Set<string>>();
  private readonly actualToAlias = new Map<string, Set<string>>();

  /**
   * Build from a simplified -> actual[] record, as stored in JSON
   */
  static from(record: Record<string, readonly string[]>): PermissionAliases {
    const aliases = new PermissionAliases();
    for (const [simplified, actual] of Object.entries(record)) {
      aliases.alias(simplified, ...actual);
    }
    return aliases;
  }

  /**
   * Register a simplified permission (or wildcard) and what it maps to
   */
  alias(simplified: string, ...actual: string[]): this {
    const lowerSimplified = simplified.toLowerCase();
    let actuals = this.aliasToActual.get(lowerSimplified);
    if (!actuals) {
      actuals = new Set();
      this.aliasToActual.set(lowerSimplified, actuals);
    }

    for (const permission of actual) {
      const lowerActual = permission.toLowerCase();
      actuals.add(lowerActual);

      let aliases = this.actualToAlias.get(lowerActual);
      if (!aliases) {
        aliases = new Set();
        this.actualToAlias.set(lowerActual, aliases);
      }
      aliases.add(lowerSimplified);
    }
    return this;
  }

  getActualPermissions(permission: string): ReadonlySet<string> {
    return this.aliasToActual.get(permission.toLowerCase()) ?? EMPTY_SET;
  }

  getAliases(permission: string): ReadonlySet<string> {
    return this.actualToAlias.get(permission.toLowerCase()) ?? EMPTY_SET;
  }

  /**
   * The permission plus every actual permission it maps to
   */
  expand(permission: string): Set<string> {
    const lowerPermission = permission.toLowerCase();
    return new Set([lowerPermission, ...this.getActualPermissions(lowerPermission)]);
  }

  hasAliases(permission: string): boolean {
    const lowerPermission = permission.toLowerCase();
    return this.aliasToActual.has(lowerPermission) || this.actualToAlias.has(lowerPermission);
  }

  getAllAliases(): Map<string, ReadonlySet<string>> {
    return new Map(this.aliasToActual);
  }

  size(): number {
    return this.aliasToActual.size;
  }

  clear(): void {
    this.aliasToActual.clear();
    this.actualToAlias.clear();
  }
}

/**
 * Alias table with no entries
 */
export const EMPTY_ALIASES: AliasTable = {
  getAliases: () => EMPTY_SET,
  getActualPermissions: () => EMPTY_SET,
};
