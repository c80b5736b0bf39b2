/**
 * Snapshot Loader
 *
 * Reads a JSON snapshot of groups, users, aliases and known permissions into
 * the plain data the resolver consumes. Validation collects every problem
 * before failing, so one run reports the whole file.
 *
 * Node entries:
 *   "fly.use"
 *   { "permission": "fly.use", "value": false,
 *     "contexts": { "world": ["nether", "end"] },
 *     "expiry": "2030-01-01T00:00:00Z" | "expiresIn": "7d" }
 */

import { readFileSync } from 'node:fs';
import {
  DEFAULT_GROUP,
  type Group,
  Node,
  PermissionAliases,
  PermissionError,
  PermissionRegistry,
  parseDuration,
  type User,
} from '@permgraph/core';

export const SNAPSHOT_SOURCE = 'snapshot';
export const DEFAULT_CATEGORY = 'general';

export interface Snapshot {
  groups: Group[];
  users: User[];
  aliases: PermissionAliases;
  registry: PermissionRegistry;
}

export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

export interface ParseOptions {
  /** Reference time for relative expiries, epoch milliseconds */
  now?: number;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

class SnapshotParser {
  readonly issues: string[] = [];

  constructor(private readonly now: number) {}

  private issue(path: string, message: string): void {
    this.issues.push(`${path}: ${message}`);
  }

  parseNode(raw: unknown, path: string): Node | undefined {
    try {
      if (typeof raw === 'string') {
        return Node.of(raw);
      }
      if (!isObject(raw)) {
        this.issue(path, 'node must be a string or an object');
        return undefined;
      }
      if (typeof raw.permission !== 'string') {
        this.issue(path, 'permission must be a string');
        return undefined;
      }

      const builder = Node.builder(raw.permission);
      if (raw.value !== undefined) {
        if (typeof raw.value !== 'boolean') {
          this.issue(path, 'value must be a boolean');
          return undefined;
        }
        builder.value(raw.value);
      }

      if (raw.contexts !== undefined) {
        if (!isObject(raw.contexts)) {
          this.issue(path, 'contexts must be an object');
          return undefined;
        }
        for (const [key, value] of Object.entries(raw.contexts)) {
          const values = typeof value === 'string' ? [value] : value;
          if (!isStringArray(values)) {
            this.issue(`${path}.contexts.${key}`, 'must be a string or an array of strings');
            return undefined;
          }
          for (const v of values) {
            builder.context(key, v);
          }
        }
      }

      if (raw.expiry !== undefined && raw.expiresIn !== undefined) {
        this.issue(path, 'expiry and expiresIn are mutually exclusive');
        return undefined;
      }
      if (raw.expiry !== undefined) {
        const expiry = typeof raw.expiry === 'string' ? Date.parse(raw.expiry) : Number.NaN;
        if (Number.isNaN(expiry)) {
          this.issue(path, 'expiry must be an ISO date string');
          return undefined;
        }
        builder.expiry(expiry);
      }
      if (raw.expiresIn !== undefined) {
        const duration = typeof raw.expiresIn === 'string' ? parseDuration(raw.expiresIn) : undefined;
        if (duration === undefined) {
          this.issue(path, 'expiresIn must be a duration such as 30m or 1d12h');
          return undefined;
        }
        builder.expiresIn(duration, this.now);
      }

      return builder.build();
    } catch (err) {
      if (err instanceof PermissionError) {
        this.issue(path, err.message);
        return undefined;
      }
      throw err;
    }
  }

  parseNodes(raw: unknown, path: string): Node[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      this.issue(path, 'nodes must be an array');
      return [];
    }
    const nodes: Node[] = [];
    raw.forEach((entry, i) => {
      const node = this.parseNode(entry, `${path}[${i}]`);
      if (node) {
        nodes.push(node);
      }
    });
    return nodes;
  }

  parseStringList(raw: unknown, path: string): string[] {
    if (raw === undefined) {
      return [];
    }
    if (!isStringArray(raw)) {
      this.issue(path, 'must be an array of strings');
      return [];
    }
    return raw;
  }

  parseGroups(raw: unknown): Group[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      this.issue('groups', 'must be an array');
      return [];
    }

    const groups: Group[] = [];
    const seen = new Set<string>();
    raw.forEach((entry, i) => {
      const path = `groups[${i}]`;
      if (!isObject(entry)) {
        this.issue(path, 'group must be an object');
        return;
      }
      if (typeof entry.name !== 'string' || entry.name.length === 0) {
        this.issue(path, 'name must be a non-empty string');
        return;
      }
      const key = entry.name.toLowerCase();
      if (seen.has(key)) {
        this.issue(path, `duplicate group "${entry.name}"`);
        return;
      }
      seen.add(key);

      let weight = 0;
      if (entry.weight !== undefined) {
        if (typeof entry.weight !== 'number' || !Number.isFinite(entry.weight)) {
          this.issue(`${path}.weight`, 'must be a number');
        } else {
          weight = entry.weight;
        }
      }

      groups.push({
        name: key,
        weight,
        parents: this.parseStringList(entry.parents, `${path}.parents`),
        nodes: this.parseNodes(entry.nodes, `${path}.nodes`),
      });
    });
    return groups;
  }

  parseUsers(raw: unknown): User[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      this.issue('users', 'must be an array');
      return [];
    }

    const users: User[] = [];
    raw.forEach((entry, i) => {
      const path = `users[${i}]`;
      if (!isObject(entry)) {
        this.issue(path, 'user must be an object');
        return;
      }
      if (typeof entry.uuid !== 'string' || entry.uuid.length === 0) {
        this.issue(path, 'uuid must be a non-empty string');
        return;
      }
      if (entry.username !== undefined && typeof entry.username !== 'string') {
        this.issue(`${path}.username`, 'must be a string');
      }
      if (entry.primaryGroup !== undefined && typeof entry.primaryGroup !== 'string') {
        this.issue(`${path}.primaryGroup`, 'must be a string');
      }

      users.push({
        uuid: entry.uuid,
        username: typeof entry.username === 'string' ? entry.username : undefined,
        primaryGroup: typeof entry.primaryGroup === 'string' ? entry.primaryGroup : DEFAULT_GROUP,
        inheritedGroups: this.parseStringList(entry.groups, `${path}.groups`),
        nodes: this.parseNodes(entry.nodes, `${path}.nodes`),
      });
    });
    return users;
  }

  parseAliases(raw: unknown): PermissionAliases {
    const aliases = new PermissionAliases();
    if (raw === undefined) {
      return aliases;
    }
    if (!isObject(raw)) {
      this.issue('aliases', 'must be an object');
      return aliases;
    }
    for (const [simplified, actual] of Object.entries(raw)) {
      if (!isStringArray(actual)) {
        this.issue(`aliases.${simplified}`, 'must be an array of strings');
        continue;
      }
      aliases.alias(simplified, ...actual);
    }
    return aliases;
  }

  parsePermissions(raw: unknown): PermissionRegistry {
    const registry = new PermissionRegistry();
    if (raw === undefined) {
      return registry;
    }
    if (!Array.isArray(raw)) {
      this.issue('permissions', 'must be an array');
      return registry;
    }
    raw.forEach((entry, i) => {
      const path = `permissions[${i}]`;
      if (!isObject(entry) || typeof entry.permission !== 'string' || entry.permission.length === 0) {
        this.issue(path, 'permission must be a non-empty string');
        return;
      }
      const description = typeof entry.description === 'string' ? entry.description : '';
      const category = typeof entry.category === 'string' ? entry.category : DEFAULT_CATEGORY;
      registry.register(entry.permission, description, category, SNAPSHOT_SOURCE);
    });
    return registry;
  }
}

/**
 * Validate parsed JSON as a snapshot
 */
export function parseSnapshot(raw: unknown, source: string, options: ParseOptions = {}): Snapshot {
  if (!isObject(raw)) {
    throw new SnapshotError(`Invalid snapshot ${source}`, ['snapshot must be a JSON object']);
  }

  const parser = new SnapshotParser(options.now ?? Date.now());
  const snapshot: Snapshot = {
    groups: parser.parseGroups(raw.groups),
    users: parser.parseUsers(raw.users),
    aliases: parser.parseAliases(raw.aliases),
    registry: parser.parsePermissions(raw.permissions),
  };

  if (parser.issues.length > 0) {
    const count = parser.issues.length;
    throw new SnapshotError(
      `Invalid snapshot ${source}: ${count} issue${count === 1 ? '' : 's'}`,
      parser.issues
    );
  }
  return snapshot;
}

/**
 * Read and validate a snapshot file
 */
export function loadSnapshot(path: string, options: ParseOptions = {}): Snapshot {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotError(`Cannot read snapshot ${path}`, [reason]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotError(`Snapshot ${path} is not valid JSON`, [reason]);
  }

  return parseSnapshot(raw, path, options);
}

/**
 * Find a user by uuid or, case-insensitively, by username
 */
export function findUser(snapshot: Snapshot, idOrName: string): User | undefined {
  const lower = idOrName.toLowerCase();
  return (
    snapshot.users.find((u) => u.uuid === idOrName) ??
    snapshot.users.find((u) => u.username?.toLowerCase() === lower)
  );
}
