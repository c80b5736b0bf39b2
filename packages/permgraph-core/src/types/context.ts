/**
 * Context Types
 *
 * A context is a key/value pair describing where or how a check happens
 * (world=nether, server=lobby). Nodes carry a ContextSet restriction and
 * apply only when the active ContextSet satisfies it.
 */

import { PermissionError, requireNonEmptyString } from '../errors/permission-error';

export const WORLD_KEY = 'world';
export const SERVER_KEY = 'server';
export const GAMEMODE_KEY = 'gamemode';

/**
 * A single lowercased key/value pair
 */
export class Context {
  readonly key: string;
  readonly value: string;

  constructor(key: string, value: string) {
    this.key = requireNonEmptyString(key, 'context key').toLowerCase();
    this.value = requireNonEmptyString(value, 'context value').toLowerCase();
  }

  static world(worldName: string): Context {
    return new Context(WORLD_KEY, worldName);
  }

  static server(serverName: string): Context {
    return new Context(SERVER_KEY, serverName);
  }

  static gameMode(gameMode: string): Context {
    return new Context(GAMEMODE_KEY, gameMode);
  }

  /**
   * Parse a "key=value" string
   */
  static parse(str: string): Context {
    const idx = typeof str === 'string' ? str.indexOf('=') : -1;
    if (idx <= 0 || idx === str.length - 1) {
      throw new PermissionError(
        `Invalid context format: ${String(str)}. Expected 'key=value'`,
        'INVALID_CONTEXT'
      );
    }
    return new Context(str.substring(0, idx), str.substring(idx + 1));
  }

  compareTo(other: Context): number {
    if (this.key !== other.key) {
      return this.key < other.key ? -1 : 1;
    }
    if (this.value !== other.value) {
      return this.value < other.value ? -1 : 1;
    }
    return 0;
  }

  equals(other: Context): boolean {
    return this.key === other.key && this.value === other.value;
  }

  toString(): string {
    return `${this.key}=${this.value}`;
  }
}

export type ContextPair = readonly [key: string, value: string];

function identity(context: Context): string {
  return `${context.key}\u0000${context.value}`;
}

/**
 * Immutable set of contexts, ordered by (key, value)
 */
export class ContextSet implements Iterable<Context> {
  private static readonly EMPTY = new ContextSet([]);

  private readonly contexts: readonly Context[];
  private readonly identities: ReadonlySet<string>;

  private constructor(contexts: readonly Context[]) {
    this.contexts = contexts;
    this.identities = new Set(contexts.map(identity));
  }

  static empty(): ContextSet {
    return ContextSet.EMPTY;
  }

  static of(...entries: Array<Context | ContextPair>): ContextSet {
    const builder = ContextSet.builder();
    for (const entry of entries) {
      if (entry instanceof Context) {
        builder.add(entry);
      } else if (Array.isArray(entry) && entry.length === 2) {
        builder.add(entry[0], entry[1]);
      } else {
        throw new PermissionError(
          'context entry must be a Context or a [key, value] pair',
          'INVALID_ARGUMENT'
        );
      }
    }
    return builder.build();
  }

  static builder(): ContextSetBuilder {
    return new ContextSetBuilder();
  }

  /** @internal used by the builder, expects sorted unique contexts */
  static fromSorted(contexts: readonly Context[]): ContextSet {
    return contexts.length === 0 ? ContextSet.EMPTY : new ContextSet(contexts);
  }

  isEmpty(): boolean {
    return this.contexts.length === 0;
  }

  size(): number {
    return this.contexts.length;
  }

  contains(context: Context): boolean {
    return this.identities.has(identity(context));
  }

  containsKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return this.contexts.some((c) => c.key === lowerKey);
  }

  /**
   * First value for a key in set order, or undefined
   */
  getValue(key: string): string | undefined {
    const lowerKey = key.toLowerCase();
    return this.contexts.find((c) => c.key === lowerKey)?.value;
  }

  getValues(key: string): string[] {
    const lowerKey = key.toLowerCase();
    return this.contexts.filter((c) => c.key === lowerKey).map((c) => c.value);
  }

  /**
   * True when every pair in this set is present in currentContexts.
   * The empty set is satisfied by anything.
   */
  isSatisfiedBy(currentContexts: ContextSet): boolean {
    if (!(currentContexts instanceof ContextSet)) {
      throw new PermissionError('currentContexts must be a ContextSet', 'INVALID_ARGUMENT');
    }
    if (this.isEmpty()) {
      return true;
    }
    return this.contexts.every((c) => currentContexts.contains(c));
  }

  toArray(): Context[] {
    return [...this.contexts];
  }

  [Symbol.iterator](): Iterator<Context> {
    return this.contexts[Symbol.iterator]();
  }

  equals(other: ContextSet): boolean {
    if (this === other) {
      return true;
    }
    if (this.contexts.length !== other.contexts.length) {
      return false;
    }
    return this.contexts.every((c, i) => c.equals(other.contexts[i]));
  }

  toString(): string {
    return `ContextSet{${this.contexts.map((c) => c.toString()).join(', ')}}`;
  }

  toJSON(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const context of this.contexts) {
      (result[context.key] ??= []).push(context.value);
    }
    return result;
  }
}

/**
 * Accumulates contexts, de-duplicating by (key, value)
 */
export class ContextSetBuilder {
  private readonly contexts = new Map<string, Context>();

  add(context: Context): this;
  add(key: string, value: string): this;
  add(keyOrContext: Context | string, value?: string): this {
    const context =
      keyOrContext instanceof Context ? keyOrContext : new Context(keyOrContext, value ?? '');
    this.contexts.set(identity(context), context);
    return this;
  }

  addAll(other: ContextSet): this {
    if (!(other instanceof ContextSet)) {
      throw new PermissionError('other must be a ContextSet', 'INVALID_ARGUMENT');
    }
    for (const context of other) {
      this.add(context);
    }
    return this;
  }

  build(): ContextSet {
    const sorted = Array.from(this.contexts.values()).sort((a, b) => a.compareTo(b));
    return ContextSet.fromSorted(sorted);
  }
}
