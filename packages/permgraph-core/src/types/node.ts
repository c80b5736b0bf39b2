/**
 * Node Types
 *
 * A node is a single permission assertion: permission string, value,
 * context restriction and optional expiry.
 *
 * Permission string forms:
 *   fly.use          grant (or deny when value is false)
 *   -fly.use         declared negation, effective value is !value
 *   essentials.*     prefix wildcard
 *   group.vip        group membership, handled as an inheritance edge
 */

import { requireNonEmptyString } from '../errors/permission-error';
import { Context, ContextSet, type ContextSetBuilder, SERVER_KEY, WORLD_KEY } from './context';

export const GROUP_PREFIX = 'group.';
export const NEGATION_PREFIX = '-';

export class Node {
  readonly permission: string;
  readonly value: boolean;
  /** Expiry as epoch milliseconds, undefined when permanent */
  readonly expiry: number | undefined;
  readonly contexts: ContextSet;

  private constructor(
    permission: string,
    value: boolean,
    expiry: number | undefined,
    contexts: ContextSet
  ) {
    this.permission = requireNonEmptyString(permission, 'permission').toLowerCase();
    this.value = value;
    this.expiry = expiry;
    this.contexts = contexts;
  }

  static builder(permission: string): NodeBuilder {
    return new NodeBuilder(permission);
  }

  static of(permission: string): Node {
    return Node.builder(permission).build();
  }

  static group(groupName: string): Node {
    return Node.builder(GROUP_PREFIX + requireNonEmptyString(groupName, 'groupName')).build();
  }

  /** @internal */
  static create(
    permission: string,
    value: boolean,
    expiry: number | undefined,
    contexts: ContextSet
  ): Node {
    return new Node(permission, value, expiry, contexts);
  }

  isExpired(now: number = Date.now()): boolean {
    return this.expiry !== undefined && now > this.expiry;
  }

  isTemporary(): boolean {
    return this.expiry !== undefined;
  }

  isGroupNode(): boolean {
    return this.permission.startsWith(GROUP_PREFIX);
  }

  getGroupName(): string | undefined {
    return this.isGroupNode() ? this.permission.substring(GROUP_PREFIX.length) : undefined;
  }

  isNegated(): boolean {
    return this.permission.startsWith(NEGATION_PREFIX);
  }

  getBasePermission(): string {
    return this.isNegated() ? this.permission.substring(1) : this.permission;
  }

  isWildcard(): boolean {
    const base = this.getBasePermission();
    return base === '*' || base.endsWith('.*');
  }

  appliesIn(currentContexts: ContextSet): boolean {
    return this.contexts.isSatisfiedBy(currentContexts);
  }

  withExpiry(expiry: number | undefined): Node {
    return new Node(this.permission, this.value, expiry, this.contexts);
  }

  withContexts(contexts: ContextSet): Node {
    return new Node(this.permission, this.value, this.expiry, contexts);
  }

  equalsIgnoringExpiry(other: Node): boolean {
    return (
      this.permission === other.permission &&
      this.value === other.value &&
      this.contexts.equals(other.contexts)
    );
  }

  equals(other: Node): boolean {
    return this.equalsIgnoringExpiry(other) && this.expiry === other.expiry;
  }

  toString(): string {
    let str = `Node{permission='${this.permission}'`;
    if (!this.value) {
      str += ', value=false';
    }
    if (this.expiry !== undefined) {
      str += `, expiry=${new Date(this.expiry).toISOString()}`;
    }
    if (!this.contexts.isEmpty()) {
      str += `, contexts=${this.contexts.toString()}`;
    }
    return `${str}}`;
  }
}

export class NodeBuilder {
  private readonly permission: string;
  private nodeValue = true;
  private expiryAt: number | undefined;
  private contextBuilder: ContextSetBuilder = ContextSet.builder();

  constructor(permission: string) {
    this.permission = requireNonEmptyString(permission, 'permission');
  }

  value(value: boolean): this {
    this.nodeValue = value;
    return this;
  }

  granted(): this {
    return this.value(true);
  }

  denied(): this {
    return this.value(false);
  }

  /**
   * Absolute expiry as a Date or epoch milliseconds
   */
  expiry(expiry: Date | number | undefined): this {
    this.expiryAt = expiry instanceof Date ? expiry.getTime() : expiry;
    return this;
  }

  /**
   * Expire after a duration in milliseconds from now
   */
  expiresIn(durationMs: number, now: number = Date.now()): this {
    this.expiryAt = now + durationMs;
    return this;
  }

  permanent(): this {
    this.expiryAt = undefined;
    return this;
  }

  context(context: Context): this;
  context(key: string, value: string): this;
  context(keyOrContext: Context | string, value?: string): this {
    if (keyOrContext instanceof Context) {
      this.contextBuilder.add(keyOrContext);
    } else {
      this.contextBuilder.add(keyOrContext, value ?? '');
    }
    return this;
  }

  world(world: string): this {
    return this.context(WORLD_KEY, world);
  }

  server(server: string): this {
    return this.context(SERVER_KEY, server);
  }

  contexts(contexts: ContextSet): this {
    this.contextBuilder = ContextSet.builder().addAll(contexts);
    return this;
  }

  clearContexts(): this {
    this.contextBuilder = ContextSet.builder();
    return this;
  }

  build(): Node {
    return Node.create(this.permission, this.nodeValue, this.expiryAt, this.contextBuilder.build());
  }
}
