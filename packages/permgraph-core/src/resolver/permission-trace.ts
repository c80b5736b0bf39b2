/**
 * Permission Trace
 *
 * Explains how one check resolved: which key matched, how, and which group
 * (or the user directly) contributed it. Used by verbose/debug output.
 */

import type { ContextSet } from '../types/context';
import type { MatchType, TriState } from '../types/tri-state';
import { isNegationMatch, isWildcardMatch } from '../types/tri-state';

export interface PermissionTraceJson {
  permission: string;
  result: TriState;
  matchedNode: string | null;
  matchType: MatchType;
  source: string;
  contexts: Record<string, string[]>;
}

export class PermissionTrace {
  constructor(
    readonly permission: string,
    readonly result: TriState,
    readonly matchedNode: string | null,
    readonly matchType: MatchType,
    readonly sourceGroup: string | null,
    readonly fromUser: boolean,
    readonly activeContexts: ContextSet
  ) {}

  static notFound(permission: string, contexts: ContextSet): PermissionTrace {
    return new PermissionTrace(permission, 'UNDEFINED', null, 'NONE', null, false, contexts);
  }

  static fromUser(
    permission: string,
    result: TriState,
    matchedNode: string,
    matchType: MatchType,
    contexts: ContextSet
  ): PermissionTrace {
    return new PermissionTrace(permission, result, matchedNode, matchType, null, true, contexts);
  }

  static fromGroup(
    permission: string,
    result: TriState,
    matchedNode: string,
    matchType: MatchType,
    groupName: string,
    contexts: ContextSet
  ): PermissionTrace {
    return new PermissionTrace(permission, result, matchedNode, matchType, groupName, false, contexts);
  }

  isMatched(): boolean {
    return this.matchType !== 'NONE';
  }

  isFromWildcard(): boolean {
    return isWildcardMatch(this.matchType);
  }

  isFromNegation(): boolean {
    return isNegationMatch(this.matchType);
  }

  /**
   * "user", "group:<name>" or "unknown"
   */
  getSourceDescription(): string {
    if (this.fromUser) {
      return 'user';
    }
    if (this.sourceGroup !== null) {
      return `group:${this.sourceGroup}`;
    }
    return 'unknown';
  }

  toString(): string {
    let str = `PermissionTrace{permission='${this.permission}', result=${this.result}`;
    if (this.matchedNode !== null) {
      str += `, matchedNode='${this.matchedNode}'`;
    }
    str += `, matchType=${this.matchType}, source=${this.getSourceDescription()}`;
    if (!this.activeContexts.isEmpty()) {
      str += `, contexts=${this.activeContexts.toString()}`;
    }
    return `${str}}`;
  }

  toVerboseString(): string {
    const lines = [
      'Permission Check Trace',
      `  Permission: ${this.permission}`,
      `  Result: ${this.result}`,
      `  Match Type: ${this.matchType}`,
    ];
    if (this.matchedNode !== null) {
      lines.push(`  Matched Node: ${this.matchedNode}`);
    }
    lines.push(`  Source: ${this.getSourceDescription()}`);
    if (!this.activeContexts.isEmpty()) {
      lines.push(`  Active Contexts: ${this.activeContexts.toString()}`);
    }
    return `${lines.join('\n')}\n`;
  }

  toJSON(): PermissionTraceJson {
    return {
      permission: this.permission,
      result: this.result,
      matchedNode: this.matchedNode,
      matchType: this.matchType,
      source: this.getSourceDescription(),
      contexts: this.activeContexts.toJSON(),
    };
  }
}
