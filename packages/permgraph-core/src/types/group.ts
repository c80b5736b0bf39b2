/**
 * Group Types
 */

import type { ContextSet } from './context';
import type { Node } from './node';

/**
 * A permission group as read by the resolver.
 * Names are case-insensitive; weight orders groups for override priority
 * (lower weight is applied first, so higher weight wins; NaN sorts as 0).
 */
export interface Group {
  name: string;
  weight: number;
  /** Parents that apply in every context */
  parents?: readonly string[];
  /** Permission nodes; group.<name> nodes are context-aware parent edges */
  nodes: readonly Node[];
}

/**
 * Loads a group by lowercased name, undefined when it does not exist
 */
export type GroupLoader = (name: string) => Group | undefined;

/**
 * Parent group names of a group in the given contexts, lowercased.
 * Combines the context-free parents with non-expired group nodes that apply.
 */
export function getGroupParents(group: Group, contexts: ContextSet, now: number = Date.now()): string[] {
  const parents = new Set<string>();
  for (const parent of group.parents ?? []) {
    parents.add(parent.toLowerCase());
  }
  for (const node of group.nodes) {
    const parent = node.getGroupName();
    if (parent !== undefined && !node.isExpired(now) && node.appliesIn(contexts)) {
      parents.add(parent);
    }
  }
  return Array.from(parents);
}

/**
 * Every parent edge of a group regardless of context or expiry
 */
export function getAllGroupParents(group: Group): string[] {
  const parents = new Set<string>();
  for (const parent of group.parents ?? []) {
    parents.add(parent.toLowerCase());
  }
  for (const node of group.nodes) {
    const parent = node.getGroupName();
    if (parent !== undefined) {
      parents.add(parent);
    }
  }
  return Array.from(parents);
}

/**
 * Build a GroupLoader over a list of groups, keyed case-insensitively
 */
export function createGroupLoader(groups: Iterable<Group>): GroupLoader {
  const byName = new Map<string, Group>();
  for (const group of groups) {
    byName.set(group.name.toLowerCase(), group);
  }
  return (name) => byName.get(name.toLowerCase());
}
