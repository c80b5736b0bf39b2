/**
 * User Types
 */

import type { ContextSet } from './context';
import type { Node } from './node';

export const DEFAULT_GROUP = 'default';

/**
 * A user (principal) as read by the resolver
 */
export interface User {
  uuid: string;
  username?: string;
  primaryGroup: string;
  /** Group memberships that apply in every context */
  inheritedGroups: ReadonlySet<string> | readonly string[];
  /** Direct nodes; group.<name> nodes are context-aware memberships */
  nodes: readonly Node[];
}

/**
 * Starting group set for a user: inherited groups, applicable group nodes,
 * and always the primary group. Lowercased, in that order.
 */
export function getUserGroups(user: User, contexts: ContextSet, now: number = Date.now()): string[] {
  const groups = new Set<string>();
  for (const group of user.inheritedGroups) {
    groups.add(group.toLowerCase());
  }
  for (const node of user.nodes) {
    const group = node.getGroupName();
    if (group !== undefined && !node.isExpired(now) && node.appliesIn(contexts)) {
      groups.add(group);
    }
  }
  if (user.primaryGroup.length > 0) {
    groups.add(user.primaryGroup.toLowerCase());
  }
  return Array.from(groups);
}

/**
 * Display name for a user
 */
export function getFriendlyName(user: User): string {
  return user.username ?? user.uuid;
}
