/**
 * Inheritance Graph
 *
 * Flattens group inheritance into an ordered ancestor list. Traversal is
 * breadth-first with a visited set, so cyclic parent graphs terminate and
 * every group appears once. Missing groups contribute nothing.
 */

import { ContextSet } from '../types/context';
import {
  type Group,
  type GroupLoader,
  getAllGroupParents,
  getGroupParents,
} from '../types/group';
import type { Node } from '../types/node';
import { type Logger, silentLogger } from '../utils/logger';

/**
 * How groups of equal weight are ordered:
 *   insertion - breadth-first discovery order
 *   name      - group name, ascending
 */
export type TieBreak = 'insertion' | 'name';

export interface InheritanceGraphOptions {
  tieBreak?: TieBreak;
  logger?: Logger;
  /** Time source for node expiry, epoch milliseconds */
  clock?: () => number;
}

/**
 * Sort weight of a group; NaN sorts as 0
 */
function weightOf(group: Group): number {
  return Number.isNaN(group.weight) ? 0 : group.weight;
}

export class InheritanceGraph {
  private readonly groupLoader: GroupLoader;
  private readonly tieBreak: TieBreak;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(groupLoader: GroupLoader, options: InheritanceGraphOptions = {}) {
    this.groupLoader = groupLoader;
    this.tieBreak = options.tieBreak ?? 'insertion';
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Every group reachable from the starting names, lowest weight first
   */
  resolveInheritance(startGroups: Iterable<string>, contexts: ContextSet): Group[] {
    const now = this.clock();
    const visited = new Set<string>();
    const result: Group[] = [];
    const queue: string[] = [];

    for (const name of startGroups) {
      queue.push(name.toLowerCase());
    }

    for (let head = 0; head < queue.length; head++) {
      const groupName = queue[head];
      if (visited.has(groupName)) {
        continue;
      }
      visited.add(groupName);

      const group = this.groupLoader(groupName);
      if (!group) {
        this.logger.debug('Skipping missing group', { group: groupName });
        continue;
      }
      result.push(group);

      for (const parent of getGroupParents(group, contexts, now)) {
        if (!visited.has(parent)) {
          queue.push(parent);
        }
      }
    }

    // Array.prototype.sort is stable, equal weights keep discovery order
    return result.sort((a, b) => {
      const weightA = weightOf(a);
      const weightB = weightOf(b);
      if (weightA !== weightB) {
        return weightA < weightB ? -1 : 1;
      }
      if (this.tieBreak === 'name') {
        const nameA = a.name.toLowerCase();
        const nameB = b.name.toLowerCase();
        return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
      }
      return 0;
    });
  }

  /**
   * Nodes that contribute to the permission map: not expired, not a
   * group membership, and applicable in the contexts
   */
  filterNodes(nodes: readonly Node[], contexts: ContextSet, now: number = this.clock()): Node[] {
    return nodes.filter(
      (node) => !node.isExpired(now) && !node.isGroupNode() && node.appliesIn(contexts)
    );
  }

  /**
   * Applicable permission nodes of the groups, in group order then
   * declaration order
   */
  collectNodes(groups: readonly Group[], contexts: ContextSet): Node[] {
    const now = this.clock();
    return groups.flatMap((group) => this.filterNodes(group.nodes, contexts, now));
  }

  /**
   * Whether making parentName a parent of group would close a cycle,
   * i.e. group is already reachable from parentName over any parent edge
   */
  wouldCreateCycle(group: Group, parentName: string): boolean {
    const target = group.name.toLowerCase();
    const visited = new Set<string>();
    const queue = [parentName.toLowerCase()];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === target) {
        return true;
      }
      if (visited.has(current)) {
        continue;
      }
      visited.add(current);

      const currentGroup = this.groupLoader(current);
      if (currentGroup) {
        queue.push(...getAllGroupParents(currentGroup));
      }
    }

    return false;
  }

  /**
   * Group names in application order, for display
   */
  getInheritanceChain(groupName: string): string[] {
    return this.resolveInheritance([groupName], ContextSet.empty()).map((g) => g.name);
  }
}
