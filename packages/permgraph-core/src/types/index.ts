/**
 * Type exports for @permgraph/core
 */

export { Context, ContextSet, ContextSetBuilder, GAMEMODE_KEY, SERVER_KEY, WORLD_KEY } from './context';
export type { ContextPair } from './context';

export { GROUP_PREFIX, NEGATION_PREFIX, Node, NodeBuilder } from './node';

export type { Group, GroupLoader } from './group';
export { createGroupLoader, getAllGroupParents, getGroupParents } from './group';

export type { User } from './user';
export { DEFAULT_GROUP, getFriendlyName, getUserGroups } from './user';

export type { MatchResult, MatchType, TriState } from './tri-state';
export {
  asBoolean,
  fromBoolean,
  isMatched,
  isNegationMatch,
  isWildcardMatch,
  NO_MATCH,
} from './tri-state';
