/**
 * Check Result Types
 */

/**
 * Result of a permission check
 */
export type TriState = 'TRUE' | 'FALSE' | 'UNDEFINED';

/**
 * Convert to boolean, UNDEFINED becomes defaultValue
 */
export function asBoolean(state: TriState, defaultValue = false): boolean {
  switch (state) {
    case 'TRUE':
      return true;
    case 'FALSE':
      return false;
    case 'UNDEFINED':
      return defaultValue;
  }
}

export function fromBoolean(value: boolean): TriState {
  return value ? 'TRUE' : 'FALSE';
}

/**
 * How a permission was matched
 */
export type MatchType =
  | 'NONE'
  | 'EXACT'
  | 'EXACT_NEGATION'
  | 'WILDCARD'
  | 'WILDCARD_NEGATION'
  | 'UNIVERSAL'
  | 'UNIVERSAL_NEGATION';

const NEGATION_MATCHES: ReadonlySet<MatchType> = new Set([
  'EXACT_NEGATION',
  'WILDCARD_NEGATION',
  'UNIVERSAL_NEGATION',
]);

const WILDCARD_MATCHES: ReadonlySet<MatchType> = new Set([
  'WILDCARD',
  'WILDCARD_NEGATION',
  'UNIVERSAL',
  'UNIVERSAL_NEGATION',
]);

export function isNegationMatch(matchType: MatchType): boolean {
  return NEGATION_MATCHES.has(matchType);
}

export function isWildcardMatch(matchType: MatchType): boolean {
  return WILDCARD_MATCHES.has(matchType);
}

/**
 * Wildcard matcher outcome with the key that decided it
 */
export interface MatchResult {
  result: TriState;
  /** Key of the values map that decided the result, null when unmatched */
  matchedNode: string | null;
  matchType: MatchType;
}

export const NO_MATCH: Readonly<MatchResult> = Object.freeze({
  result: 'UNDEFINED',
  matchedNode: null,
  matchType: 'NONE',
});

export function isMatched(match: MatchResult): boolean {
  return match.matchType !== 'NONE';
}
