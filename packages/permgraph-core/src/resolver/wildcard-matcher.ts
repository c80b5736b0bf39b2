/**
 * Wildcard Matcher
 *
 * Answers a single permission against a map of pattern -> value.
 *
 * Patterns:
 *   *                  every permission
 *   plugin.*           every permission under "plugin."
 *   -plugin.admin      explicit deny of "plugin.admin"
 *   -plugin.admin.*    deny everything under "plugin.admin."
 *   -*                 deny everything
 *
 * Resolution order (host-native, NOT most-specific-wins):
 *   1. "*" granted                  -> TRUE, beats every negation
 *   2. "-*" granted, or "*" denied   -> FALSE
 *   3. exact grant/deny, then exact negation
 *   4. prefix wildcards, shortest prefix first ("a.*" before "a.b.*");
 *      per prefix: grant, then negation, then stored deny
 *   5. UNDEFINED
 *
 * So {"*": true, "-ban": true} answers "ban" with TRUE. Deny specific
 * permissions by granting narrower wildcards ("admin.*") instead of "*".
 */

import type { MatchResult, MatchType, TriState } from '../types/tri-state';
import { NO_MATCH } from '../types/tri-state';

/**
 * Values keyed by lowercased pattern; negated patterns carry a leading '-'
 */
export type PermissionValues = ReadonlyMap<string, boolean>;

export interface MatchOptions {
  /**
   * Retry the whole algorithm against the permission with a common
   * namespace prefix stripped (com.foo.bar -> foo.bar). Default: true
   */
  stripNamespaces?: boolean;
}

export const UNIVERSAL_WILDCARD = '*';
export const UNIVERSAL_NEGATION = '-*';

/** Namespace prefixes often dropped from plugin permission names */
export const COMMON_NAMESPACE_PREFIXES: readonly string[] = ['com.', 'net.', 'org.', 'io.', 'me.'];

/**
 * Whether a permission matches a single pattern
 */
export function matches(permission: string, pattern: string): boolean {
  if (permission.length === 0 || pattern.length === 0) {
    return permission === pattern;
  }
  if (permission === pattern || pattern === UNIVERSAL_WILDCARD) {
    return true;
  }
  if (pattern.endsWith('.*')) {
    return permission.startsWith(pattern.substring(0, pattern.length - 1));
  }
  return false;
}

/**
 * Wildcard for the first prefixLength segments; 0 gives "*"
 */
export function buildWildcard(parts: readonly string[], prefixLength: number): string {
  if (prefixLength === 0) {
    return UNIVERSAL_WILDCARD;
  }
  return `${parts.slice(0, prefixLength).join('.')}.*`;
}

/**
 * Every pattern that could match a permission, most to least specific.
 * "a.b.c" -> ["a.b.c", "a.b.*", "a.*", "*"]
 */
export function generatePatterns(permission: string): string[] {
  if (permission.length === 0) {
    return [permission, UNIVERSAL_WILDCARD];
  }
  const parts = permission.split('.');
  const patterns = [permission];
  for (let prefixLength = parts.length - 1; prefixLength >= 0; prefixLength--) {
    patterns.push(buildWildcard(parts, prefixLength));
  }
  return patterns;
}

/**
 * Variants of a lowercased permission with one common namespace prefix removed
 */
export function stripNamespaceVariants(permission: string): string[] {
  const variants: string[] = [];
  for (const prefix of COMMON_NAMESPACE_PREFIXES) {
    if (permission.startsWith(prefix) && permission.length > prefix.length) {
      variants.push(permission.substring(prefix.length));
    }
  }
  return variants;
}

function match(result: TriState, matchedNode: string, matchType: MatchType): MatchResult {
  return { result, matchedNode, matchType };
}

/**
 * One full pass of the resolution order for an already-lowercased permission
 */
function resolveOnce(permission: string, values: PermissionValues): MatchResult {
  // 1. Universal grant wins over everything
  if (values.get(UNIVERSAL_WILDCARD) === true) {
    return match('TRUE', UNIVERSAL_WILDCARD, 'UNIVERSAL');
  }

  // 2. Universal deny, declared or stored as "*" = false
  if (values.get(UNIVERSAL_NEGATION) === true) {
    return match('FALSE', UNIVERSAL_NEGATION, 'UNIVERSAL_NEGATION');
  }
  if (values.get(UNIVERSAL_WILDCARD) === false) {
    return match('FALSE', UNIVERSAL_WILDCARD, 'UNIVERSAL_NEGATION');
  }

  // 3. Exact, grant before negation
  const exact = values.get(permission);
  if (exact !== undefined) {
    return match(exact ? 'TRUE' : 'FALSE', permission, 'EXACT');
  }
  const negated = `-${permission}`;
  const exactNegation = values.get(negated);
  if (exactNegation !== undefined) {
    return match(exactNegation ? 'FALSE' : 'TRUE', negated, 'EXACT_NEGATION');
  }

  // 4. Prefix wildcards, shortest first
  const parts = permission.split('.');
  for (let prefixLength = 1; prefixLength < parts.length; prefixLength++) {
    const wildcard = buildWildcard(parts, prefixLength);
    const value = values.get(wildcard);

    if (value === true) {
      return match('TRUE', wildcard, 'WILDCARD');
    }
    const negatedWildcard = `-${wildcard}`;
    if (values.get(negatedWildcard) === true) {
      return match('FALSE', negatedWildcard, 'WILDCARD_NEGATION');
    }
    if (value === false) {
      return match('FALSE', wildcard, 'WILDCARD');
    }
  }

  return NO_MATCH;
}

/**
 * Check a permission, returning the match and the key that decided it
 */
export function checkWithTrace(
  permission: string,
  values: PermissionValues,
  options: MatchOptions = {}
): MatchResult {
  if (permission.length === 0) {
    return NO_MATCH;
  }

  const lowerPermission = permission.toLowerCase();
  const direct = resolveOnce(lowerPermission, values);
  if (direct.matchType !== 'NONE' || options.stripNamespaces === false) {
    return direct;
  }

  // Stripped forms only after the unstripped pass found nothing at any level
  for (const stripped of stripNamespaceVariants(lowerPermission)) {
    const result = resolveOnce(stripped, values);
    if (result.matchType !== 'NONE') {
      return result;
    }
  }

  return NO_MATCH;
}

/**
 * Check a permission against the values map
 */
export function check(
  permission: string,
  values: PermissionValues,
  options: MatchOptions = {}
): TriState {
  return checkWithTrace(permission, values, options).result;
}
