/**
 * @permgraph/core
 *
 * Permission resolution engine
 * - Context and node model
 * - Wildcard matching with negation
 * - Cycle-safe group inheritance
 * - Effective permission resolution and tracing
 * - Permission registry and alias table
 */

export * from './types';

export { PermissionError, requireNonEmptyString } from './errors/permission-error';
export type { PermissionErrorCode } from './errors/permission-error';

export { ContextManager, StaticContextCalculator } from './context/context-manager';
export type { ContextCalculator } from './context/context-manager';

export * as WildcardMatcher from './resolver/wildcard-matcher';
export type { MatchOptions, PermissionValues } from './resolver/wildcard-matcher';
export { InheritanceGraph } from './resolver/inheritance-graph';
export type { InheritanceGraphOptions, TieBreak } from './resolver/inheritance-graph';
export { PermissionResolver } from './resolver/permission-resolver';
export type { PermissionResolverOptions } from './resolver/permission-resolver';
export { ResolvedPermissions } from './resolver/resolved-permissions';
export type { ResolvedPermissionsJson } from './resolver/resolved-permissions';
export { PermissionTrace } from './resolver/permission-trace';
export type { PermissionTraceJson } from './resolver/permission-trace';

export { EMPTY_ALIASES, PermissionAliases } from './registry/permission-aliases';
export type { AliasTable } from './registry/permission-aliases';
export { DEFAULT_SOURCE, PermissionRegistry } from './registry/permission-registry';
export type { PermissionInfo, PermissionUniverse } from './registry/permission-registry';

export { formatDuration, formatExpiry, parseDuration, requireDuration } from './utils/duration';
export { createLogger, isLogLevel, silentLogger } from './utils/logger';
export type { Logger, LoggerOptions, LogLevel } from './utils/logger';
