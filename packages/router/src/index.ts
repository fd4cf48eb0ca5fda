/**
 * @scopewise/router
 *
 * Resolves a directory of route declarations into an immutable dispatch table
 * with hierarchical middleware.
 *
 * File naming:
 * - index.get.ts     → scope path, GET
 * - [id].get.ts      → /:id (dynamic segment)
 * - [...slug].get.ts → /*slug (catch-all)
 * - _middleware.ts   → scope middleware (overlay, or override with `export const mode = 'override'`)
 */

// Types
export type {
  HttpMethod,
  MiddlewareMode,
  SegmentKind,
  PathSegment,
  Declaration,
  RouteDescriptor,
  MiddlewareSpec,
  ScopeNode,
  ScopedRoute,
  ResolvedRoute,
  RouteSummary,
  MiddlewareScopeSummary,
  RouteTable,
  RouteMatch,
  RouteRegistrar,
  RouterConfig,
  WatchOptions,
} from './types.js';
export { HTTP_METHODS } from './types.js';

// Errors
export {
  RouteBuildError,
  ConfigError,
  ManifestError,
  errorFamily,
  formatDiagnostic,
  type Diagnostic,
  type ErrorKind,
  type ParseErrorKind,
  type BuildErrorKind,
  type BuildStage,
} from './errors.js';

// Pipeline stages
export { parseDeclaration, parseDeclarations, parseSegment, resolveMethod, type ParsedDeclaration } from './parser.js';
export { buildScopeTree, walkScopes, countRoutes } from './tree.js';
export { resolveMiddleware, collectMiddlewareScopes, applyScope } from './middleware.js';
export { checkConflicts, compareRoutes, shapeKey } from './conflicts.js';
export { assembleRoutes, formatSummary, serializeTable, mountRoutes } from './assembler.js';
export { buildRouteTable, tryBuildRouteTable, type BuildOptions, type BuildResult } from './pipeline.js';

// Collaborators
export { declareRoute, declareMiddleware, declarationFromPath } from './declarations.js';
export { RouteScanner, scanDeclarations, detectMiddlewareMode } from './scanner.js';
export { parseManifest, readManifest, type ManifestEntry } from './manifest.js';
export { RouteWatcher, watchRoutes } from './watch.js';

// Runtime
export { RouteMatcher } from './matcher.js';
export { composeHandler, composeTable, type Transform } from './compose.js';

// Config & logging
export { DEFAULT_CONFIG, CONFIG_FILE_NAME, resolveConfig, loadConfig } from './config.js';
export {
  logger,
  Logger,
  ChildLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogSink,
  type LoggerLike,
  type LoggerOptions,
} from './logger.js';
