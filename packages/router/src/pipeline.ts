/**
 * Resolution pipeline: parse → build tree → resolve middleware → check
 * conflicts → assemble. Strictly linear; the first failing stage throws a
 * RouteBuildError carrying every diagnostic of that stage, and no partial
 * table is produced.
 */

import { assembleRoutes } from './assembler.js';
import { resolveConfig } from './config.js';
import { checkConflicts } from './conflicts.js';
import { RouteBuildError } from './errors.js';
import type { BuildStage, Diagnostic } from './errors.js';
import { logger as rootLogger } from './logger.js';
import type { LoggerLike } from './logger.js';
import { collectMiddlewareScopes, resolveMiddleware } from './middleware.js';
import { parseDeclarations } from './parser.js';
import { buildScopeTree } from './tree.js';
import type { Declaration, RouteTable, RouterConfig } from './types.js';

export interface BuildOptions {
  config?: Partial<RouterConfig>;
  logger?: LoggerLike;
}

export type BuildResult<H, T> =
  | { ok: true; table: RouteTable<H, T> }
  | { ok: false; error: RouteBuildError };

function fail(stage: BuildStage, diagnostics: Diagnostic[], log: LoggerLike): never {
  const error = new RouteBuildError(stage, diagnostics);
  log.debug(`${diagnostics.length} diagnostic(s), aborting`, { stage });
  throw error;
}

/**
 * Build the route table from declarations, or throw RouteBuildError
 */
export function buildRouteTable<H, T = H>(
  declarations: readonly Declaration<H, T>[],
  options: BuildOptions = {}
): RouteTable<H, T> {
  const config = resolveConfig(options.config ?? {});
  const log = (options.logger ?? rootLogger).child({ component: 'pipeline' });
  const started = performance.now();

  const { parsed, diagnostics: parseDiagnostics } = parseDeclarations(declarations, config);
  log.debug(`parsed ${parsed.length}/${declarations.length} declarations`, { stage: 'parse' });
  if (parseDiagnostics.length > 0) {
    fail('parse', parseDiagnostics, log);
  }

  const { root, diagnostics: treeDiagnostics } = buildScopeTree(parsed);
  log.debug(`built scope tree with ${root.children.size} top-level scope(s)`, { stage: 'build' });
  if (treeDiagnostics.length > 0) {
    fail('build', treeDiagnostics, log);
  }

  const scoped = resolveMiddleware(root);
  const middleware = collectMiddlewareScopes(root);
  log.debug(`resolved ${scoped.length} route chain(s)`, { stage: 'resolve' });

  const conflicts = checkConflicts(scoped);
  if (conflicts.length > 0) {
    fail('build', conflicts, log);
  }

  const table = assembleRoutes(scoped, middleware);
  log.info(`assembled ${table.routes.length} route(s), ${table.middleware.length} middleware scope(s)`, {
    duration_ms: performance.now() - started,
  });

  return table;
}

/**
 * Non-throwing variant of buildRouteTable
 */
export function tryBuildRouteTable<H, T = H>(
  declarations: readonly Declaration<H, T>[],
  options: BuildOptions = {}
): BuildResult<H, T> {
  try {
    return { ok: true, table: buildRouteTable(declarations, options) };
  } catch (error) {
    if (error instanceof RouteBuildError) {
      return { ok: false, error };
    }
    throw error;
  }
}
