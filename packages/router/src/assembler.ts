/**
 * Router assembler
 *
 * Emits the final route table, pre-sorted by dispatch precedence so a
 * first-match dispatcher needs no further ordering logic. Assembly is pure:
 * the same routes always yield the same order and the same serialized bytes.
 */

import { compareRoutes } from './conflicts.js';
import { formatPattern, sanitizeIdent } from './path.js';
import type {
  MiddlewareScopeSummary,
  ResolvedRoute,
  RouteRegistrar,
  RouteSummary,
  RouteTable,
  ScopedRoute,
} from './types.js';

const CHAIN_SEPARATOR = ' → ';

function routeIdParts<H, T>(scoped: ScopedRoute<H, T>): string[] {
  const parts = scoped.segments.map((s) => s.value);
  if (scoped.route.segment === null) {
    parts.push('index');
  }
  parts.push(scoped.route.method.toLowerCase());
  return parts;
}

function uniqueId(base: string, taken: Set<string>): string {
  let id = base;
  for (let n = 2; taken.has(id); n++) {
    id = `${base}_${n}`;
  }
  taken.add(id);
  return id;
}

function toResolvedRoute<H, T>(scoped: ScopedRoute<H, T>, id: string): ResolvedRoute<H, T> {
  return Object.freeze({
    id,
    pattern: formatPattern(scoped.segments),
    method: scoped.route.method,
    params: Object.freeze(scoped.segments.filter((s) => s.kind !== 'static').map((s) => s.value)),
    middleware: Object.freeze(scoped.chain.map((spec) => spec.transform)),
    middlewareScopes: Object.freeze([...scoped.chainScopes]),
    handler: scoped.route.handler,
    source: scoped.route.source,
  });
}

function toSummary<H, T>(route: ResolvedRoute<H, T>): RouteSummary {
  return Object.freeze({
    method: route.method,
    path: route.pattern,
    middlewareCount: route.middleware.length,
    chain: route.middlewareScopes.length > 0 ? route.middlewareScopes.join(CHAIN_SEPARATOR) : '(none)',
  });
}

/**
 * Assemble conflict-free routes into an immutable table
 */
export function assembleRoutes<H, T>(
  scoped: readonly ScopedRoute<H, T>[],
  middleware: readonly MiddlewareScopeSummary[] = []
): RouteTable<H, T> {
  const sorted = [...scoped].sort(compareRoutes);
  const taken = new Set<string>();

  const routes = sorted.map((entry) => toResolvedRoute(entry, uniqueId(sanitizeIdent(routeIdParts(entry)), taken)));

  return Object.freeze({
    routes: Object.freeze(routes),
    summary: Object.freeze(routes.map(toSummary)),
    middleware: Object.freeze(middleware.map((m) => Object.freeze({ ...m }))),
  });
}

/**
 * One line per route: method, path and effective chain
 */
export function formatSummary<H, T>(table: RouteTable<H, T>): string[] {
  const width = Math.max(0, ...table.summary.map((s) => s.path.length));
  return table.summary.map(
    (s) => `${s.method.padEnd(7)} ${s.path.padEnd(width)}  ${s.chain}`
  );
}

/**
 * JSON manifest of the table. Handler and transform references are left out;
 * `source` identifies them.
 */
export function serializeTable<H, T>(table: RouteTable<H, T>): string {
  const manifest = {
    version: 1,
    routes: table.routes.map((r) => ({
      id: r.id,
      method: r.method,
      pattern: r.pattern,
      params: r.params,
      middleware: r.middlewareScopes,
      source: r.source,
    })),
    middleware: table.middleware,
  };
  return JSON.stringify(manifest, null, 2) + '\n';
}

/**
 * Hand every route, in dispatch order, to a transport
 */
export function mountRoutes<H, T>(table: RouteTable<H, T>, registrar: RouteRegistrar<H, T>): number {
  for (const route of table.routes) {
    registrar.register(route);
  }
  return table.routes.length;
}
