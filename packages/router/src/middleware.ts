/**
 * Middleware resolver
 *
 * The effective chain of a route is a root-to-leaf fold over its ancestor
 * scopes:
 *
 * ```text
 * routes/
 * ├── _middleware.ts          # A (overlay)
 * ├── index.get.ts            # ← [A]
 * ├── api/
 * │   ├── _middleware.ts      # B (overlay)
 * │   ├── users.get.ts        # ← [A, B]
 * │   └── public/
 * │       ├── _middleware.ts  # C (override)
 * │       └── health.get.ts   # ← [C]
 * └── docs/
 *     └── index.get.ts        # ← [A]
 * ```
 *
 * Only ancestors influence a chain, never siblings or descendants. Transforms
 * nearer the root wrap outermost when the chain is composed.
 */

import type {
  MiddlewareScopeSummary,
  MiddlewareSpec,
  PathSegment,
  ScopeNode,
  ScopedRoute,
} from './types.js';
import { countRoutes, walkScopes } from './tree.js';

export interface WorkingChain<T> {
  specs: readonly MiddlewareSpec<T>[];
  scopes: readonly string[];
}

export const EMPTY_CHAIN: WorkingChain<never> = Object.freeze({ specs: [], scopes: [] });

/**
 * One fold step: overlay appends, override replaces everything inherited,
 * no middleware passes the chain through.
 */
export function applyScope<T>(
  chain: WorkingChain<T>,
  middleware: MiddlewareSpec<T> | null,
  scopePath: string
): WorkingChain<T> {
  if (!middleware) {
    return chain;
  }
  if (middleware.mode === 'override') {
    return { specs: [middleware], scopes: [scopePath] };
  }
  return {
    specs: [...chain.specs, middleware],
    scopes: [...chain.scopes, scopePath],
  };
}

function resolveScope<H, T>(
  node: ScopeNode<H, T>,
  segments: readonly PathSegment[],
  inherited: WorkingChain<T>,
  out: ScopedRoute<H, T>[]
): void {
  const chain = applyScope(inherited, node.middleware, node.path);

  for (const route of node.routes) {
    out.push({
      segments: route.segment ? [...segments, route.segment] : segments,
      route,
      chain: chain.specs,
      chainScopes: chain.scopes,
    });
  }

  for (const child of node.children.values()) {
    const childSegments = child.segment ? [...segments, child.segment] : segments;
    resolveScope(child, childSegments, chain, out);
  }
}

/**
 * Compute the effective chain of every route in the tree
 */
export function resolveMiddleware<H, T>(root: ScopeNode<H, T>): ScopedRoute<H, T>[] {
  const out: ScopedRoute<H, T>[] = [];
  resolveScope(root, [], EMPTY_CHAIN, out);
  return out;
}

/**
 * List every middleware scope with its nearest middleware-bearing ancestor
 */
export function collectMiddlewareScopes<H, T>(root: ScopeNode<H, T>): MiddlewareScopeSummary[] {
  const scopes: MiddlewareScopeSummary[] = [];

  walkScopes(root, (node, ancestors) => {
    // The root survives pruning even when it holds no routes
    if (!node.middleware || countRoutes(node) === 0) return;

    const parent = [...ancestors].reverse().find((a) => a.middleware !== null);
    scopes.push({
      scope: node.path,
      mode: node.middleware.mode,
      parent: parent ? parent.path : null,
      source: node.middleware.source,
    });
  });

  return scopes;
}
