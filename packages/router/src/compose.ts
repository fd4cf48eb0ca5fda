/**
 * Handler composition
 *
 * A transform wraps a handler and returns a new one. The chain of a resolved
 * route is applied root-most outermost:
 *
 * ```ts
 * // chain [auth, log] → auth(log(handler))
 * const handle = composeHandler(route);
 * ```
 */

import type { ResolvedRoute, RouteTable } from './types.js';

export type Transform<H> = (next: H) => H;

/**
 * Wrap the handler with its chain; the first chain entry ends up outermost
 */
export function composeHandler<H>(route: ResolvedRoute<H, Transform<H>>): H {
  return route.middleware.reduceRight<H>((next, transform) => transform(next), route.handler);
}

/**
 * Compose every route of a table, keyed by route id
 */
export function composeTable<H>(table: RouteTable<H, Transform<H>>): ReadonlyMap<string, H> {
  const handlers = new Map<string, H>();
  for (const route of table.routes) {
    handlers.set(route.id, composeHandler(route));
  }
  return handlers;
}
