/**
 * Route matcher
 *
 * A pure read path over an assembled table. Routes are already sorted by
 * precedence, so the first match wins. Safe to share between any number of
 * concurrent readers.
 */

import type { HttpMethod, PathSegment, ResolvedRoute, RouteMatch, RouteTable } from './types.js';

interface CompiledRoute<H, T> {
  route: ResolvedRoute<H, T>;
  segments: readonly PathSegment[];
}

function compilePattern(pattern: string): PathSegment[] {
  return pattern
    .split('/')
    .filter(Boolean)
    .map((part): PathSegment => {
      if (part.startsWith(':')) return { kind: 'dynamic', value: part.slice(1) };
      if (part.startsWith('*')) return { kind: 'catchAll', value: part.slice(1) };
      return { kind: 'static', value: part };
    });
}

function splitPath(pathname: string): string[] {
  const end = pathname.search(/[?#]/);
  const path = end === -1 ? pathname : pathname.slice(0, end);
  return path.split('/').filter(Boolean);
}

function decode(part: string): string | null {
  try {
    return decodeURIComponent(part);
  } catch {
    // Malformed escape sequences never match
    return null;
  }
}

function matchSegments(segments: readonly PathSegment[], parts: readonly string[]): Record<string, string> | null {
  const params: Record<string, string> = {};

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];

    if (segment.kind === 'catchAll') {
      const rest = parts.slice(i).map(decode);
      if (rest.length === 0 || rest.some((p) => p === null)) return null;
      params[segment.value] = rest.join('/');
      return params;
    }

    if (i >= parts.length) return null;

    if (segment.kind === 'static') {
      if (parts[i] !== segment.value) return null;
      continue;
    }

    const value = decode(parts[i]);
    if (value === null) return null;
    params[segment.value] = value;
  }

  return segments.length === parts.length ? params : null;
}

export class RouteMatcher<H, T = H> {
  private readonly compiled: readonly CompiledRoute<H, T>[];

  constructor(table: RouteTable<H, T>) {
    this.compiled = Object.freeze(
      table.routes.map((route) => ({ route, segments: compilePattern(route.pattern) }))
    );
  }

  /**
   * Find the first route matching method and path
   */
  match(method: string, pathname: string): RouteMatch<H, T> | null {
    const upper = method.toUpperCase();
    const parts = splitPath(pathname);

    for (const { route, segments } of this.compiled) {
      if (route.method !== upper) continue;
      const params = matchSegments(segments, parts);
      if (params) {
        return { route, params };
      }
    }
    return null;
  }

  /**
   * Methods with a route matching the path; empty means no such path (404),
   * non-empty without the requested method means 405.
   */
  allowedMethods(pathname: string): HttpMethod[] {
    const parts = splitPath(pathname);
    const methods: HttpMethod[] = [];

    for (const { route, segments } of this.compiled) {
      if (!methods.includes(route.method) && matchSegments(segments, parts)) {
        methods.push(route.method);
      }
    }
    return methods;
  }
}
