/**
 * Path conflict resolver
 *
 * Validates every resolved route against every other route of the same
 * method, and defines the dispatch precedence the assembler sorts by.
 */

import { diagnostic } from './errors.js';
import type { Diagnostic } from './errors.js';
import { compareStrings, formatPattern } from './path.js';
import { HTTP_METHODS } from './types.js';
import type { PathSegment, ScopedRoute, SegmentKind } from './types.js';

const KIND_RANK: Record<SegmentKind, number> = {
  static: 0,
  dynamic: 1,
  catchAll: 2,
};

function shapeOf(segment: PathSegment): string {
  switch (segment.kind) {
    case 'dynamic':
      return ':';
    case 'catchAll':
      return '*';
    default:
      return `=${segment.value}`;
  }
}

/**
 * Sequence of segment kinds, with literals for static segments.
 * `/users/:id` and `/users/:userId` share a shape.
 */
export function shapeKey(segments: readonly PathSegment[]): string {
  return segments.map(shapeOf).join('/');
}

/**
 * Dispatch precedence: static before dynamic before catch-all, left to right;
 * a strict prefix sorts before its extensions; then verb order.
 */
export function compareRoutes<H, T>(a: ScopedRoute<H, T>, b: ScopedRoute<H, T>): number {
  const length = Math.min(a.segments.length, b.segments.length);

  for (let i = 0; i < length; i++) {
    const sa = a.segments[i];
    const sb = b.segments[i];
    const rank = KIND_RANK[sa.kind] - KIND_RANK[sb.kind];
    if (rank !== 0) return rank;
    if (sa.kind === 'static') {
      const cmp = compareStrings(sa.value, sb.value);
      if (cmp !== 0) return cmp;
    }
  }

  return (
    a.segments.length - b.segments.length ||
    HTTP_METHODS.indexOf(a.route.method) - HTTP_METHODS.indexOf(b.route.method) ||
    compareStrings(a.route.source, b.route.source)
  );
}

function checkCatchAllPosition<H, T>(route: ScopedRoute<H, T>): Diagnostic | null {
  const index = route.segments.findIndex((s) => s.kind === 'catchAll');
  if (index === -1 || index === route.segments.length - 1) {
    return null;
  }
  const pattern = formatPattern(route.segments);
  return diagnostic(
    'PathConflict',
    pattern,
    `catch-all segment *${route.segments[index].value} must be the final segment of ${pattern}`,
    [route.route.source]
  );
}

function checkParameterNames<H, T>(route: ScopedRoute<H, T>): Diagnostic | null {
  const seen = new Set<string>();
  const repeated = new Set<string>();

  for (const segment of route.segments) {
    if (segment.kind === 'static') continue;
    if (seen.has(segment.value)) {
      repeated.add(segment.value);
    }
    seen.add(segment.value);
  }

  if (repeated.size === 0) {
    return null;
  }

  const pattern = formatPattern(route.segments);
  const names = [...repeated].map((n) => `"${n}"`).join(', ');
  return diagnostic(
    'AmbiguousParameterName',
    pattern,
    `parameter ${names} bound more than once in ${pattern}`,
    [route.route.source]
  );
}

function checkDuplicates<H, T>(routes: readonly ScopedRoute<H, T>[]): Diagnostic[] {
  const groups = new Map<string, ScopedRoute<H, T>[]>();

  for (const route of routes) {
    const key = `${route.route.method} ${shapeKey(route.segments)}`;
    const group = groups.get(key);
    if (group) {
      group.push(route);
    } else {
      groups.set(key, [route]);
    }
  }

  const diagnostics: Diagnostic[] = [];
  for (const group of groups.values()) {
    if (group.length < 2) continue;

    const sources = group.map((r) => r.route.source);
    const pattern = formatPattern(group[0].segments);
    diagnostics.push(
      diagnostic(
        'DuplicateRoute',
        pattern,
        `${group[0].route.method} ${pattern} is declared by ${sources.join(' and ')}`,
        sources
      )
    );
  }
  return diagnostics;
}

function samePrefixShape(a: readonly PathSegment[], b: readonly PathSegment[], length: number): boolean {
  for (let i = 0; i < length; i++) {
    if (shapeOf(a[i]) !== shapeOf(b[i])) return false;
  }
  return true;
}

/**
 * A catch-all closes its position for its method: no static or dynamic
 * sibling may end at the same position.
 */
function checkCatchAllSiblings<H, T>(routes: readonly ScopedRoute<H, T>[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const catchAll of routes) {
    const length = catchAll.segments.length;
    if (length === 0 || catchAll.segments[length - 1].kind !== 'catchAll') continue;

    for (const other of routes) {
      if (
        other === catchAll ||
        other.route.method !== catchAll.route.method ||
        other.segments.length !== length ||
        other.segments[length - 1].kind === 'catchAll' ||
        !samePrefixShape(catchAll.segments, other.segments, length - 1)
      ) {
        continue;
      }

      const pattern = formatPattern(catchAll.segments);
      const otherPattern = formatPattern(other.segments);
      diagnostics.push(
        diagnostic(
          'PathConflict',
          pattern,
          `${catchAll.route.method} ${pattern} (${catchAll.route.source}) and ${otherPattern} (${other.route.source}) compete for the same position`,
          [catchAll.route.source, other.route.source]
        )
      );
    }
  }

  return diagnostics;
}

/**
 * Collect every conflict across the route set
 */
export function checkConflicts<H, T>(routes: readonly ScopedRoute<H, T>[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const route of routes) {
    const position = checkCatchAllPosition(route);
    if (position) diagnostics.push(position);

    const names = checkParameterNames(route);
    if (names) diagnostics.push(names);
  }

  diagnostics.push(...checkDuplicates(routes));
  diagnostics.push(...checkCatchAllSiblings(routes));

  return diagnostics;
}
