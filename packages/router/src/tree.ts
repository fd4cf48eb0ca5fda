/**
 * Scope tree builder
 *
 * Every directory becomes one scope node holding the routes declared directly
 * in it, at most one middleware spec, and its child directories. Directories
 * without route-bearing descendants are pruned.
 */

import { diagnostic } from './errors.js';
import type { Diagnostic } from './errors.js';
import type { ParsedDeclaration } from './parser.js';
import { compareStrings, formatPattern } from './path.js';
import type { PathSegment, ScopeNode } from './types.js';

export function createScopeNode<H, T>(
  name: string,
  segments: readonly PathSegment[]
): ScopeNode<H, T> {
  return {
    name,
    segment: segments.length > 0 ? segments[segments.length - 1] : null,
    path: formatPattern(segments),
    routes: [],
    middleware: null,
    children: new Map(),
  };
}

function compareDirectories(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const cmp = compareStrings(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

function sortDeclarations<H, T>(parsed: readonly ParsedDeclaration<H, T>[]): ParsedDeclaration<H, T>[] {
  return [...parsed].sort(
    (a, b) => compareDirectories(a.directory, b.directory) || compareStrings(a.source, b.source)
  );
}

function sortChildren<H, T>(node: ScopeNode<H, T>): void {
  const entries = [...node.children.entries()].sort(([a], [b]) => compareStrings(a, b));
  node.children = new Map(entries);
  for (const child of node.children.values()) {
    sortChildren(child);
  }
}

/**
 * Drop children with no routes anywhere below them. Returns whether the node
 * itself bears routes.
 */
function prune<H, T>(node: ScopeNode<H, T>): boolean {
  for (const [name, child] of node.children) {
    if (!prune(child)) {
      node.children.delete(name);
    }
  }
  return node.routes.length > 0 || node.children.size > 0;
}

/**
 * Build the scope tree from parsed declarations
 */
export function buildScopeTree<H, T>(
  parsed: readonly ParsedDeclaration<H, T>[]
): { root: ScopeNode<H, T>; diagnostics: Diagnostic[] } {
  const root = createScopeNode<H, T>('', []);
  const diagnostics: Diagnostic[] = [];

  for (const entry of sortDeclarations(parsed)) {
    let node = root;
    entry.directory.forEach((name, i) => {
      let child = node.children.get(name);
      if (!child) {
        child = createScopeNode<H, T>(name, entry.segments.slice(0, i + 1));
        node.children.set(name, child);
      }
      node = child;
    });

    if (entry.type === 'route') {
      node.routes.push(entry.route);
      continue;
    }

    if (node.middleware) {
      diagnostics.push(
        diagnostic(
          'DuplicateMiddleware',
          node.path,
          `scope ${node.path} declares middleware twice`,
          [node.middleware.source, entry.middleware.source]
        )
      );
      continue;
    }
    node.middleware = entry.middleware;
  }

  sortChildren(root);
  prune(root);

  return { root, diagnostics };
}

/**
 * Visit every scope depth-first, parents before children
 */
export function walkScopes<H, T>(
  node: ScopeNode<H, T>,
  visit: (node: ScopeNode<H, T>, ancestors: readonly ScopeNode<H, T>[]) => void,
  ancestors: readonly ScopeNode<H, T>[] = []
): void {
  visit(node, ancestors);
  for (const child of node.children.values()) {
    walkScopes(child, visit, [...ancestors, node]);
  }
}

export function countRoutes<H, T>(node: ScopeNode<H, T>): number {
  let count = 0;
  walkScopes(node, (scope) => {
    count += scope.routes.length;
  });
  return count;
}
