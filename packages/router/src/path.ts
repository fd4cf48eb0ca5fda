import type { PathSegment } from './types.js';

export function formatSegment(segment: PathSegment): string {
  switch (segment.kind) {
    case 'dynamic':
      return `:${segment.value}`;
    case 'catchAll':
      return `*${segment.value}`;
    default:
      return segment.value;
  }
}

/**
 * Render segments as a path pattern, e.g. `/users/:id` or `/posts/*slug`
 */
export function formatPattern(segments: readonly PathSegment[]): string {
  return '/' + segments.map(formatSegment).join('/');
}

/**
 * Build an identifier from path parts: non-alphanumerics become single
 * underscores, with none leading or trailing.
 * e.g. ["api", "[id]", "get"] -> "api_id_get"
 */
export function sanitizeIdent(parts: readonly string[]): string {
  return parts
    .join('_')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Code-unit string comparison, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
