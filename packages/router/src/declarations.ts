/**
 * Explicit registration helpers
 *
 * ```ts
 * buildRouteTable([
 *   declareMiddleware('', cors),
 *   declareRoute('users', '[id].get', getUser),
 *   declareMiddleware('api/public', rateLimit, 'override'),
 * ]);
 * ```
 */

import { DEFAULT_CONFIG } from './config.js';
import type { Declaration, MiddlewareMode } from './types.js';

function toDirectory(directory: string | readonly string[]): string[] {
  if (typeof directory !== 'string') {
    return [...directory];
  }
  return directory.split('/').filter((part) => part.length > 0);
}

export function declareRoute<H>(
  directory: string | readonly string[],
  name: string,
  handler: H
): Declaration<H, never> {
  return { name, directory: toDirectory(directory), handler };
}

export function declareMiddleware<T>(
  directory: string | readonly string[],
  transform: T,
  mode: MiddlewareMode = 'overlay',
  marker: string = DEFAULT_CONFIG.middlewareMarker
): Declaration<never, T> {
  return { name: marker, directory: toDirectory(directory), transform, mode };
}

/**
 * Turn a routes-relative file path into a declaration whose handler and
 * transform are both the file reference
 * e.g. "api/users/[id].get.ts" -> { directory: ["api", "users"], name: "[id].get.ts" }
 */
export function declarationFromPath(
  relativePath: string,
  ref: string = relativePath,
  mode?: MiddlewareMode
): Declaration<string> {
  const parts = relativePath.split(/[\\/]/);
  const name = parts.pop() ?? '';
  return {
    name,
    directory: parts,
    handler: ref,
    transform: ref,
    mode,
    source: parts.concat(name).join('/'),
  };
}
