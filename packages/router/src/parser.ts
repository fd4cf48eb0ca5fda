/**
 * Declaration name parser
 *
 * Naming conventions:
 * - index.get.ts       → enclosing scope's own path, GET
 * - index.ts           → enclosing scope's own path, GET
 * - about.post.ts      → /about, POST
 * - [id].get.ts        → /:id
 * - [...slug].get.ts   → /*slug
 * - _middleware.ts     → middleware for the enclosing scope
 *
 * The extension is optional, so manifests may declare `[id].get` directly.
 */

import { diagnostic } from './errors.js';
import type { Diagnostic } from './errors.js';
import { DEFAULT_CONFIG, isHttpMethod } from './config.js';
import type {
  Declaration,
  HttpMethod,
  MiddlewareSpec,
  PathSegment,
  RouteDescriptor,
  RouterConfig,
} from './types.js';

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const STATIC_NAME = /^[A-Za-z0-9][\w.~@+-]*$/;
const EXTENSION = /^[A-Za-z0-9]+$/;
const INDEX = 'index';
// Assigning these on a plain params object does not create an own key
const RESERVED_PARAMS = new Set(['__proto__']);

export type ParserOptions = Pick<RouterConfig, 'methodAliases' | 'middlewareMarker'> &
  Partial<Pick<RouterConfig, 'extensions'>>;

interface ParsedBase {
  /** Raw directory names */
  directory: readonly string[];
  /** Parsed directory segments, parallel to `directory` */
  segments: readonly PathSegment[];
  source: string;
}

export interface ParsedRoute<H> extends ParsedBase {
  type: 'route';
  route: RouteDescriptor<H>;
}

export interface ParsedMiddleware<T> extends ParsedBase {
  type: 'middleware';
  middleware: MiddlewareSpec<T>;
}

export type ParsedDeclaration<H, T> = ParsedRoute<H> | ParsedMiddleware<T>;

export type ParseResult<H, T> =
  | { ok: true; value: ParsedDeclaration<H, T> }
  | { ok: false; diagnostics: Diagnostic[] };

type SegmentResult = { ok: true; segment: PathSegment } | { ok: false; reason: string };

/**
 * Parse one path component: `[id]`, `[...slug]` or a static literal
 */
function isParamName(name: string): boolean {
  return PARAM_NAME.test(name) && !RESERVED_PARAMS.has(name);
}

export function parseSegment(raw: string): SegmentResult {
  if (raw.startsWith('[...') && raw.endsWith(']')) {
    const name = raw.slice(4, -1);
    return isParamName(name)
      ? { ok: true, segment: { kind: 'catchAll', value: name } }
      : { ok: false, reason: `invalid catch-all parameter name "${name}"` };
  }

  if (raw.startsWith('[') && raw.endsWith(']')) {
    const name = raw.slice(1, -1);
    return isParamName(name)
      ? { ok: true, segment: { kind: 'dynamic', value: name } }
      : { ok: false, reason: `invalid parameter name "${name}"` };
  }

  if (STATIC_NAME.test(raw)) {
    return { ok: true, segment: { kind: 'static', value: raw } };
  }

  return { ok: false, reason: `"${raw}" is not a valid path segment` };
}

/**
 * Map a method token to a verb, case-insensitively, honouring aliases
 */
export function resolveMethod(
  token: string,
  aliases: Readonly<Record<string, HttpMethod>> = {}
): HttpMethod | null {
  const upper = token.toUpperCase();
  if (isHttpMethod(upper)) {
    return upper;
  }
  const key = token.toLowerCase();
  return Object.hasOwn(aliases, key) ? aliases[key] : null;
}

/**
 * Split on dots outside of brackets, keeping empty tokens
 * e.g. "[...slug].get.ts" -> ["[...slug]", "get", "ts"]
 */
function splitTokens(name: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let depth = 0;

  for (const char of name) {
    if (char === '[') depth++;
    if (char === ']') depth--;

    if (char === '.' && depth === 0) {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  tokens.push(current);
  return tokens;
}

function parseDirectory(directory: readonly string[]): SegmentResult[] {
  return directory.map((name) => parseSegment(name));
}

export function sourceOf<H, T>(declaration: Declaration<H, T>): string {
  return declaration.source ?? [...declaration.directory, declaration.name].join('/');
}

/**
 * Parse one declaration into a route descriptor or a middleware spec
 */
export function parseDeclaration<H, T>(
  declaration: Declaration<H, T>,
  options: ParserOptions
): ParseResult<H, T> {
  const source = sourceOf(declaration);
  const diagnostics: Diagnostic[] = [];

  const segments: PathSegment[] = [];
  parseDirectory(declaration.directory).forEach((result, i) => {
    if (result.ok) {
      segments.push(result.segment);
    } else {
      const dirPath = declaration.directory.slice(0, i + 1).join('/');
      diagnostics.push(diagnostic('InvalidFileName', dirPath, `directory ${result.reason}`));
    }
  });

  const fail = (kind: 'InvalidFileName' | 'UnknownMethod', message: string): ParseResult<H, T> => ({
    ok: false,
    diagnostics: [...diagnostics, diagnostic(kind, source, message)],
  });

  const tokens = splitTokens(declaration.name);
  if (tokens.some((t) => t.length === 0)) {
    return fail('InvalidFileName', `"${declaration.name}" has an empty name component`);
  }

  // A trailing token that is not a method is the extension
  const last = tokens[tokens.length - 1];
  let extension: string | null = null;
  if (tokens.length > 1 && resolveMethod(last, options.methodAliases) === null) {
    tokens.pop();
    if (!EXTENSION.test(last)) {
      return fail('InvalidFileName', `"${last}" is not a valid extension`);
    }
    extension = last;
  }

  const base: ParsedBase = { directory: declaration.directory, segments, source };

  if (tokens[0] === options.middlewareMarker) {
    if (tokens.length > 1) {
      return fail('InvalidFileName', `${options.middlewareMarker} declarations take no method suffix`);
    }
    if (declaration.transform === undefined) {
      return fail('InvalidFileName', 'middleware declaration has no transform');
    }
    if (diagnostics.length > 0) {
      return { ok: false, diagnostics };
    }
    return {
      ok: true,
      value: {
        ...base,
        type: 'middleware',
        middleware: {
          mode: declaration.mode ?? 'overlay',
          transform: declaration.transform,
          source,
        },
      },
    };
  }

  let method: HttpMethod = 'GET';
  if (tokens.length === 1) {
    // `[id].gett` carries no extension: the popped token sat in the method slot
    const extensions = options.extensions ?? DEFAULT_CONFIG.extensions;
    if (extension !== null && !extensions.includes(`.${extension}`)) {
      return fail('UnknownMethod', `"${extension}" is not a known HTTP method`);
    }
    if (tokens[0] !== INDEX) {
      return fail('InvalidFileName', `"${declaration.name}" does not match <name>.<method>.<ext>`);
    }
  } else {
    const token = tokens[tokens.length - 1];
    const resolved = resolveMethod(token, options.methodAliases);
    if (resolved === null) {
      return fail('UnknownMethod', `"${token}" is not a known HTTP method`);
    }
    method = resolved;
  }

  const routeName = tokens.length === 1 ? tokens[0] : tokens.slice(0, -1).join('.');
  let segment: PathSegment | null = null;

  if (routeName !== INDEX) {
    if (routeName.startsWith('_')) {
      return fail('InvalidFileName', `"${routeName}" uses the reserved "_" prefix`);
    }
    const parsed = parseSegment(routeName);
    if (!parsed.ok) {
      return fail('InvalidFileName', parsed.reason);
    }
    segment = parsed.segment;
  }

  if (declaration.handler === undefined) {
    return fail('InvalidFileName', 'route declaration has no handler');
  }

  if (diagnostics.length > 0) {
    return { ok: false, diagnostics };
  }

  return {
    ok: true,
    value: {
      ...base,
      type: 'route',
      route: {
        segment,
        isDynamic: segment?.kind === 'dynamic',
        isCatchAll: segment?.kind === 'catchAll',
        method,
        source,
        handler: declaration.handler,
      },
    },
  };
}

/**
 * Parse every declaration, collecting all diagnostics of the stage
 */
export function parseDeclarations<H, T>(
  declarations: readonly Declaration<H, T>[],
  options: ParserOptions
): { parsed: ParsedDeclaration<H, T>[]; diagnostics: Diagnostic[] } {
  const parsed: ParsedDeclaration<H, T>[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  for (const declaration of declarations) {
    const result = parseDeclaration(declaration, options);
    if (result.ok) {
      parsed.push(result.value);
      continue;
    }
    // A bad directory is reported once, not once per entry inside it
    for (const d of result.diagnostics) {
      const key = `${d.kind}\0${d.path}\0${d.message}`;
      if (!seen.has(key)) {
        seen.add(key);
        diagnostics.push(d);
      }
    }
  }

  return { parsed, diagnostics };
}
