/**
 * Route types for scopewise file-based routing
 *
 * File naming:
 * - index.get.ts      → / (enclosing scope's own path)
 * - [id].get.ts       → /:id (dynamic segment)
 * - [...slug].get.ts  → /*slug (catch-all)
 * - _middleware.ts    → middleware for the directory and everything below it
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

/** Fixed verb order, also the final tie-break when sorting routes */
export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS'];

/**
 * How a scope's middleware relates to what it inherits.
 * - overlay: appended to the inherited chain
 * - override: replaces the inherited chain
 */
export type MiddlewareMode = 'overlay' | 'override';

export type SegmentKind = 'static' | 'dynamic' | 'catchAll';

export interface PathSegment {
  kind: SegmentKind;
  /** Literal text for static segments, parameter name otherwise */
  value: string;
}

/**
 * One entry supplied by a filesystem, manifest or explicit-registration
 * collaborator. Only `name` and `directory` are inspected; `handler` and
 * `transform` pass through untouched.
 */
export interface Declaration<H, T = H> {
  /** Entry name, e.g. `[id].get.ts` or `_middleware.ts` */
  name: string;
  /** Directory names from the routes root down to this entry */
  directory: readonly string[];
  handler?: H;
  transform?: T;
  /** Only read for middleware declarations (default overlay) */
  mode?: MiddlewareMode;
  /** Location reported in diagnostics; defaults to `directory/name` */
  source?: string;
}

export interface RouteDescriptor<H> {
  /** Segment contributed by the name, null for index routes */
  segment: PathSegment | null;
  isDynamic: boolean;
  isCatchAll: boolean;
  method: HttpMethod;
  source: string;
  handler: H;
}

export interface MiddlewareSpec<T> {
  mode: MiddlewareMode;
  transform: T;
  source: string;
}

/**
 * A directory in the scope tree. The root has no segment.
 */
export interface ScopeNode<H, T> {
  /** Raw directory name ('' at the root) */
  name: string;
  segment: PathSegment | null;
  /** Display path of this scope, e.g. `/api/users/:id` */
  path: string;
  routes: RouteDescriptor<H>[];
  middleware: MiddlewareSpec<T> | null;
  /** Children keyed by raw directory name, in sorted order */
  children: Map<string, ScopeNode<H, T>>;
}

/**
 * Resolver output: one route with its full path and effective chain.
 */
export interface ScopedRoute<H, T> {
  segments: readonly PathSegment[];
  route: RouteDescriptor<H>;
  chain: readonly MiddlewareSpec<T>[];
  /** Scope path of each chain entry, parallel to `chain` */
  chainScopes: readonly string[];
}

export interface ResolvedRoute<H, T = H> {
  /** Stable identifier derived from the source path, e.g. `api_users_id_get` */
  id: string;
  /** Full path pattern, e.g. `/users/:id` or `/posts/*slug` */
  pattern: string;
  method: HttpMethod;
  params: readonly string[];
  /** Effective middleware chain, root-most first */
  middleware: readonly T[];
  middlewareScopes: readonly string[];
  handler: H;
  source: string;
}

export interface RouteSummary {
  method: HttpMethod;
  path: string;
  middlewareCount: number;
  /** Scope paths joined with ` → `, or `(none)` */
  chain: string;
}

export interface MiddlewareScopeSummary {
  scope: string;
  mode: MiddlewareMode;
  /** Nearest ancestor scope that declares middleware */
  parent: string | null;
  source: string;
}

export interface RouteTable<H, T = H> {
  routes: readonly ResolvedRoute<H, T>[];
  summary: readonly RouteSummary[];
  middleware: readonly MiddlewareScopeSummary[];
}

export interface RouteMatch<H, T = H> {
  route: ResolvedRoute<H, T>;
  params: Record<string, string>;
}

/** Transport-side registration interface */
export interface RouteRegistrar<H, T = H> {
  register(route: ResolvedRoute<H, T>): void;
}

export interface RouterConfig {
  /** Routes directory, resolved against the working directory */
  rootDirectory: string;
  /** Extra method tokens, e.g. `{ del: 'DELETE' }`; keys match case-insensitively */
  methodAliases: Record<string, HttpMethod>;
  /** Reserved name of middleware declarations */
  middlewareMarker: string;
  /** File extensions the filesystem scanner treats as declarations */
  extensions: string[];
}

export interface WatchOptions {
  config?: Partial<RouterConfig>;
  /** Called with every freshly assembled table */
  onChange: (table: RouteTable<string>) => void | Promise<void>;
  /** Called when a rebuild fails */
  onError?: (error: Error) => void;
  /** Debounce delay in ms */
  debounce?: number;
  /** Skip the initial build on start */
  skipInitial?: boolean;
}
