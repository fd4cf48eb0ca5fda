/**
 * Build diagnostics and error classes
 */

export type ParseErrorKind = 'UnknownMethod' | 'InvalidFileName';

export type BuildErrorKind =
  | 'DuplicateMiddleware'
  | 'DuplicateRoute'
  | 'PathConflict'
  | 'AmbiguousParameterName';

export type ErrorKind = ParseErrorKind | BuildErrorKind;

export type BuildStage = 'parse' | 'build';

export interface Diagnostic {
  kind: ErrorKind;
  /** Offending path: a declaration source or a route pattern */
  path: string;
  message: string;
  /** Every source location involved */
  sources: string[];
}

const PARSE_KINDS: readonly ErrorKind[] = ['UnknownMethod', 'InvalidFileName'];

export function errorFamily(kind: ErrorKind): 'ParseError' | 'BuildError' {
  return PARSE_KINDS.includes(kind) ? 'ParseError' : 'BuildError';
}

/**
 * Render a diagnostic as `ParseError::UnknownMethod at users/[id].gett.ts: ...`
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${errorFamily(diagnostic.kind)}::${diagnostic.kind} at ${diagnostic.path}: ${diagnostic.message}`;
}

export function diagnostic(
  kind: ErrorKind,
  path: string,
  message: string,
  sources: string[] = [path]
): Diagnostic {
  return { kind, path, message, sources };
}

/**
 * Thrown when a pipeline stage fails. Carries every diagnostic the failing
 * stage collected.
 */
export class RouteBuildError extends Error {
  constructor(
    public readonly stage: BuildStage,
    public readonly diagnostics: readonly Diagnostic[]
  ) {
    const noun = diagnostics.length === 1 ? 'error' : 'errors';
    super(`Route ${stage} failed with ${diagnostics.length} ${noun}:\n${diagnostics.map((d) => `  ${formatDiagnostic(d)}`).join('\n')}`);
    this.name = 'RouteBuildError';

    // Restore prototype chain for proper instanceof checks
    Object.setPrototypeOf(this, RouteBuildError.prototype);
  }

  kinds(): ErrorKind[] {
    return this.diagnostics.map((d) => d.kind);
  }
}

export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Invalid config "${key}": ${message}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class ManifestError extends Error {
  constructor(
    public readonly entry: number | null,
    message: string
  ) {
    super(entry === null ? `Invalid manifest: ${message}` : `Invalid manifest entry ${entry}: ${message}`);
    this.name = 'ManifestError';
    Object.setPrototypeOf(this, ManifestError.prototype);
  }
}
