/**
 * Filesystem collaborator: walks the routes directory and turns every
 * candidate file into a declaration.
 *
 * - Entries are visited in sorted order
 * - Dot entries are ignored, as are `_private/` and `-excluded/` directories
 * - Files without a configured extension are not declarations
 * - A middleware file opts into override mode with `export const mode = 'override'`
 *
 * Handler and transform references are the absolute file paths.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { extname, join } from 'path';
import { resolveConfig } from './config.js';
import { declarationFromPath } from './declarations.js';
import { logger } from './logger.js';
import { compareStrings } from './path.js';
import type { Declaration, MiddlewareMode, RouterConfig } from './types.js';

// export const mode = 'override'
// export const mode: MiddlewareMode = "override"
const OVERRIDE_PATTERN = /export\s+(?:const|let|var)\s+mode\b[^=]*=\s*['"]override['"]/;

/**
 * Read the composition mode a middleware file exports
 */
export function detectMiddlewareMode(filePath: string): MiddlewareMode {
  const content = readFileSync(filePath, 'utf-8');
  return OVERRIDE_PATTERN.test(content) ? 'override' : 'overlay';
}

export function isExcludedDirectory(name: string): boolean {
  return name.startsWith('.') || name.startsWith('_') || name.startsWith('-');
}

export class RouteScanner {
  private config: RouterConfig;
  private log = logger.child({ component: 'scanner' });

  constructor(options: Partial<RouterConfig> = {}) {
    this.config = resolveConfig(options);
  }

  get rootDirectory(): string {
    return this.config.rootDirectory;
  }

  /**
   * Scan the routes directory. A missing directory yields no declarations.
   */
  scan(): Declaration<string>[] {
    if (!existsSync(this.config.rootDirectory)) {
      this.log.warn(`routes directory not found: ${this.config.rootDirectory}`);
      return [];
    }

    const declarations: Declaration<string>[] = [];
    this.scanDirectory(this.config.rootDirectory, [], declarations);
    this.log.debug(`found ${declarations.length} declaration(s)`, { path: this.config.rootDirectory });
    return declarations;
  }

  private scanDirectory(dir: string, parts: string[], declarations: Declaration<string>[]): void {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => compareStrings(a.name, b.name));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!isExcludedDirectory(entry.name)) {
          this.scanDirectory(fullPath, [...parts, entry.name], declarations);
        }
        continue;
      }

      if (!entry.isFile() || !this.isDeclarationFile(entry.name)) {
        continue;
      }

      const relativePath = [...parts, entry.name].join('/');
      const mode = this.isMiddlewareFile(entry.name) ? detectMiddlewareMode(fullPath) : undefined;
      declarations.push(declarationFromPath(relativePath, fullPath, mode));
    }
  }

  private isDeclarationFile(fileName: string): boolean {
    if (fileName.startsWith('.') || fileName.endsWith('.d.ts')) {
      return false;
    }
    return this.config.extensions.includes(extname(fileName));
  }

  private isMiddlewareFile(fileName: string): boolean {
    return fileName.split('.')[0] === this.config.middlewareMarker;
  }
}

/**
 * Convenience function to scan a routes directory
 */
export function scanDeclarations(
  rootDirectory: string,
  options?: Partial<Omit<RouterConfig, 'rootDirectory'>>
): Declaration<string>[] {
  return new RouteScanner({ ...options, rootDirectory }).scan();
}
