/**
 * Embedded manifest input
 *
 * Accepts either a bare list of routes-relative files or
 * `{ "routes": [{ "file": "api/public/_middleware.ts", "mode": "override" }] }`.
 */

import { readFileSync } from 'fs';
import { declarationFromPath } from './declarations.js';
import { ManifestError } from './errors.js';
import type { Declaration, MiddlewareMode } from './types.js';

export interface ManifestEntry {
  file: string;
  mode?: MiddlewareMode;
}

function isMode(value: unknown): value is MiddlewareMode {
  return value === 'overlay' || value === 'override';
}

function readEntry(value: unknown, index: number): ManifestEntry {
  if (typeof value === 'string') {
    return { file: value };
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ManifestError(index, 'expected a file path or { file, mode }');
  }

  const file: unknown = Reflect.get(value, 'file');
  const mode: unknown = Reflect.get(value, 'mode');

  if (typeof file !== 'string') {
    throw new ManifestError(index, '"file" must be a string');
  }
  if (mode !== undefined && !isMode(mode)) {
    throw new ManifestError(index, `"mode" must be "overlay" or "override", got ${JSON.stringify(mode)}`);
  }

  return mode === undefined ? { file } : { file, mode };
}

function checkPath(file: string, index: number): void {
  if (file.length === 0 || file.startsWith('/')) {
    throw new ManifestError(index, `"${file}" must be a relative path`);
  }
  for (const part of file.split('/')) {
    if (part.length === 0 || part === '.' || part === '..') {
      throw new ManifestError(index, `"${file}" contains an empty or relative component`);
    }
  }
}

/**
 * Validate a parsed manifest and turn it into declarations
 */
export function parseManifest(input: unknown): Declaration<string>[] {
  let entries: unknown;

  if (Array.isArray(input)) {
    entries = input;
  } else if (typeof input === 'object' && input !== null) {
    entries = Reflect.get(input, 'routes');
  }

  if (!Array.isArray(entries)) {
    throw new ManifestError(null, 'expected an array or an object with a "routes" array');
  }

  return entries.map((value: unknown, index) => {
    const entry = readEntry(value, index);
    checkPath(entry.file, index);
    return declarationFromPath(entry.file, entry.file, entry.mode);
  });
}

export function readManifest(path: string): Declaration<string>[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ManifestError(null, `could not read ${path}: ${reason}`);
  }
  return parseManifest(raw);
}
