/**
 * Router configuration
 *
 * Options alter the parsing rules only: the routes directory, extra method
 * tokens, the middleware marker name and the extensions the scanner picks up.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigError } from './errors.js';
import { HTTP_METHODS } from './types.js';
import type { HttpMethod, RouterConfig } from './types.js';

export const CONFIG_FILE_NAME = 'scopewise.config.json';

export const DEFAULT_CONFIG: Readonly<RouterConfig> = Object.freeze({
  rootDirectory: 'routes',
  methodAliases: {},
  middlewareMarker: '_middleware',
  extensions: ['.ts', '.js', '.mts', '.mjs', '.cts', '.cjs', '.tsx', '.jsx'],
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((m) => m === value);
}

function readAliases(value: unknown): Record<string, HttpMethod> {
  if (!isRecord(value)) {
    throw new ConfigError('methodAliases', 'expected an object of token → method');
  }

  const aliases: Record<string, HttpMethod> = {};
  for (const [token, target] of Object.entries(value)) {
    if (typeof target !== 'string') {
      throw new ConfigError('methodAliases', `alias "${token}" must map to a method name`);
    }
    const method = target.toUpperCase();
    if (!isHttpMethod(method)) {
      throw new ConfigError('methodAliases', `alias "${token}" maps to unknown method "${target}"`);
    }
    if (!/^[A-Za-z]+$/.test(token)) {
      throw new ConfigError('methodAliases', `alias "${token}" must be letters only`);
    }
    aliases[token.toLowerCase()] = method;
  }
  return aliases;
}

function readExtensions(value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('extensions', 'expected a non-empty array');
  }
  return value.map((ext) => {
    if (typeof ext !== 'string' || !/^\.[A-Za-z0-9]+$/.test(ext)) {
      throw new ConfigError('extensions', `"${String(ext)}" is not an extension like ".ts"`);
    }
    return ext;
  });
}

/**
 * Merge user options over the defaults and validate them
 */
export function resolveConfig(options: unknown = {}): RouterConfig {
  if (!isRecord(options)) {
    throw new ConfigError('(root)', 'expected an object');
  }

  const config: RouterConfig = {
    ...DEFAULT_CONFIG,
    methodAliases: {},
    extensions: [...DEFAULT_CONFIG.extensions],
  };

  if (options.rootDirectory !== undefined) {
    if (typeof options.rootDirectory !== 'string' || options.rootDirectory.length === 0) {
      throw new ConfigError('rootDirectory', 'expected a non-empty string');
    }
    config.rootDirectory = options.rootDirectory;
  }

  if (options.middlewareMarker !== undefined) {
    if (typeof options.middlewareMarker !== 'string' || !/^[A-Za-z0-9_$-]+$/.test(options.middlewareMarker)) {
      throw new ConfigError('middlewareMarker', 'expected a bare file name without dots');
    }
    config.middlewareMarker = options.middlewareMarker;
  }

  if (options.methodAliases !== undefined) {
    config.methodAliases = readAliases(options.methodAliases);
  }

  if (options.extensions !== undefined) {
    config.extensions = readExtensions(options.extensions);
  }

  return config;
}

/**
 * Load `scopewise.config.json` (or an explicit path). A missing default file
 * yields the defaults; a missing explicit file is an error.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): RouterConfig {
  const path = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath) {
      throw new ConfigError('(file)', `config file not found: ${path}`);
    }
    return withRoot(resolveConfig(), cwd);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError('(file)', `could not parse ${path}: ${reason}`);
  }

  return withRoot(resolveConfig(raw), cwd);
}

function withRoot(config: RouterConfig, cwd: string): RouterConfig {
  return { ...config, rootDirectory: resolve(cwd, config.rootDirectory) };
}
