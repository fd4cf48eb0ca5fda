import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import stripAnsi from 'strip-ansi';
import { logger } from '@scopewise/router';
import { routesCommand } from './routes.js';

const TEST_DIR = join(process.cwd(), '.test-cli-routes');
const ROUTES = join(TEST_DIR, 'routes');
const BROKEN = join(TEST_DIR, 'broken');

function writeFiles(root: string, files: string[]) {
  for (const file of files) {
    const fullPath = join(root, file);
    mkdirSync(join(fullPath, '..'), { recursive: true });
    writeFileSync(fullPath, 'export default () => null;');
  }
}

interface SerializedTable {
  version: number;
  routes: Array<{ id: string; method: string; pattern: string }>;
}

function lastJson(spy: { mock: { calls: unknown[][] } }): SerializedTable {
  return JSON.parse(String(spy.mock.calls[spy.mock.calls.length - 1][0]));
}

describe('routesCommand', () => {
  beforeAll(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    writeFiles(ROUTES, ['_middleware.ts', 'index.get.ts', 'users/[id].get.ts', 'users/index.post.ts']);
    writeFiles(BROKEN, ['users/[id].get.ts', 'users/[userId].get.ts', 'about.fetch.ts']);
    writeFileSync(join(TEST_DIR, 'manifest.json'), JSON.stringify({ routes: ['health.get.ts'] }));
  });

  afterAll(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setMinLevel('error');
  });

  it('should print the route table as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const code = await routesCommand({ routesDir: ROUTES, json: true });

    expect(code).toBe(0);
    expect(lastJson(log).routes.map((r) => `${r.method} ${r.pattern}`)).toEqual([
      'GET /',
      'POST /users',
      'GET /users/:id',
    ]);
  });

  it('should keep stdout to the JSON table at info level', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const output = join(TEST_DIR, 'info-table.json');

    const code = await routesCommand({ routesDir: ROUTES, json: true, output, logLevel: 'info' });

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    const printed: SerializedTable = JSON.parse(String(log.mock.calls[0][0]));
    expect(printed.routes).toHaveLength(3);
    const logged = stderr.mock.calls.map(([chunk]) => stripAnsi(String(chunk))).join('');
    expect(logged).toContain('INFO  [pipeline] assembled 3 route(s), 1 middleware scope(s) ');
  });

  it('should write the table to a file', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const output = join(TEST_DIR, 'table.json');

    const code = await routesCommand({ routesDir: ROUTES, output });

    expect(code).toBe(0);
    const written: SerializedTable = JSON.parse(readFileSync(output, 'utf-8'));
    expect(written.version).toBe(1);
    expect(written.routes.map((r) => r.id)).toEqual(['index_get', 'users_index_post', 'users_id_get']);
  });

  it('should read declarations from a manifest', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const code = await routesCommand({ manifest: join(TEST_DIR, 'manifest.json'), json: true });

    expect(code).toBe(0);
    expect(lastJson(log).routes.map((r) => r.pattern)).toEqual(['/health']);
  });

  it('should print diagnostics and fail', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await routesCommand({ routesDir: BROKEN });

    expect(code).toBe(1);
    expect(stripAnsi(String(error.mock.calls[0][0])).split('\n')).toEqual([
      '  ParseError::UnknownMethod about.fetch.ts',
      '    "fetch" is not a known HTTP method',
    ]);
  });

  it('should reject an unknown log level', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await routesCommand({ routesDir: ROUTES, logLevel: 'verbose' });

    expect(code).toBe(1);
    expect(stripAnsi(String(error.mock.calls[0][0]))).toBe('\nError: unknown log level "verbose"\n');
  });

  it('should fail on a missing config file', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const code = await routesCommand({ routesDir: ROUTES, config: join(TEST_DIR, 'nope.json') });

    expect(code).toBe(1);
    expect(stripAnsi(String(error.mock.calls[0][0]))).toContain('config file not found');
  });
});
