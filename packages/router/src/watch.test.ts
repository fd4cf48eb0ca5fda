import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { RouteBuildError } from './errors.js';
import type { RouteTable } from './types.js';
import { RouteWatcher } from './watch.js';

const TEST_DIR = join(process.cwd(), '.test-routes-watch');

function writeRoute(filePath: string) {
  const fullPath = join(TEST_DIR, filePath);
  mkdirSync(join(fullPath, '..'), { recursive: true });
  writeFileSync(fullPath, 'export default () => null;');
}

function patterns(table: RouteTable<string>): string[] {
  return table.routes.map((r) => `${r.method} ${r.pattern}`);
}

describe('RouteWatcher', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    writeRoute('index.get.ts');
    writeRoute('users/[id].get.ts');
  });

  afterAll(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('should build the current table without notifying', () => {
    const onChange = vi.fn();
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange });

    expect(patterns(watcher.build())).toEqual(['GET /', 'GET /users/:id']);
    expect(onChange).not.toHaveBeenCalled();
  });

  it('should hand a rebuilt table to onChange', async () => {
    const tables: RouteTable<string>[] = [];
    const watcher = new RouteWatcher({
      config: { rootDirectory: TEST_DIR },
      onChange: (table) => {
        tables.push(table);
      },
    });

    writeRoute('users/index.post.ts');
    await watcher.rebuild();

    expect(tables.map(patterns)).toEqual([['GET /', 'POST /users', 'GET /users/:id']]);
  });

  it('should report build failures to onError', async () => {
    const onChange = vi.fn();
    const errors: Error[] = [];
    const watcher = new RouteWatcher({
      config: { rootDirectory: TEST_DIR },
      onChange,
      onError: (error) => errors.push(error),
    });

    writeRoute('users/[userId].get.ts');
    await watcher.rebuild();

    expect(onChange).not.toHaveBeenCalled();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(RouteBuildError);
    expect(errors[0] instanceof RouteBuildError && errors[0].kinds()).toEqual(['DuplicateRoute']);
  });

  it('should not announce an unchanged table', async () => {
    const onChange = vi.fn();
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange });

    await watcher.rebuild();
    await watcher.rebuild();

    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('should keep the last good table when a rebuild fails', async () => {
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange: vi.fn(), onError: vi.fn() });

    await watcher.rebuild();
    const good = watcher.table;
    writeRoute('users/[userId].get.ts');
    await watcher.rebuild();

    expect(good).not.toBeNull();
    expect(watcher.table).toBe(good);
  });

  it('should report a throwing onChange to onError', async () => {
    const errors: Error[] = [];
    const watcher = new RouteWatcher({
      config: { rootDirectory: TEST_DIR },
      onChange: () => {
        throw new Error('listener failed');
      },
      onError: (error) => errors.push(error),
    });

    await watcher.rebuild();

    expect(errors.map((e) => e.message)).toEqual(['listener failed']);
  });

  it('should build on start unless told to skip', async () => {
    const onChange = vi.fn();
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange });

    watcher.start();
    await watcher.stop();

    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('should skip the initial build when asked', async () => {
    const onChange = vi.fn();
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange, skipInitial: true });

    watcher.start();
    await watcher.stop();

    expect(onChange).not.toHaveBeenCalled();
  });

  it('should rebuild when route files are added under a dot-prefixed root', async () => {
    const tables: string[][] = [];
    const watcher = new RouteWatcher({
      config: { rootDirectory: TEST_DIR },
      debounce: 50,
      skipInitial: true,
      onChange: (table) => {
        tables.push(patterns(table));
      },
    });

    watcher.start();
    try {
      await watcher.ready();
      writeRoute('about.get.ts');
      writeRoute('users/index.post.ts');

      await vi.waitFor(
        () => {
          expect(tables[tables.length - 1]).toEqual(['GET /', 'GET /about', 'POST /users', 'GET /users/:id']);
        },
        { timeout: 5000, interval: 50 }
      );
    } finally {
      await watcher.stop();
    }
  });

  it('should ignore dot entries below the root', async () => {
    const onChange = vi.fn();
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, debounce: 20, skipInitial: true, onChange });

    watcher.start();
    try {
      await watcher.ready();
      writeRoute('.drafts/about.get.ts');
      await new Promise((resolve) => setTimeout(resolve, 400));
    } finally {
      await watcher.stop();
    }

    expect(onChange).not.toHaveBeenCalled();
  });

  it('should stop cleanly when never started', async () => {
    const watcher = new RouteWatcher({ config: { rootDirectory: TEST_DIR }, onChange: vi.fn() });

    await expect(watcher.stop()).resolves.toBeUndefined();
  });
});
