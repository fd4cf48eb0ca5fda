/**
 * Route watcher
 *
 * Rebuilds the route table from the routes directory whenever a declaration
 * file or directory changes. Changes arriving within the debounce window are
 * folded into one rebuild. A rebuild that fails keeps the last good table; a
 * rebuild that yields the same serialized table is not announced.
 */

import { watch, type FSWatcher } from 'chokidar';
import { extname, relative, sep } from 'path';
import { serializeTable } from './assembler.js';
import { resolveConfig } from './config.js';
import { RouteBuildError } from './errors.js';
import { logger } from './logger.js';
import { buildRouteTable } from './pipeline.js';
import { isExcludedDirectory, RouteScanner } from './scanner.js';
import type { RouteTable, RouterConfig, WatchOptions } from './types.js';

const DEFAULT_DEBOUNCE = 100;

type WatchEvent = 'add' | 'change' | 'unlink' | 'addDir' | 'unlinkDir';

const WATCH_EVENTS: readonly WatchEvent[] = ['add', 'change', 'unlink', 'addDir', 'unlinkDir'];

/**
 * Dot entries below the root are ignored; the root's own ancestors may be dotted
 */
function isHiddenBelow(root: string, path: string): boolean {
  return relative(root, path)
    .split(sep)
    .some((part) => part.startsWith('.') && part !== '..');
}

export class RouteWatcher {
  private watcher: FSWatcher | null = null;
  private readyPromise: Promise<void> = Promise.resolve();
  private readonly scanner: RouteScanner;
  private readonly config: RouterConfig;
  private readonly debounce: number;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly pending = new Set<string>();
  private current: RouteTable<string> | null = null;
  private currentJson: string | null = null;
  private readonly log = logger.child({ component: 'watcher' });

  constructor(private readonly options: WatchOptions) {
    this.debounce = options.debounce ?? DEFAULT_DEBOUNCE;
    this.config = resolveConfig(options.config ?? {});
    this.scanner = new RouteScanner(this.config);
  }

  /**
   * Last table handed to onChange, if any
   */
  get table(): RouteTable<string> | null {
    return this.current;
  }

  start(): void {
    if (this.watcher) {
      return;
    }

    const root = this.config.rootDirectory;
    const watcher = watch(root, {
      ignoreInitial: true,
      persistent: true,
      ignored: (path: string) => isHiddenBelow(root, path),
      awaitWriteFinish: {
        stabilityThreshold: 50,
        pollInterval: 10,
      },
    });
    this.watcher = watcher;
    this.readyPromise = new Promise((resolve) => {
      watcher.once('ready', () => resolve());
    });

    for (const event of WATCH_EVENTS) {
      watcher.on(event, (path: string) => this.handleChange(event, path));
    }

    watcher.on('error', (error) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.error('watcher error', { path: root }, err);
    });

    if (!this.options.skipInitial) {
      void this.rebuild();
    }
  }

  /**
   * Resolves once the initial directory scan is done and changes are reported
   */
  ready(): Promise<void> {
    return this.readyPromise;
  }

  async stop(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    this.pending.clear();

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }

  /**
   * Build the table from the current directory contents without notifying
   */
  build(): RouteTable<string> {
    return buildRouteTable(this.scanner.scan(), { config: this.config });
  }

  /**
   * Rebuild and announce a changed table. Never rejects: failures go to
   * onError, or to the log when no handler is set.
   */
  async rebuild(): Promise<void> {
    let table: RouteTable<string>;
    try {
      table = this.build();
    } catch (error) {
      this.report(error);
      return;
    }

    const json = serializeTable(table);
    if (json === this.currentJson) {
      this.log.debug('route table unchanged');
      return;
    }
    this.current = table;
    this.currentJson = json;

    try {
      await this.options.onChange(table);
    } catch (error) {
      this.report(error);
    }
  }

  private report(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.options.onError) {
      this.options.onError(err);
    } else if (err instanceof RouteBuildError) {
      this.log.warn(err.message, { stage: err.stage });
    } else {
      this.log.error('rebuild failed', {}, err);
    }
  }

  private handleChange(event: WatchEvent, path: string): void {
    const isDirEvent = event === 'addDir' || event === 'unlinkDir';
    if (!isDirEvent && !this.config.extensions.includes(extname(path))) {
      return;
    }

    const parts = relative(this.config.rootDirectory, path).split(sep);
    const directories = isDirEvent ? parts : parts.slice(0, -1);
    if (directories.some(isExcludedDirectory)) {
      return;
    }

    this.pending.add(path);
    this.scheduleRebuild();
  }

  private scheduleRebuild(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.log.debug(`rebuilding after ${this.pending.size} change(s)`);
      this.pending.clear();
      void this.rebuild();
    }, this.debounce);
  }
}

/**
 * Create a watcher and start it
 */
export function watchRoutes(options: WatchOptions): RouteWatcher {
  const watcher = new RouteWatcher(options);
  watcher.start();
  return watcher;
}
