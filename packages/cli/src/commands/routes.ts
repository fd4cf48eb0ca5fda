import chalk from 'chalk';
import ora from 'ora';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import {
  isLogLevel,
  loadConfig,
  logger,
  readManifest,
  RouteBuildError,
  scanDeclarations,
  serializeTable,
  tryBuildRouteTable,
  watchRoutes,
} from '@scopewise/router';
import type { Declaration, RouteTable, RouterConfig } from '@scopewise/router';
import { formatDiagnostics, formatMiddlewareScopes, formatRouteTable } from '../report.js';

export interface RoutesOptions {
  routesDir?: string;
  config?: string;
  manifest?: string;
  output?: string;
  json?: boolean;
  watch?: boolean;
  logLevel?: string;
}

function printTable(table: RouteTable<string>, config: RouterConfig): void {
  console.log(chalk.white('\n🌐 Routes:\n'));
  console.log(formatRouteTable(table).join('\n'));

  console.log(chalk.white('\n🧅 Middleware scopes:\n'));
  console.log(formatMiddlewareScopes(table).join('\n'));

  console.log(chalk.gray(`\n  ${table.routes.length} route(s) from ${config.rootDirectory}\n`));
}

function loadDeclarations(options: RoutesOptions, config: RouterConfig): Declaration<string>[] {
  if (options.manifest) {
    return readManifest(resolve(options.manifest));
  }
  return scanDeclarations(config.rootDirectory, config);
}

/**
 * Resolve the routes directory (or a manifest) into a route table and
 * print it. Returns the process exit code.
 */
export async function routesCommand(options: RoutesOptions): Promise<number> {
  const spinner = ora();

  if (options.logLevel) {
    if (!isLogLevel(options.logLevel)) {
      console.error(chalk.red(`\nError: unknown log level "${options.logLevel}"\n`));
      return 1;
    }
    logger.setMinLevel(options.logLevel);
  }

  let config: RouterConfig;
  let declarations: Declaration<string>[];
  try {
    config = loadConfig(process.cwd(), options.config);
    if (options.routesDir) {
      config = { ...config, rootDirectory: resolve(options.routesDir) };
    }
    declarations = loadDeclarations(options, config);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`\nError: ${message}\n`));
    return 1;
  }

  spinner.start(`Resolving ${declarations.length} declaration(s)...`);
  const result = tryBuildRouteTable(declarations, { config });

  if (!result.ok) {
    spinner.fail(`Route ${result.error.stage} failed`);
    console.error(formatDiagnostics(result.error.diagnostics).join('\n'));
    return 1;
  }

  spinner.succeed('Route table assembled');
  const { table } = result;

  if (options.json) {
    console.log(serializeTable(table));
  } else {
    printTable(table, config);
  }

  if (options.output) {
    const outputPath = resolve(options.output);
    writeFileSync(outputPath, serializeTable(table));
    if (!options.json) {
      console.log(chalk.gray(`  Output: ${outputPath}\n`));
    }
  }

  if (!options.watch) {
    return 0;
  }

  console.error(chalk.cyan(`👀 Watching ${config.rootDirectory}\n`));
  const watcher = watchRoutes({
    config,
    skipInitial: true,
    onChange: (next) => {
      if (options.json) {
        console.log(serializeTable(next));
      } else {
        console.clear();
        printTable(next, config);
      }
      if (options.output) {
        writeFileSync(resolve(options.output), serializeTable(next));
      }
    },
    onError: (error) => {
      if (error instanceof RouteBuildError) {
        console.error(chalk.red(`\nRoute ${error.stage} failed`));
        console.error(formatDiagnostics(error.diagnostics).join('\n'));
      } else {
        console.error(chalk.red(`\nError: ${error.message}\n`));
      }
    },
  });

  await new Promise<void>((done) => {
    process.once('SIGINT', () => {
      watcher.stop().then(done, done);
    });
  });
  return 0;
}
