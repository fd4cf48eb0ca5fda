#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { routesCommand } from './commands/routes.js';
import type { RoutesOptions } from './commands/routes.js';

const program = new Command();

program
  .name('scopewise')
  .description('File-based route resolution with scoped middleware')
  .version('0.1.0', '-v, --version')
  .helpOption('-h, --help');

program
  .command('routes')
  .description('Resolve the routes directory into a route table')
  .option('-d, --routes-dir <dir>', 'Routes directory path')
  .option('-c, --config <path>', 'Path to scopewise.config.json')
  .option('-m, --manifest <path>', 'Read declarations from a JSON manifest instead of the filesystem')
  .option('-o, --output <file>', 'Write the route table as JSON')
  .option('--json', 'Print the route table as JSON')
  .option('-w, --watch', 'Rebuild the table when routes change')
  .option('-l, --log-level <level>', 'Log level (trace|debug|info|warn|error)')
  .action(async (options: RoutesOptions) => {
    process.exitCode = await routesCommand(options);
  });

// Handle unknown commands
program.on('command:*', () => {
  console.error(chalk.red(`\nError: Unknown command "${program.args[0]}".\n`));
  program.outputHelp();
  process.exit(1);
});

if (!process.argv.slice(2).length) {
  program.outputHelp();
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}\n`));
  process.exit(1);
});
