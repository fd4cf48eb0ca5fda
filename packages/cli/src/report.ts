import chalk from 'chalk';
import { errorFamily } from '@scopewise/router';
import type { Diagnostic, RouteTable } from '@scopewise/router';

/**
 * One line per route: method, path, middleware chain
 */
export function formatRouteTable<H, T>(table: RouteTable<H, T>): string[] {
  if (table.summary.length === 0) {
    return [chalk.gray('  (none)')];
  }

  const width = Math.max(...table.summary.map((s) => s.path.length));
  return table.summary.map(
    (s) => `  ${chalk.green(s.method.padEnd(7))} ${chalk.cyan(s.path.padEnd(width))}  ${chalk.gray(s.chain)}`
  );
}

export function formatMiddlewareScopes<H, T>(table: RouteTable<H, T>): string[] {
  if (table.middleware.length === 0) {
    return [chalk.gray('  (none)')];
  }

  const width = Math.max(...table.middleware.map((m) => m.scope.length));
  return table.middleware.map((m) => {
    const mode = m.mode === 'override' ? chalk.yellow(m.mode.padEnd(8)) : chalk.blue(m.mode.padEnd(8));
    return `  ${chalk.magenta(m.scope.padEnd(width))}  ${mode}  ${chalk.gray(`parent ${m.parent ?? '(none)'}`)}`;
  });
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  const lines: string[] = [];
  for (const d of diagnostics) {
    lines.push(`  ${chalk.red(`${errorFamily(d.kind)}::${d.kind}`)} ${chalk.white(d.path)}`);
    lines.push(`    ${chalk.gray(d.message)}`);
  }
  return lines;
}
