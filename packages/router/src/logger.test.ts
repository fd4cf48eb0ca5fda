import { describe, it, expect, vi, afterEach } from 'vitest';
import { isLogLevel, Logger } from './logger.js';
import type { LogLevel } from './logger.js';

function capture(env: NodeJS.ProcessEnv = {}) {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const log = new Logger({ env, sink: (level, line) => lines.push({ level, line }) });
  return { log, lines };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ============================================================================
  // Configuration
  // ============================================================================

  it('should read its level and format from the environment', () => {
    const { log } = capture({ SCOPEWISE_LOG_LEVEL: 'debug', SCOPEWISE_JSON_LOGS: 'true' });

    expect(log.getConfig()).toEqual({ jsonFormat: true, minLevel: 'debug' });
  });

  it('should ignore an unknown level', () => {
    const { log } = capture({ SCOPEWISE_LOG_LEVEL: 'verbose' });

    expect(log.getConfig()).toEqual({ jsonFormat: false, minLevel: 'info' });
  });

  // ============================================================================
  // Formatting
  // ============================================================================

  it('should format human-readable lines', () => {
    const { log } = capture();

    const line = log.formatEntry({
      timestamp: '2026-01-02T03:04:05.678Z',
      level: 'info',
      message: 'assembled 3 route(s)',
      context: { component: 'pipeline', stage: 'build', duration_ms: 1.234 },
    });

    expect(line).toBe('03:04:05 INFO  [pipeline] assembled 3 route(s) stage=build 1.23ms');
  });

  it('should append the error name and message', () => {
    const { log } = capture();

    const line = log.formatEntry({
      timestamp: '2026-01-02T03:04:05.678Z',
      level: 'error',
      message: 'rebuild failed',
      error: { name: 'TypeError', message: 'boom' },
    });

    expect(line).toBe('03:04:05 ERROR rebuild failed\n  TypeError: boom');
  });

  it('should format JSON lines', () => {
    const { log } = capture({ SCOPEWISE_JSON_LOGS: 'true' });

    const entry = { timestamp: '2026-01-02T03:04:05.678Z', level: 'warn' as const, message: 'missing' };
    expect(log.formatEntry(entry)).toBe(JSON.stringify(entry));
  });

  // ============================================================================
  // Output
  // ============================================================================

  it('should drop entries below the minimum level', () => {
    const { log, lines } = capture();
    log.setMinLevel('warn');

    log.info('hidden');
    log.warn('shown');

    expect(lines.map((l) => l.level)).toEqual(['warn']);
  });

  it('should merge child context into each entry', () => {
    const { log, lines } = capture({ SCOPEWISE_LOG_LEVEL: 'debug', SCOPEWISE_JSON_LOGS: 'true' });

    log
      .child({ component: 'scanner' })
      .child({ stage: 'scan' })
      .debug('found 2 declaration(s)', { path: '/srv/routes' });

    const written: unknown = JSON.parse(lines[0].line);
    expect(written).toMatchObject({
      level: 'debug',
      message: 'found 2 declaration(s)',
      context: { component: 'scanner', stage: 'scan', path: '/srv/routes' },
    });
  });

  it('should attach errors to error entries', () => {
    const { log, lines } = capture({ SCOPEWISE_JSON_LOGS: 'true' });

    log.error('rebuild failed', { component: 'watcher' }, new TypeError('boom'));

    const written: unknown = JSON.parse(lines[0].line);
    expect(written).toMatchObject({ error: { name: 'TypeError', message: 'boom' } });
  });

  it('should write to stderr by default', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    const log = new Logger({ env: {} });

    log.info('scan finished');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(/^\d{2}:\d{2}:\d{2} INFO  scan finished\n$/);
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
