import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { format } from 'node:util';

import { getLogsDir } from '../cache/workspacePaths.js';
import { FilesystemError } from '../errors.js';

type LogLevel = 'debug' | 'info' | 'trace' | 'error';

let enabled = false;
let logFile: string | null = null;

// Keep this extremely low overhead when disabled.
export function isDebugEnabled(): boolean {
  return enabled || process.env.IL2CPP_WORKBENCH_DEBUG === '1';
}

/**
 * Enable/disable debug logging programmatically (config `debug` flag, tests).
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

/** Today's log file, `<logsDir>/YYYY-MM-DD.log`. */
export function dailyLogFile(now: Date = new Date(), logsDir: string = getLogsDir()): string {
  const day = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, '0'),
    String(now.getDate()).padStart(2, '0'),
  ].join('-');
  return join(logsDir, `${day}.log`);
}

/**
 * Route errors (and debug output while enabled) to `path` as well as the console.
 * Pass null to stop writing to a file. If the log directory cannot be created
 * no file is configured and a FilesystemError is thrown.
 */
export function configureLogFile(path: string | null): string | null {
  logFile = null;
  if (!path) return null;
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (err) {
    throw new FilesystemError(dirname(path), err);
  }
  logFile = path;
  return path;
}

export function getLogFile(): string | null {
  return logFile;
}

function writeFile(level: LogLevel, args: unknown[]) {
  if (!logFile) return;
  try {
    appendFileSync(logFile, `${new Date().toISOString()} ${level.toUpperCase()} ${format(...args)}\n`);
  } catch {
    // A broken log file must never mask the failure being reported.
  }
}

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  writeFile('debug', args);
  // eslint-disable-next-line no-console
  console.log('[il2cpp-workbench]', ...args);
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled()) return;
  writeFile('info', args);
  // eslint-disable-next-line no-console
  console.log('[il2cpp-workbench]', ...args);
}

/** Writes a trace line unconditionally; callers decide whether tracing is on. */
export function logTrace(message: string) {
  writeFile('trace', [message]);
  // eslint-disable-next-line no-console
  console.log('[il2cpp-workbench:trace]', message);
}

/**
 * Always written to the log file (with stack); printed only in debug mode since
 * the CLI prints its own one-line summary.
 */
export function logError(err: unknown, context?: Record<string, unknown>) {
  const detail = err instanceof Error ? err.stack ?? `${err.name}: ${err.message}` : String(err);
  writeFile('error', context ? [detail, context] : [detail]);
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  console.error('[il2cpp-workbench]', detail);
}
