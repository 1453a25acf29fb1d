import { performance } from 'node:perf_hooks';

import { logTrace } from './logger.js';

/** `info` covers workflow steps, `debug` adds every tool process. */
export type TraceLevel = 'info' | 'debug';

export type SpanRecord = {
  event: string;
  level: TraceLevel;
  durationMs: number;
  data?: Record<string, unknown>;
};

export const TRACE_ENV_KEYS = {
  enabled: 'IL2CPP_WORKBENCH_TRACE',
  level: 'IL2CPP_WORKBENCH_TRACE_LEVEL',
} as const;

function envTraceLevel(): TraceLevel | null {
  const on = process.env[TRACE_ENV_KEYS.enabled];
  if (on !== '1' && on !== 'true' && on !== 'yes') return null;
  return (process.env[TRACE_ENV_KEYS.level] ?? '').toLowerCase() === 'debug' ? 'debug' : 'info';
}

export function shouldTrace(level: TraceLevel): boolean {
  const max = envTraceLevel();
  if (!max) return false;
  return level === 'info' || max === 'debug';
}

/**
 * Starts the clock for `event`. The returned function stops it and, while
 * `IL2CPP_WORKBENCH_TRACE` is on, writes the record as one JSON line to the
 * console and the day's log file.
 */
export function startSpan(event: string, level: TraceLevel = 'info') {
  const started = performance.now();
  return (data?: Record<string, unknown>): SpanRecord => {
    const record: SpanRecord = {
      event,
      level,
      durationMs: Number((performance.now() - started).toFixed(1)),
    };
    if (data !== undefined) record.data = data;
    if (shouldTrace(level)) logTrace(JSON.stringify(record));
    return record;
  };
}
