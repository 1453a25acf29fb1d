import { join } from 'node:path';
import { globSync } from 'glob';

import { ToolNotFoundError } from '../errors.js';
import type { ToolName } from './toolTypes.js';

/**
 * First file under `baseDir` matching any of `patterns`, tried in order.
 * Within one pattern the highest version wins: digit runs compare as numbers,
 * so `jdk-21.0.2` beats `jdk-8.0.402`.
 */
export function findAppFile(baseDir: string, patterns: readonly string[]): string | null {
  for (const pattern of patterns) {
    const matches = globSync(pattern, {
      cwd: baseDir,
      absolute: true,
      nodir: true,
      windowsPathsNoEscape: true,
    });
    if (matches.length) return matches.sort((a, b) => b.localeCompare(a, undefined, { numeric: true }))[0] ?? null;
  }
  return null;
}

export function requireAppFile(
  tool: ToolName,
  baseDir: string,
  patterns: readonly string[],
  hint?: string,
): string {
  const found = findAppFile(baseDir, patterns);
  if (!found) throw new ToolNotFoundError(tool, join(baseDir, patterns[0] ?? ''), hint);
  return found;
}
