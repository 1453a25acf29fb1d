import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, extname, join } from 'node:path';

import { ToolNotFoundError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { which } from '../utils/which.js';
import type { WorkbenchSettings } from '../dx/config.js';
import type { PlatformInfo } from './detectPlatform.js';
import type { ToolCommand } from './toolTypes.js';

export const DUMPER_DIR_NAME = 'Il2CppDumper';

export type DumperInfo = {
  /** Il2CppDumper.exe, or Il2CppDumper.dll when it runs through dotnet. */
  path: string;
  dir: string;
  /** dotnet host for a .dll build, null for a native executable. */
  host: string | null;
};

export function defaultDumperPath(settings: Pick<WorkbenchSettings, 'appsDir'>, platform: PlatformInfo): string {
  const file = platform.isWindows ? 'Il2CppDumper.exe' : 'Il2CppDumper.dll';
  return join(settings.appsDir, DUMPER_DIR_NAME, file);
}

/** Directory of the dumper install, which also holds its helper scripts. */
export function dumperDir(settings: Pick<WorkbenchSettings, 'appsDir' | 'dumperPath'>): string {
  return settings.dumperPath ? dirname(settings.dumperPath) : join(settings.appsDir, DUMPER_DIR_NAME);
}

export function resolveDumper(
  settings: Pick<WorkbenchSettings, 'appsDir' | 'dumperPath'>,
  platform: PlatformInfo,
): DumperInfo {
  const path = settings.dumperPath ?? defaultDumperPath(settings, platform);
  if (!existsSync(path)) {
    throw new ToolNotFoundError(
      'Il2CppDumper',
      path,
      `Extract an Il2CppDumper release into ${dirname(path)} or set IL2CPP_WORKBENCH_DUMPER`,
    );
  }

  if (extname(path).toLowerCase() !== '.dll') return { path, dir: dirname(path), host: null };

  const host = which('dotnet', platform.platform);
  if (!host) throw new ToolNotFoundError('dotnet', 'PATH', `Install the .NET runtime to run ${path}`);
  return { path, dir: dirname(path), host };
}

/**
 * Il2CppDumper waits for a key press on exit unless its config.json says
 * otherwise. Returns true when the file had to be (re)written.
 */
export function disableKeyPrompt(configFile: string): boolean {
  let config: Record<string, unknown> = {};
  if (existsSync(configFile)) {
    const parsed: unknown = JSON.parse(readFileSync(configFile, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Expected a JSON object in ${configFile}`);
    }
    config = { ...parsed };
  }

  if (config.RequireAnyKey === false) return false;

  config.RequireAnyKey = false;
  writeFileSync(configFile, JSON.stringify(config, null, 2));
  logDebug('patched dumper config', { configFile });
  return true;
}

export function dumperCommand(
  dumper: DumperInfo,
  gameAssembly: string,
  globalMetadata: string,
  outDir: string,
): ToolCommand {
  const args = [gameAssembly, globalMetadata, outDir];
  return dumper.host
    ? { file: dumper.host, args: [dumper.path, ...args] }
    : { file: dumper.path, args };
}
