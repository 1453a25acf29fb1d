import { dirname, join } from 'node:path';

import type { WorkbenchSettings } from '../dx/config.js';
import type { PlatformInfo } from './detectPlatform.js';
import { requireAppFile } from './locateApp.js';
import type { ImportRequest, ToolCommand } from './toolTypes.js';

export type GhidraInstall = {
  launcher: string;
  javaHome: string;
};

export function javaPatterns(platform: PlatformInfo): string[] {
  const java = `java${platform.exeSuffix}`;
  const patterns = [`jdk-*/bin/${java}`];
  if (platform.isMac) patterns.push(`jdk-*/Contents/Home/bin/${java}`);
  return patterns;
}

export function ghidraPatterns(platform: PlatformInfo): string[] {
  return [`ghidra_*/support/pyghidraRun${platform.launcherSuffix}`];
}

export function resolveJavaHome(settings: Pick<WorkbenchSettings, 'appsDir'>, platform: PlatformInfo): string {
  const java = requireAppFile('JDK', settings.appsDir, javaPatterns(platform), 'Extract a JDK (jdk-*) into the apps directory');
  // <javaHome>/bin/java
  return dirname(dirname(java));
}

export function resolveLauncher(settings: Pick<WorkbenchSettings, 'appsDir'>, platform: PlatformInfo): string {
  return requireAppFile(
    'Ghidra',
    settings.appsDir,
    ghidraPatterns(platform),
    'Extract a Ghidra release (ghidra_*) into the apps directory',
  );
}

export function resolveGhidra(settings: Pick<WorkbenchSettings, 'appsDir'>, platform: PlatformInfo): GhidraInstall {
  return {
    javaHome: resolveJavaHome(settings, platform),
    launcher: resolveLauncher(settings, platform),
  };
}

export function ghidraCommand(
  install: GhidraInstall,
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): ToolCommand {
  return {
    file: install.launcher,
    args,
    env: { ...env, JAVA_HOME: install.javaHome },
  };
}

/**
 * Headless import: create `<projectName>.gpr` in the workspace, import the
 * binary, then apply the converted header and the dumper's script.json.
 */
export function headlessImportArgs(request: ImportRequest, scriptDirs: string[]): string[] {
  const { workDir, projectName, binary } = request;
  return [
    '--headless',
    workDir,
    projectName,
    '-import',
    binary,
    '-scriptPath',
    // Ghidra splits -scriptPath on ';' on every platform.
    scriptDirs.join(';'),
    '-postScript',
    'parse_header.py',
    join(workDir, 'il2cpp_ghidra.h'),
    '-postScript',
    'ghidra_with_struct.py',
    join(workDir, 'script.json'),
  ];
}
