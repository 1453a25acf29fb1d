import { join } from 'node:path';

import type { WorkbenchSettings } from '../dx/config.js';
import { detectPlatform, type PlatformInfo } from './detectPlatform.js';
import { disableKeyPrompt, dumperCommand, dumperDir, resolveDumper } from './dumper.js';
import { ghidraCommand, headlessImportArgs, resolveGhidra, resolveJavaHome, resolveLauncher } from './ghidra.js';
import { headerScriptCommand, resolveHeaderScript, resolvePython } from './headerScript.js';
import { runTool } from './runTool.js';
import type { ToolName, ToolRunner, ToolStatus, WorkbenchTools } from './toolTypes.js';

export type ToolSettings = Pick<WorkbenchSettings, 'appsDir' | 'dumperPath' | 'pythonPath' | 'scriptsDir'>;

export type CreateToolsOptions = {
  run?: ToolRunner;
  platform?: PlatformInfo;
  env?: NodeJS.ProcessEnv;
};

/**
 * Tools are located lazily, on first use, so a run that skips a step never
 * needs that step's tool installed.
 */
export function createWorkbenchTools(settings: ToolSettings, options: CreateToolsOptions = {}): WorkbenchTools {
  const run = options.run ?? runTool;
  const platform = options.platform ?? detectPlatform();
  const env = options.env ?? process.env;

  return {
    async dump(gameAssembly, globalMetadata, outDir) {
      const dumper = resolveDumper(settings, platform);
      disableKeyPrompt(join(dumper.dir, 'config.json'));
      await run(dumperCommand(dumper, gameAssembly, globalMetadata, outDir));
    },

    async headerToGhidra(workDir) {
      const python = resolvePython(settings, platform);
      const script = resolveHeaderScript(dumperDir(settings));
      await run(headerScriptCommand(python, script, workDir));
    },

    async importProject(request) {
      const install = resolveGhidra(settings, platform);
      const args = headlessImportArgs(request, [settings.scriptsDir, dumperDir(settings)]);
      await run(ghidraCommand(install, args, env));
    },

    async openGhidra(projectFile) {
      const install = resolveGhidra(settings, platform);
      await run(ghidraCommand(install, projectFile ? [projectFile] : [], env));
    },
  };
}

function probe(tool: ToolName, locate: () => string): ToolStatus {
  try {
    return { tool, found: true, path: locate() };
  } catch (err) {
    return { tool, found: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/** Presence of every external tool, for `doctor`. */
export function detectTools(settings: ToolSettings, platform: PlatformInfo = detectPlatform()): ToolStatus[] {
  return [
    probe('Il2CppDumper', () => resolveDumper(settings, platform).path),
    probe('Python', () => resolvePython(settings, platform)),
    probe('JDK', () => resolveJavaHome(settings, platform)),
    probe('Ghidra', () => resolveLauncher(settings, platform)),
  ];
}

export { detectPlatform, type PlatformInfo } from './detectPlatform.js';
export { runTool } from './runTool.js';
export type { ImportRequest, ToolCommand, ToolRunner, ToolStatus, WorkbenchTools } from './toolTypes.js';
