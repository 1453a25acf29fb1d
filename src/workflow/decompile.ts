import { copyFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { dirname, relative } from 'node:path';

import type { WorkspaceCache, WorkspaceEntry } from '../cache/workspaceCache.js';
import { FilesystemError } from '../errors.js';
import { logDebug, logInfo } from '../dx/logger.js';
import { startSpan } from '../dx/trace.js';
import type { WorkbenchTools } from '../tools/toolTypes.js';
import { locateGameInputs, type GameInputs } from './locateInputs.js';

export type StepName = 'copy' | 'dump' | 'header' | 'import' | 'open';

export type StepOutcome = 'ran' | 'skipped';

export type DecompileDeps = {
  cache: WorkspaceCache;
  tools: WorkbenchTools;
};

export type DecompileOptions = {
  /** Launch the Ghidra UI on the project at the end (default true). */
  open?: boolean;
  onStep?: (step: StepName, outcome: StepOutcome) => void;
};

export type DecompileResult = {
  inputs: GameInputs;
  entry: WorkspaceEntry;
  projectFile: string;
  /** The Ghidra project already existed, so only the open step could run. */
  reusedProject: boolean;
  steps: Partial<Record<StepName, StepOutcome>>;
};

/** Files written by Il2CppDumper that later steps read. */
export const DUMP_OUTPUTS = ['script.json', 'il2cpp.h'] as const;
export const GHIDRA_HEADER = 'il2cpp_ghidra.h';

/**
 * Workspace-relative location of a game file: its path relative to the
 * directory containing the game directory, e.g. `MyGame/GameAssembly.dll`.
 */
export function workspaceRelativePath(inputs: GameInputs, file: string): string {
  return relative(dirname(inputs.gameDir), file).split(/[\\/]/).join('/');
}

/** Copies `source` into the workspace unless an equally sized copy is already there. */
function copyInto(entry: WorkspaceEntry, source: string, name: string): boolean {
  const dest = entry.pathOf(name);
  try {
    if (existsSync(dest) && statSync(dest).size === statSync(source).size) return false;
    // An interrupted copy leaves only the .part file behind.
    const part = `${dest}.part`;
    mkdirSync(dirname(dest), { recursive: true });
    copyFileSync(source, part);
    renameSync(part, dest);
  } catch (err) {
    throw new FilesystemError(dest, err);
  }
  return true;
}

export async function decompile(
  target: string,
  deps: DecompileDeps,
  options: DecompileOptions = {},
): Promise<DecompileResult> {
  const open = options.open ?? true;
  const steps: DecompileResult['steps'] = {};
  // Each step is timed from begin() until its outcome is known.
  const begin = (step: StepName) => {
    const end = startSpan(`step.${step}`);
    return (outcome: StepOutcome) => {
      const { durationMs } = end({ outcome });
      steps[step] = outcome;
      logDebug('step', { step, outcome, durationMs });
      options.onStep?.(step, outcome);
    };
  };

  const inputs = locateGameInputs(target);
  const entry = await deps.cache.resolve(inputs.gameAssembly);
  const projectName = `${inputs.gameName}.gpr`;
  const projectFile = entry.pathOf(projectName);
  logInfo('workspace', { identifier: entry.identifier, directory: entry.directory });

  if (entry.has(projectName)) {
    if (open) {
      const opened = begin('open');
      await deps.tools.openGhidra(projectFile);
      opened('ran');
    }
    return { inputs, entry, projectFile, reusedProject: true, steps };
  }

  const assemblyName = workspaceRelativePath(inputs, inputs.gameAssembly);
  const metadataName = workspaceRelativePath(inputs, inputs.globalMetadata);
  const copied = begin('copy');
  const copiedAssembly = copyInto(entry, inputs.gameAssembly, assemblyName);
  const copiedMetadata = copyInto(entry, inputs.globalMetadata, metadataName);
  copied(copiedAssembly || copiedMetadata ? 'ran' : 'skipped');

  const workAssembly = entry.pathOf(assemblyName);
  const workMetadata = entry.pathOf(metadataName);

  const dumped = begin('dump');
  if (DUMP_OUTPUTS.every((name) => entry.has(name))) {
    dumped('skipped');
  } else {
    await deps.tools.dump(workAssembly, workMetadata, entry.directory);
    dumped('ran');
  }

  const converted = begin('header');
  if (entry.has(GHIDRA_HEADER)) {
    converted('skipped');
  } else {
    await deps.tools.headerToGhidra(entry.directory);
    converted('ran');
  }

  const imported = begin('import');
  await deps.tools.importProject({
    workDir: entry.directory,
    projectName: inputs.gameName,
    binary: workAssembly,
  });
  imported('ran');

  if (open) {
    const opened = begin('open');
    await deps.tools.openGhidra(projectFile);
    opened('ran');
  }

  return { inputs, entry, projectFile, reusedProject: false, steps };
}
