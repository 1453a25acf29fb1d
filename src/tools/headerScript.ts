import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';

import { ToolNotFoundError } from '../errors.js';
import { which } from '../utils/which.js';
import type { WorkbenchSettings } from '../dx/config.js';
import type { PlatformInfo } from './detectPlatform.js';
import type { ToolCommand } from './toolTypes.js';

export const HEADER_SCRIPT_NAME = 'il2cpp_header_to_ghidra.py';

export function resolvePython(
  settings: Pick<WorkbenchSettings, 'pythonPath'>,
  platform: PlatformInfo,
): string {
  const configured = settings.pythonPath;
  if (configured) {
    if (isAbsolute(configured) || configured.includes('/') || configured.includes('\\')) {
      if (!existsSync(configured)) throw new ToolNotFoundError('Python', configured, 'Check IL2CPP_WORKBENCH_PYTHON');
      return configured;
    }
    const found = which(configured, platform.platform);
    if (!found) throw new ToolNotFoundError('Python', configured, 'Not on PATH; check IL2CPP_WORKBENCH_PYTHON');
    return found;
  }

  for (const name of ['python3', 'python']) {
    const found = which(name, platform.platform);
    if (found) return found;
  }
  throw new ToolNotFoundError('Python', 'PATH', 'Install Python 3 or set IL2CPP_WORKBENCH_PYTHON');
}

export function resolveHeaderScript(dumperDir: string): string {
  const script = join(dumperDir, HEADER_SCRIPT_NAME);
  if (!existsSync(script)) {
    throw new ToolNotFoundError(HEADER_SCRIPT_NAME, script, 'It ships with Il2CppDumper releases');
  }
  return script;
}

/** The script reads `il2cpp.h` from and writes `il2cpp_ghidra.h` to its cwd. */
export function headerScriptCommand(python: string, script: string, workDir: string): ToolCommand {
  return { file: python, args: [script], cwd: workDir };
}
