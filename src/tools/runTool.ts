import { spawn } from 'node:child_process';
import { basename, extname } from 'node:path';

import { ToolExitError, ToolNotFoundError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { startSpan } from '../dx/trace.js';
import type { ToolCommand } from './toolTypes.js';

function needsShell(file: string): boolean {
  const ext = extname(file).toLowerCase();
  return ext === '.bat' || ext === '.cmd';
}

function quoteForShell(arg: string): string {
  return /[\s"&|<>^]/.test(arg) ? `"${arg.replace(/"/g, '""')}"` : arg;
}

/**
 * Runs a tool with inherited stdio and resolves once it exits with 0.
 */
export function runTool(command: ToolCommand): Promise<void> {
  const shell = needsShell(command.file);
  // Node refuses to spawn .bat/.cmd without a shell; the shell then needs the quoting.
  const file = shell ? quoteForShell(command.file) : command.file;
  const args = shell ? command.args.map(quoteForShell) : command.args;
  const argv = [command.file, ...command.args];

  logDebug('run', { argv, cwd: command.cwd });
  const end = startSpan('tool.run', 'debug');

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: command.cwd,
      env: command.env ?? process.env,
      stdio: 'inherit',
      shell,
    });

    child.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT' || err.code === 'EACCES') {
        reject(new ToolNotFoundError(basename(command.file), command.file, `Spawn failed (${err.code})`));
        return;
      }
      reject(err);
    });

    child.once('close', (code, signal) => {
      end({ argv, code, signal });
      if (code === 0) {
        resolve();
        return;
      }
      reject(new ToolExitError(argv, code ?? 1));
    });
  });
}
