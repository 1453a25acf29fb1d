import { homedir } from 'node:os';
import { join } from 'node:path';

function homeDir(): string {
  // Respect HOME when set (important for tests/sandboxes/containers).
  return process.env.HOME ?? homedir();
}

/** Per-user data directory holding `.env`, logs and the installed tools. */
export function getDataRoot(): string {
  return join(homeDir(), '.il2cpp-workbench');
}

export function getDefaultAppsDir(): string {
  return join(getDataRoot(), 'apps');
}

export function getLogsDir(): string {
  return join(getDataRoot(), 'logs');
}

export function getDefaultWorkspaceRoot(cwd: string = process.cwd()): string {
  return join(cwd, 'il2cpp-workbench');
}
