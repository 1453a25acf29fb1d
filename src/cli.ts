#!/usr/bin/env node

import { existsSync, realpathSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { WorkspaceCache } from './cache/workspaceCache.js';
import { loadEnvFile, loadOptionalConfig, resolveSettings, type WorkbenchSettings } from './dx/config.js';
import { configureLogFile, dailyLogFile, getLogFile, logError, setDebugEnabled } from './dx/logger.js';
import { exitCodeFor } from './errors.js';
import { createWorkbenchTools, detectTools, type WorkbenchTools } from './tools/index.js';
import { decompile, type StepName, type StepOutcome } from './workflow/decompile.js';

export type CliDeps = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createTools?: (settings: WorkbenchSettings) => WorkbenchTools;
};

function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

function positionals(argv: string[]): string[] {
  return argv.filter((a) => !a.startsWith('--'));
}

function usage() {
  console.log(`il2cpp-workbench

Usage:
	il2cpp-workbench decompile <gameDir|GameAssembly.dll> [--no-open]
	il2cpp-workbench open [project.gpr]
	il2cpp-workbench workspace id <file>
	il2cpp-workbench workspace status
	il2cpp-workbench doctor

Examples:
	il2cpp-workbench decompile "C:/Games/MyGame"
	il2cpp-workbench decompile "C:/Games/MyGame/GameAssembly.dll" --no-open
	il2cpp-workbench workspace status

Notes:
	- Workspaces are named after the first 8 hex chars of GameAssembly.dll's SHA-256.
	- Re-running against the same binary skips every step whose output already exists.
	- Settings come from the environment, ~/.il2cpp-workbench/.env and il2cpp-workbench.config.js.
`);
}

export function fmtOk(msg: string) {
  return `\u2713 ${msg}`;
}

export function fmtFail(msg: string) {
  return `\u2717 ${msg}`;
}

function fmtSkip(msg: string) {
  return `- ${msg}`;
}

export function humanBytes(bytes: number) {
  const u = ['B', 'KB', 'MB', 'GB'];
  let b = bytes;
  let i = 0;
  while (b >= 1024 && i < u.length - 1) {
    b /= 1024;
    i++;
  }
  return `${b.toFixed(i === 0 ? 0 : 1)} ${u[i]}`;
}

const stepLabels: Record<StepName, string> = {
  copy: 'Copy GameAssembly.dll and global-metadata.dat',
  dump: 'Run Il2CppDumper',
  header: 'Convert il2cpp.h for Ghidra',
  import: 'Import into a new Ghidra project',
  open: 'Open Ghidra',
};

function printStep(step: StepName, outcome: StepOutcome) {
  const label = stepLabels[step];
  console.log(outcome === 'ran' ? fmtOk(label) : fmtSkip(`${label} (already done)`));
}

async function cmdDecompile(argv: string[], settings: WorkbenchSettings, tools: WorkbenchTools, cwd: string) {
  const target = positionals(argv)[1];
  if (!target) {
    console.error('Missing game directory (ex: "C:/Games/MyGame")');
    usage();
    return 1;
  }

  const cache = new WorkspaceCache({ root: settings.workspaceRoot });
  const res = await decompile(resolve(cwd, target), { cache, tools }, {
    open: !hasFlag(argv, '--no-open'),
    onStep: printStep,
  });

  if (res.reusedProject) console.log(fmtOk(`Project already imported: ${res.projectFile}`));
  console.log(`Workspace ${res.entry.identifier} at ${res.entry.directory}`);
  return 0;
}

async function cmdOpen(argv: string[], tools: WorkbenchTools, cwd: string) {
  const project = positionals(argv)[1];
  await tools.openGhidra(project ? resolve(cwd, project) : undefined);
  return 0;
}

async function cmdWorkspace(argv: string[], settings: WorkbenchSettings, cwd: string) {
  const [, sub, file] = positionals(argv);
  const cache = new WorkspaceCache({ root: settings.workspaceRoot });

  if (sub === 'id') {
    if (!file) {
      console.error('Usage: il2cpp-workbench workspace id <file>');
      return 1;
    }
    const identifier = await cache.identify(resolve(cwd, file));
    console.log(identifier);
    console.log(cache.directoryFor(identifier));
    return 0;
  }

  if (sub === 'status') {
    const entries = cache.list();
    if (!entries.length) {
      console.log(fmtOk(`No workspaces under ${cache.root}`));
      return 0;
    }
    const bytes = entries.reduce((sum, e) => sum + e.bytes, 0);
    const newest = Math.max(...entries.map((e) => e.newestMtimeMs));
    console.log(fmtOk(`Workspaces: ${entries.length} (${cache.root})`));
    console.log(fmtOk(`Disk usage: ${humanBytes(bytes)}`));
    console.log(fmtOk(`Last modified: ${newest ? new Date(newest).toISOString() : 'n/a'}`));
    for (const e of entries) {
      console.log(`  ${e.identifier}  ${e.files} files  ${humanBytes(e.bytes)}`);
    }
    return 0;
  }

  console.error('Usage: il2cpp-workbench workspace <id|status>');
  return 1;
}

function cmdDoctor(settings: WorkbenchSettings) {
  const lines: string[] = [];
  for (const status of detectTools(settings)) {
    if (status.found) lines.push(fmtOk(`${status.tool} found (${status.path})`));
    else lines.push(fmtFail(status.error));
  }

  const root = settings.workspaceRoot;
  try {
    const st = existsSync(root) ? statSync(root) : null;
    if (!st) lines.push(fmtOk(`Workspace root will be created at ${root}`));
    else if (st.isDirectory()) lines.push(fmtOk(`Workspace root OK (${root})`));
    else lines.push(fmtFail(`Workspace root is not a directory: ${root}`));
  } catch (e) {
    lines.push(fmtFail(`Workspace root not accessible: ${e instanceof Error ? e.message : String(e)}`));
  }
  lines.push(fmtOk(`Apps directory ${settings.appsDir}`));

  console.log(lines.join('\n'));
  return lines.some((l) => l.startsWith('\u2717')) ? 1 : 0;
}

/** Runs one CLI invocation and returns the process exit code. */
export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const cmd = argv[0];

  if (!cmd || cmd === '-h' || cmd === '--help') {
    usage();
    return 0;
  }

  try {
    configureLogFile(dailyLogFile());
    loadEnvFile();
    const settings = resolveSettings(await loadOptionalConfig(cwd), deps.env ?? process.env, cwd);
    if (settings.debug) setDebugEnabled(true);
    const tools = (deps.createTools ?? createWorkbenchTools)(settings);

    switch (cmd) {
      case 'decompile':
        return await cmdDecompile(argv, settings, tools, cwd);
      case 'open':
        return await cmdOpen(argv, tools, cwd);
      case 'workspace':
        return await cmdWorkspace(argv, settings, cwd);
      case 'doctor':
        return cmdDoctor(settings);
      default:
        console.error(`Unknown command: ${cmd}`);
        usage();
        return 1;
    }
  } catch (err) {
    logError(err, { argv });
    const name = err instanceof Error ? err.name : 'Error';
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message} (${name})`);
    const logFile = getLogFile();
    if (logFile) console.error(`Detailed error info has been logged to ${logFile}`);
    return exitCodeFor(err);
  }
}

function isEntrypoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // npm links bin scripts, so compare real paths.
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
