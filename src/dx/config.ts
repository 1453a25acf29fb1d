import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import dotenv from 'dotenv';

import { getDataRoot, getDefaultAppsDir, getDefaultWorkspaceRoot } from '../cache/workspacePaths.js';
import { logDebug } from './logger.js';

export type WorkbenchConfig = {
  /** Root of the content-addressed workspaces. */
  workspaceRoot?: string;
  /** Directory holding the JDK, Ghidra and Il2CppDumper installs. */
  appsDir?: string;
  /** Explicit Il2CppDumper executable (or .dll, run through dotnet). */
  dumperPath?: string;
  pythonPath?: string;
  /** Directory with the Ghidra post-scripts shipped alongside this tool. */
  scriptsDir?: string;
  /** Enable debug logs without env var */
  debug?: boolean;
};

export type WorkbenchSettings = {
  workspaceRoot: string;
  appsDir: string;
  dumperPath: string | null;
  pythonPath: string | null;
  scriptsDir: string;
  debug: boolean;
};

export const CONFIG_FILE_NAME = 'il2cpp-workbench.config.js';

export const ENV_KEYS = {
  workspaceRoot: 'IL2CPP_WORKBENCH_WORKSPACE_ROOT',
  appsDir: 'IL2CPP_WORKBENCH_APPS_DIR',
  dumperPath: 'IL2CPP_WORKBENCH_DUMPER',
  pythonPath: 'IL2CPP_WORKBENCH_PYTHON',
  scriptsDir: 'IL2CPP_WORKBENCH_SCRIPTS_DIR',
  debug: 'IL2CPP_WORKBENCH_DEBUG',
} as const;

const packageRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');

export function getBundledScriptsDir(): string {
  return join(packageRoot, 'ghidra_scripts');
}

let cached:
  | { loaded: true; config: WorkbenchConfig | null }
  | { loaded: false } = { loaded: false };

function configPath(projectRoot: string) {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function optionalString(raw: Record<string, unknown>, key: keyof WorkbenchConfig, source: string) {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v.trim()) throw new Error(`${source}: "${key}" must be a non-empty string`);
  return v;
}

/** Validates the shape of a loaded config module's export. */
export function parseConfig(value: unknown, source: string = CONFIG_FILE_NAME): WorkbenchConfig {
  if (value == null) return {};
  if (!isRecord(value)) throw new Error(`${source}: expected an object export`);
  const debug = value.debug;
  if (debug !== undefined && typeof debug !== 'boolean') {
    throw new Error(`${source}: "debug" must be a boolean`);
  }
  return {
    workspaceRoot: optionalString(value, 'workspaceRoot', source),
    appsDir: optionalString(value, 'appsDir', source),
    dumperPath: optionalString(value, 'dumperPath', source),
    pythonPath: optionalString(value, 'pythonPath', source),
    scriptsDir: optionalString(value, 'scriptsDir', source),
    debug,
  };
}

/**
 * Loads optional `il2cpp-workbench.config.js` from the project root.
 *
 * - Optional: if missing, returns null
 * - Cached: reads at most once per process
 */
export async function loadOptionalConfig(
  projectRoot: string = process.cwd(),
): Promise<WorkbenchConfig | null> {
  if (cached.loaded) return cached.config;

  const p = configPath(projectRoot);
  if (!existsSync(p)) {
    cached = { loaded: true, config: null };
    return null;
  }

  const url = pathToFileURL(resolve(p)).href;
  const mod: unknown = await import(url);
  const exported = isRecord(mod) && 'default' in mod ? mod.default : mod;
  const cfg = parseConfig(exported, p);
  // Paths in the config file are relative to the file, not to where the CLI runs.
  for (const key of ['workspaceRoot', 'appsDir', 'dumperPath', 'scriptsDir'] as const) {
    const v = cfg[key];
    if (v !== undefined) cfg[key] = resolve(projectRoot, v);
  }
  cached = { loaded: true, config: cfg };
  logDebug('loaded config', { path: p });
  return cached.config;
}

/**
 * Loads `<dataRoot>/.env` into process.env, creating it from the bundled
 * `.env.example` on first run. Existing environment variables win.
 */
export function loadEnvFile(dataRoot: string = getDataRoot()): string {
  const envFile = join(dataRoot, '.env');
  if (!existsSync(envFile)) {
    const example = join(packageRoot, '.env.example');
    if (existsSync(example)) {
      mkdirSync(dataRoot, { recursive: true });
      copyFileSync(example, envFile);
    }
  }
  if (existsSync(envFile)) {
    dotenv.config({ path: envFile });
    logDebug('loaded env file', { path: envFile });
  }
  return envFile;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

/** Environment over config file over defaults. */
export function resolveSettings(
  config: WorkbenchConfig | null,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): WorkbenchSettings {
  const cfg = config ?? {};
  const pick = (key: keyof typeof ENV_KEYS) => {
    const fromEnv = envValue(env, ENV_KEYS[key]);
    return fromEnv !== undefined ? fromEnv : cfg[key];
  };
  const path = (v: string | boolean | undefined) => (typeof v === 'string' ? resolve(cwd, v) : undefined);

  const python = pick('pythonPath');
  const debugEnv = envValue(env, ENV_KEYS.debug);

  return {
    workspaceRoot: path(pick('workspaceRoot')) ?? getDefaultWorkspaceRoot(cwd),
    appsDir: path(pick('appsDir')) ?? getDefaultAppsDir(),
    dumperPath: path(pick('dumperPath')) ?? null,
    // A bare command name is looked up on PATH later.
    pythonPath: typeof python === 'string' ? python : null,
    scriptsDir: path(pick('scriptsDir')) ?? getBundledScriptsDir(),
    debug: debugEnv !== undefined ? debugEnv === '1' : cfg.debug ?? false,
  };
}

/** For tests only. */
export function __resetConfigCacheForTests() {
  cached = { loaded: false };
}
