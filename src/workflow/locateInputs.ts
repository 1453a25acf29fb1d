import { existsSync, statSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { globSync } from 'glob';

import { InputNotFoundError } from '../errors.js';

export const GAME_ASSEMBLY_NAME = 'GameAssembly.dll';
export const GLOBAL_METADATA_PATTERN = '*_Data/il2cpp_data/Metadata/global-metadata.dat';

export type GameInputs = {
  gameDir: string;
  /** Basename of the game directory; also the Ghidra project name. */
  gameName: string;
  gameAssembly: string;
  globalMetadata: string;
};

/**
 * Accepts either the game's install directory or its GameAssembly.dll.
 */
export function locateGameInputs(target: string): GameInputs {
  const absolute = resolve(target);

  let gameDir = absolute;
  let gameAssembly = join(absolute, GAME_ASSEMBLY_NAME);
  if (basename(absolute).toLowerCase() === GAME_ASSEMBLY_NAME.toLowerCase()) {
    gameAssembly = absolute;
    gameDir = dirname(absolute);
  }

  if (!existsSync(gameAssembly) || !statSync(gameAssembly).isFile()) {
    throw new InputNotFoundError(gameAssembly);
  }

  const matches = globSync(GLOBAL_METADATA_PATTERN, {
    cwd: gameDir,
    absolute: true,
    nodir: true,
    windowsPathsNoEscape: true,
  }).sort();
  const globalMetadata = matches[0];
  if (!globalMetadata) {
    throw new InputNotFoundError(join(gameDir, GLOBAL_METADATA_PATTERN));
  }

  return {
    gameDir,
    gameName: basename(gameDir),
    gameAssembly,
    globalMetadata,
  };
}
