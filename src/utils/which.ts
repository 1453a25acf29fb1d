import { accessSync, constants, statSync } from 'fs';
import { delimiter, join } from 'path';

function candidateNames(cmd: string, platform: NodeJS.Platform): string[] {
  if (platform !== 'win32') return [cmd];
  const exts = (process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean);
  return [cmd, ...exts.map((ext) => `${cmd}${ext.toLowerCase()}`)];
}

function isExecutableFile(full: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(full).isFile()) return false;
    // Windows has no execute bit; existence is enough there.
    if (platform !== 'win32') accessSync(full, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function which(cmd: string, platform: NodeJS.Platform = process.platform): string | null {
  const paths = (process.env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const p of paths) {
    for (const name of candidateNames(cmd, platform)) {
      const full = join(p, name);
      if (isExecutableFile(full, platform)) return full;
    }
  }
  return null;
}
