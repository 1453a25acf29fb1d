import { existsSync, mkdirSync, readdirSync, statSync, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';

import { FilesystemError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { hashFile, isIdentifier, toIdentifier } from './hash.js';
import type { WorkspaceCacheOptions, WorkspaceSummary } from './workspaceTypes.js';

/**
 * A resolved workspace: the directory every derived artifact of one input
 * binary is written to.
 */
export class WorkspaceEntry {
  constructor(
    readonly artifactPath: string,
    readonly identifier: string,
    readonly directory: string,
  ) {}

  /** Path of an expected output; `name` may contain `/`-separated segments. */
  pathOf(name: string): string {
    return join(this.directory, ...name.split('/'));
  }

  /** Whether a step's expected output is already present. */
  has(name: string): boolean {
    return existsSync(this.pathOf(name));
  }
}

export class WorkspaceCache {
  readonly root: string;

  constructor(options: WorkspaceCacheOptions) {
    this.root = resolve(options.root);
  }

  directoryFor(identifier: string): string {
    return join(this.root, identifier);
  }

  async identify(artifactPath: string): Promise<string> {
    return toIdentifier(await hashFile(artifactPath));
  }

  /**
   * Maps the artifact to `<root>/<identifier>` and makes sure the directory
   * exists. Existing contents are left untouched.
   */
  async resolve(artifactPath: string): Promise<WorkspaceEntry> {
    const absolute = resolve(artifactPath);
    const identifier = await this.identify(absolute);
    const directory = this.directoryFor(identifier);

    try {
      // recursive: another run creating the same directory concurrently is fine.
      mkdirSync(directory, { recursive: true });
    } catch (err) {
      throw new FilesystemError(directory, err);
    }

    logDebug('workspace', { identifier, directory, artifactPath: absolute });
    return new WorkspaceEntry(absolute, identifier, directory);
  }

  list(): WorkspaceSummary[] {
    if (!existsSync(this.root)) return [];

    const out: WorkspaceSummary[] = [];
    for (const ent of readdirSync(this.root, { withFileTypes: true })) {
      if (!ent.isDirectory() || !isIdentifier(ent.name)) continue;
      const directory = join(this.root, ent.name);
      out.push({ identifier: ent.name, directory, ...folderStats(directory) });
    }
    return out.sort((a, b) => a.identifier.localeCompare(b.identifier));
  }
}

function folderStats(dir: string): { files: number; bytes: number; newestMtimeMs: number } {
  let files = 0;
  let bytes = 0;
  let newest = 0;
  for (const ent of readdirSync(dir, { withFileTypes: true })) {
    const p = join(dir, ent.name);
    let st: Stats;
    try {
      st = statSync(p);
    } catch {
      // removed while walking
      continue;
    }
    newest = Math.max(newest, st.mtimeMs);
    if (ent.isDirectory()) {
      const sub = folderStats(p);
      files += sub.files;
      bytes += sub.bytes;
      newest = Math.max(newest, sub.newestMtimeMs);
    } else if (ent.isFile()) {
      files++;
      bytes += st.size;
    }
  }
  return { files, bytes, newestMtimeMs: newest };
}
