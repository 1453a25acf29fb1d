export type WorkspaceCacheOptions = {
  /** Directory under which one sub-directory per identifier is created. */
  root: string;
};

export type WorkspaceSummary = {
  identifier: string;
  directory: string;
  files: number;
  bytes: number;
  /** Newest mtime (ms since epoch) of anything inside the workspace, 0 when empty. */
  newestMtimeMs: number;
};
