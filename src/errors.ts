export type WorkbenchErrorCode =
  | 'FILE_ACCESS'
  | 'FILESYSTEM'
  | 'INPUT_NOT_FOUND'
  | 'TOOL_NOT_FOUND'
  | 'TOOL_EXIT';

export type ErrorDetails = Record<string, unknown>;

export class WorkbenchError extends Error {
  override name = 'WorkbenchError';
  readonly code: WorkbenchErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: WorkbenchErrorCode, message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.details = details;
  }
}

/** Node system error code of the underlying failure (ENOENT, EACCES, ...), if any. */
function systemCodeOf(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
  return undefined;
}

function errnoOf(cause: unknown): number | undefined {
  if (cause instanceof Error && 'errno' in cause && typeof cause.errno === 'number') return cause.errno;
  return undefined;
}

/** The input artifact cannot be opened or read. */
export class FileAccessError extends WorkbenchError {
  override name = 'FileAccessError';
  readonly path: string;
  readonly systemCode?: string;
  readonly errno?: number;

  constructor(path: string, cause?: unknown) {
    const systemCode = systemCodeOf(cause);
    super('FILE_ACCESS', `Cannot read ${path}${systemCode ? ` (${systemCode})` : ''}`, { path }, { cause });
    this.path = path;
    this.systemCode = systemCode;
    this.errno = errnoOf(cause);
  }
}

/** A directory or file under a workspace cannot be created. */
export class FilesystemError extends WorkbenchError {
  override name = 'FilesystemError';
  readonly path: string;
  readonly systemCode?: string;
  readonly errno?: number;

  constructor(path: string, cause?: unknown) {
    const systemCode = systemCodeOf(cause);
    super('FILESYSTEM', `Cannot create ${path}${systemCode ? ` (${systemCode})` : ''}`, { path }, { cause });
    this.path = path;
    this.systemCode = systemCode;
    this.errno = errnoOf(cause);
  }
}

export class InputNotFoundError extends WorkbenchError {
  override name = 'InputNotFoundError';

  constructor(readonly path: string) {
    super('INPUT_NOT_FOUND', `Could not find ${path}`, { path });
  }
}

export class ToolNotFoundError extends WorkbenchError {
  override name = 'ToolNotFoundError';

  constructor(
    readonly tool: string,
    readonly path: string,
    hint?: string,
  ) {
    super('TOOL_NOT_FOUND', `Could not find ${tool} at ${path}${hint ? `. ${hint}` : ''}`, { tool, path });
  }
}

export class ToolExitError extends WorkbenchError {
  override name = 'ToolExitError';

  constructor(
    readonly command: string[],
    readonly exitCode: number,
  ) {
    super('TOOL_EXIT', `Command exited with code ${exitCode}: ${command.join(' ')}`, { command, exitCode });
  }
}

/**
 * Process exit code for a failed run: the tool's own exit code, the errno of a
 * filesystem failure, or 1.
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ToolExitError) return err.exitCode > 0 ? err.exitCode : 1;
  if (err instanceof FileAccessError || err instanceof FilesystemError) {
    return err.errno ? Math.abs(err.errno) : 1;
  }
  if (!(err instanceof WorkbenchError)) {
    const errno = errnoOf(err);
    if (errno) return Math.abs(errno);
  }
  return 1;
}
