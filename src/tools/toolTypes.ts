export type ToolCommand = {
  file: string;
  args: string[];
  cwd?: string;
  /** Full environment for the child; defaults to the current process env. */
  env?: NodeJS.ProcessEnv;
};

export type ToolRunner = (command: ToolCommand) => Promise<void>;

export type ToolName = 'Il2CppDumper' | 'Python' | 'JDK' | 'Ghidra' | 'dotnet';

export type ToolStatus =
  | { tool: ToolName; found: true; path: string }
  | { tool: ToolName; found: false; error: string };

/**
 * The external programs the decompile workflow drives. Each call writes its
 * outputs into the given workspace directory.
 */
export interface WorkbenchTools {
  /** Il2CppDumper `<binary> <metadata> <outDir>`. */
  dump(gameAssembly: string, globalMetadata: string, outDir: string): Promise<void>;
  /** Converts the dumper's `il2cpp.h` into `il2cpp_ghidra.h` inside `workDir`. */
  headerToGhidra(workDir: string): Promise<void>;
  /** Headless project creation, import and post-scripts. */
  importProject(request: ImportRequest): Promise<void>;
  /** Launches the Ghidra UI, optionally with a project file. */
  openGhidra(projectFile?: string): Promise<void>;
}

export type ImportRequest = {
  workDir: string;
  projectName: string;
  binary: string;
};
