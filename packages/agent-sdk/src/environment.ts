/**
 * Collaborators the loop runs actions against.
 *
 *   ExecutionEnvironment: sandboxed shell (docker, local, ...)
 *   SourceReader:         reads files of the task repository
 *   VersionControl:       working-tree diff shown to the model
 *
 * Implementations live outside this repository; tests use the fakes in
 * `@bugtrail/agent-sdk/testing`.
 */

// ─────────────────────────────────────────────────────────────────────────────
// ExecutionResult
// ─────────────────────────────────────────────────────────────────────────────

export interface ExecutionResult {
  output: string;
  returncode: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// ExecutionEnvironment interface
// ─────────────────────────────────────────────────────────────────────────────

export interface ExecutionEnvironment {
  /**
   * Runs one command. A non-zero return code is a normal result, not an error.
   * Throwing is reserved for infrastructure failures; the loop still turns
   * those into observation text.
   */
  execute(command: string, signal: AbortSignal): Promise<ExecutionResult>;
}

// ─────────────────────────────────────────────────────────────────────────────
// InstalledTool
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A debugging tool the environment set up for the task. Its status changes
 * as the tool reports it in `<tool-response>` blocks.
 */
export interface InstalledTool {
  /** Matches `package_name` of the tool's responses */
  name: string;
  help: string;
  status?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// SourceReader interface
// ─────────────────────────────────────────────────────────────────────────────

export interface SourceReader {
  /** File content, or an empty string when the file does not exist */
  read(filePath: string): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// VersionControl interface
// ─────────────────────────────────────────────────────────────────────────────

export interface VersionControl {
  /** Diff of the working tree against the task's base revision */
  diff(): Promise<string>;
}
