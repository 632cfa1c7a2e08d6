/**
 * Types for running external tools (git, make, cmake, compilers, gcov, lcov)
 */

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  cwd: string;
  /** Variables added to the inherited environment */
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: readonly string[], options: CommandRunOptions): Promise<CommandResult>;
}
