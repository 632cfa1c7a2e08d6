import { execFile } from 'child_process';
import { promisify } from 'util';
import type { CommandResult, CommandRunner, CommandRunOptions } from '../types/command-runner.js';
import { debug } from './logger.js';

const execFileAsync = promisify(execFile);

/** Exit code reported when the executable could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Wrap a shell command line (globs, `&&`, redirections) for the runner.
 */
export function shellCommand(commandLine: string): string[] {
  return ['sh', '-c', commandLine];
}

function stringField(err: object, field: 'stdout' | 'stderr'): string {
  const value: unknown = field in err ? Reflect.get(err, field) : undefined;
  return typeof value === 'string' ? value : '';
}

function toFailedResult(err: unknown): CommandResult {
  if (typeof err !== 'object' || err === null) {
    return { exitCode: 1, stdout: '', stderr: String(err) };
  }

  const code: unknown = 'code' in err ? err.code : undefined;
  const message = err instanceof Error ? err.message : '';
  const stderr = stringField(err, 'stderr') || message;

  if (typeof code === 'number') {
    return { exitCode: code, stdout: stringField(err, 'stdout'), stderr };
  }
  if (code === 'ENOENT' || code === 'EACCES') {
    return { exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: '', stderr };
  }
  return { exitCode: 1, stdout: stringField(err, 'stdout'), stderr };
}

/**
 * Runs commands as child processes and captures their output. Non-zero exits
 * and commands that cannot be started are returned as results, never thrown.
 */
export class ProcessCommandRunner implements CommandRunner {
  async run(command: readonly string[], options: CommandRunOptions): Promise<CommandResult> {
    const [file, ...args] = command;
    if (!file) {
      return { exitCode: 1, stdout: '', stderr: 'Empty command' };
    }

    debug(`Running: ${command.join(' ')} (in ${options.cwd})`);

    try {
      const { stdout, stderr } = await execFileAsync(file, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        timeout: options.timeoutMs ?? 0,
        maxBuffer: 10 * 1024 * 1024, // 10MB
      });
      return { exitCode: 0, stdout, stderr };
    } catch (err: unknown) {
      const result = toFailedResult(err);
      debug(`Command exited with ${result.exitCode}: ${command.join(' ')}`);
      return result;
    }
  }
}
