/**
 * Instrumentation run and gcov extraction
 */

import { accessSync, constants, existsSync, readdirSync, statSync } from 'fs';
import { basename, join, relative, sep } from 'path';
import { minimatch } from 'minimatch';
import type { RepositoryAnalysis } from '../types/analysis.js';
import type { CommandRunner } from '../types/command-runner.js';
import type { ModificationPlan } from '../types/modification.js';
import { shellCommand } from '../utils/command-runner.js';
import { findFiles } from '../utils/find-files.js';
import { debug, describeError, info, success, warn } from '../utils/logger.js';

/** Executable name patterns: in the root, then in `build/` */
export const ROOT_EXECUTABLE_PATTERNS: readonly string[] = ['*.exe', 'test*'];
export const BUILD_EXECUTABLE_PATTERNS: readonly string[] = ['*.exe'];

const GCOV_SOURCE_EXTENSIONS = ['.c', '.cpp', '.cc'];

/** Used when nothing better is known */
export const DEFAULT_GCOV_COMMANDS: readonly string[] = ['gcov main.c', 'gcov *.c'];

export interface CoverageDataOptions {
  rootPath: string;
  analysis: RepositoryAnalysis;
  runner: CommandRunner;
  plan?: ModificationPlan;
  /** Per-executable time limit */
  timeoutMs?: number;
}

export interface CoverageDataResult {
  success: boolean;
  /** Executables that were run, relative to the root */
  executables: string[];
  gcovFiles: string[];
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function matchingExecutables(dir: string, patterns: readonly string[]): string[] {
  if (!existsSync(dir)) {
    return [];
  }

  let names: string[];
  try {
    names = readdirSync(dir).sort();
  } catch (err) {
    debug(`Could not list ${dir}: ${describeError(err)}`);
    return [];
  }

  return names
    .filter((name) => patterns.some((pattern) => minimatch(name, pattern)))
    .map((name) => join(dir, name))
    .filter(isExecutableFile);
}

/**
 * Executable regular files that look like test programs, as absolute paths.
 */
export function findExecutables(rootPath: string): string[] {
  const found = [
    ...matchingExecutables(rootPath, ROOT_EXECUTABLE_PATTERNS),
    ...matchingExecutables(join(rootPath, 'build'), BUILD_EXECUTABLE_PATTERNS),
  ];
  return [...new Set(found)];
}

/**
 * gcov invocations in order of preference: the plan's commands, one per C or
 * C++ source, or the defaults.
 */
export function gcovCommandsFor(analysis: RepositoryAnalysis, plan?: ModificationPlan): string[][] {
  if (plan && plan.gcovCommands.length > 0) {
    info(`Using suggested gcov commands: ${plan.gcovCommands.join(', ')}`);
    return plan.gcovCommands.map(shellCommand);
  }

  const sources = analysis.sourceFiles.filter((file) =>
    GCOV_SOURCE_EXTENSIONS.some((extension) => file.endsWith(extension))
  );
  if (sources.length > 0) {
    return sources.map((source) => ['gcov', source]);
  }

  return DEFAULT_GCOV_COMMANDS.map(shellCommand);
}

/**
 * Run the instrumented programs, then gcov. Succeeds when any gcov command
 * exits cleanly or any `.gcov` file exists afterwards.
 */
export async function collectCoverageData(options: CoverageDataOptions): Promise<CoverageDataResult> {
  const { rootPath, analysis, runner, plan } = options;

  const executables = findExecutables(rootPath);
  if (executables.length === 0) {
    warn('No executables found to run for testing');
  }

  for (const executable of executables) {
    const name = basename(executable);
    info(`Running: ${name}`);
    const result = await runner.run([executable], { cwd: rootPath, timeoutMs: options.timeoutMs });
    if (result.exitCode === 0) {
      debug(`${name} executed successfully`);
    } else {
      warn(`${name} exited with code ${result.exitCode}, continuing`);
    }
  }

  const gcda = findFiles(rootPath, (file) => file.endsWith('.gcda'));
  const gcno = findFiles(rootPath, (file) => file.endsWith('.gcno'));
  info(`Found ${gcda.length} .gcda files and ${gcno.length} .gcno files`);

  let anySucceeded = false;
  for (const command of gcovCommandsFor(analysis, plan)) {
    const result = await runner.run(command, { cwd: rootPath });
    if (result.exitCode === 0) {
      anySucceeded = true;
      debug(`${command.join(' ')} succeeded`);
    } else {
      warn(`${command.join(' ')} failed, trying next...`);
    }
  }

  const gcovFiles = findFiles(rootPath, (file) => file.endsWith('.gcov'));
  info(`Generated ${gcovFiles.length} .gcov files`);

  const succeeded = anySucceeded || gcovFiles.length > 0;
  if (succeeded) {
    success('Coverage data collected');
  }

  return {
    success: succeeded,
    executables: executables.map((path) => relative(rootPath, path).split(sep).join('/')),
    gcovFiles,
  };
}
