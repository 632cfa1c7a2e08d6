/**
 * Build stage: compile the repository with gcov instrumentation
 */

import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { RepositoryAnalysis } from '../types/analysis.js';
import type { CommandResult, CommandRunner } from '../types/command-runner.js';
import type { ModificationPlan } from '../types/modification.js';
import { shellCommand } from '../utils/command-runner.js';
import { debug, info, success, warn } from '../utils/logger.js';

export const COVERAGE_FLAGS: readonly string[] = ['-fprofile-arcs', '-ftest-coverage', '-g', '-O0'];

export const COVERAGE_ENV: Readonly<Record<string, string>> = Object.freeze({
  CFLAGS: COVERAGE_FLAGS.join(' '),
  CXXFLAGS: COVERAGE_FLAGS.join(' '),
  LDFLAGS: '-lgcov',
});

const C_EXTENSIONS = ['.c'];
const CPP_EXTENSIONS = ['.cpp', '.cc', '.cxx'];

export type BuildStrategy = 'make' | 'cmake' | 'direct';

export interface BuildOptions {
  rootPath: string;
  analysis: RepositoryAnalysis;
  runner: CommandRunner;
  /** Applied plan, whose test compilation command is tried first */
  plan?: ModificationPlan;
  /** Make invocations tried in order */
  makeCommands?: readonly string[];
}

export interface BuildResult {
  success: boolean;
  strategy: BuildStrategy;
  /** Executables produced by direct compilation, relative to the root */
  executables: string[];
}

export function selectBuildStrategy(rootPath: string, analysis: RepositoryAnalysis): BuildStrategy {
  if (analysis.buildSystem === 'make' || existsSync(join(rootPath, 'Makefile'))) {
    return 'make';
  }
  if (analysis.buildSystem === 'cmake' || existsSync(join(rootPath, 'CMakeLists.txt'))) {
    return 'cmake';
  }
  return 'direct';
}

function hasExtension(file: string, extensions: readonly string[]): boolean {
  return extensions.some((extension) => file.endsWith(extension));
}

function reportFailure(label: string, result: CommandResult): void {
  const detail = result.stderr.trim().split('\n').slice(-3).join(' | ');
  warn(`${label} failed (exit code ${result.exitCode})${detail ? `: ${detail}` : ''}`);
}

/**
 * Compile each source file on its own into `test_program_<i>` (C) or
 * `test_program_cpp_<i>` (C++). Succeeds if anything compiled.
 */
export async function compileDirectly(
  rootPath: string,
  analysis: RepositoryAnalysis,
  runner: CommandRunner
): Promise<BuildResult> {
  const cFiles = analysis.sourceFiles.filter((file) => hasExtension(file, C_EXTENSIONS));
  const cppFiles = analysis.sourceFiles.filter((file) => hasExtension(file, CPP_EXTENSIONS));
  const executables: string[] = [];

  const compile = async (compiler: string, files: string[], prefix: string): Promise<void> => {
    for (const [index, file] of files.entries()) {
      const output = `${prefix}${index}`;
      const result = await runner.run([compiler, ...COVERAGE_FLAGS, file, '-lgcov', '-o', output], {
        cwd: rootPath,
        env: { ...COVERAGE_ENV },
      });
      if (result.exitCode === 0) {
        debug(`Compiled ${file} -> ${output}`);
        executables.push(output);
      } else {
        reportFailure(`Compiling ${file}`, result);
      }
    }
  };

  await compile('gcc', cFiles, 'test_program_');
  await compile('g++', cppFiles, 'test_program_cpp_');

  return { success: executables.length > 0, strategy: 'direct', executables };
}

async function buildWithMake(options: BuildOptions): Promise<BuildResult> {
  const { rootPath, analysis, runner, plan } = options;
  const env = { ...COVERAGE_ENV };

  info('Using Make build system...');
  await runner.run(['make', 'clean'], { cwd: rootPath, env });

  if (plan?.testCompilation) {
    info(`Using suggested test compilation: ${plan.testCompilation}`);
    const result = await runner.run(shellCommand(plan.testCompilation), { cwd: rootPath, env });
    if (result.exitCode === 0) {
      return { success: true, strategy: 'make', executables: [] };
    }
    reportFailure('Suggested test compilation', result);
  }

  for (const makeCommand of options.makeCommands ?? ['make']) {
    const result = await runner.run(shellCommand(makeCommand), { cwd: rootPath, env });
    if (result.exitCode === 0) {
      return { success: true, strategy: 'make', executables: [] };
    }
    reportFailure(makeCommand, result);
  }

  warn('Make commands failed, falling back to direct compilation');
  return compileDirectly(rootPath, analysis, runner);
}

async function buildWithCmake(options: BuildOptions): Promise<BuildResult> {
  const { rootPath, runner } = options;
  const buildDir = join(rootPath, 'build');
  const flags = COVERAGE_FLAGS.join(' ');

  info('Using CMake build system...');
  mkdirSync(buildDir, { recursive: true });

  const configure = await runner.run(['cmake', '..', `-DCMAKE_C_FLAGS=${flags}`, `-DCMAKE_CXX_FLAGS=${flags}`], {
    cwd: buildDir,
    env: { ...COVERAGE_ENV },
  });
  if (configure.exitCode !== 0) {
    reportFailure('cmake configure', configure);
    return { success: false, strategy: 'cmake', executables: [] };
  }

  const build = await runner.run(['cmake', '--build', '.'], { cwd: buildDir, env: { ...COVERAGE_ENV } });
  if (build.exitCode !== 0) {
    reportFailure('cmake --build', build);
  }
  return { success: build.exitCode === 0, strategy: 'cmake', executables: [] };
}

function runStrategy(strategy: BuildStrategy, options: BuildOptions): Promise<BuildResult> {
  switch (strategy) {
    case 'make':
      return buildWithMake(options);
    case 'cmake':
      return buildWithCmake(options);
    case 'direct':
      info('Using direct compilation...');
      return compileDirectly(options.rootPath, options.analysis, options.runner);
  }
}

/**
 * Build the repository with coverage instrumentation using its own build
 * system where it has one.
 */
export async function buildWithCoverage(options: BuildOptions): Promise<BuildResult> {
  const strategy = selectBuildStrategy(options.rootPath, options.analysis);

  if (options.analysis.languages.length === 0) {
    warn(`Coverage generation not implemented for ${options.analysis.projectType}`);
    return { success: false, strategy, executables: [] };
  }

  const result = await runStrategy(strategy, options);

  if (result.success) {
    success(`Build succeeded (${result.strategy})`);
  }
  return result;
}
