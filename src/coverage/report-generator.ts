import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import type { CommandRunner } from '../types/command-runner.js';
import type { CoverageModel } from '../types/coverage.js';
import { ReportError } from '../types/errors.js';
import { findFiles } from '../utils/find-files.js';
import { debug, describeError, info, success } from '../utils/logger.js';
import { parseAnnotatedFiles } from './gcov-parser.js';
import { renderHtmlReport } from './html-report.js';

export interface ReportOptions {
  /** Repository working tree that holds the coverage artifacts */
  rootPath: string;
  /** Report directory; relative paths resolve against the working directory */
  outputDir: string;
  repositoryName: string;
  runner: CommandRunner;
}

export interface ReportResult {
  generator: 'lcov' | 'builtin';
  /** Entry page of the report */
  reportPath: string;
  /** Parsed model; only the built-in renderer produces one */
  model?: CoverageModel;
}

/**
 * Every `*.gcov` file below `rootPath`, in sorted traversal order.
 */
export function findGcovFiles(rootPath: string): string[] {
  return findFiles(rootPath, (name) => name.endsWith('.gcov'));
}

export async function isLcovAvailable(runner: CommandRunner, cwd: string): Promise<boolean> {
  const result = await runner.run(['lcov', '--version'], { cwd });
  return result.exitCode === 0;
}

async function generateLcovReport(options: ReportOptions, outputDir: string): Promise<ReportResult> {
  const { runner, rootPath } = options;

  const capture = await runner.run(
    ['lcov', '--capture', '--directory', '.', '--output-file', 'coverage.info'],
    { cwd: rootPath }
  );
  if (capture.exitCode !== 0) {
    throw new ReportError(`LCOV capture failed: ${capture.stderr.trim() || `exit code ${capture.exitCode}`}`);
  }

  const genhtml = await runner.run(['genhtml', 'coverage.info', '--output-directory', outputDir], {
    cwd: rootPath,
  });
  if (genhtml.exitCode !== 0) {
    throw new ReportError(`genhtml failed: ${genhtml.stderr.trim() || `exit code ${genhtml.exitCode}`}`);
  }

  const reportPath = join(outputDir, 'index.html');
  success(`HTML report generated in ${outputDir}`);
  return { generator: 'lcov', reportPath };
}

function generateBuiltinReport(options: ReportOptions, outputDir: string): ReportResult {
  info('Using built-in HTML generator...');

  const gcovFiles = findGcovFiles(options.rootPath);
  if (gcovFiles.length === 0) {
    throw new ReportError('No .gcov files found');
  }

  const model = parseAnnotatedFiles(gcovFiles);
  const html = renderHtmlReport(model, { repositoryName: options.repositoryName });
  const reportPath = join(outputDir, 'index.html');

  try {
    mkdirSync(outputDir, { recursive: true });
    writeFileSync(reportPath, html, 'utf-8');
  } catch (err) {
    throw new ReportError(`Could not write ${reportPath}: ${describeError(err)}`);
  }

  success(`HTML report generated: ${reportPath} (${model.percentage.toFixed(1)}% line coverage)`);
  return { generator: 'builtin', reportPath, model };
}

/**
 * Produce the HTML coverage report, through lcov/genhtml when lcov is
 * installed and from the `.gcov` files otherwise.
 *
 * @throws ReportError when no report could be produced
 */
export async function generateReport(options: ReportOptions): Promise<ReportResult> {
  const outputDir = resolve(options.outputDir);

  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    throw new ReportError(`Could not create output directory ${outputDir}: ${describeError(err)}`);
  }

  if (await isLcovAvailable(options.runner, options.rootPath)) {
    debug('lcov found, delegating report generation');
    return generateLcovReport(options, outputDir);
  }

  return generateBuiltinReport(options, outputDir);
}
