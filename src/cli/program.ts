/**
 * Command-line surface: argument parsing, confirmation prompt and exit code
 */

import { createInterface } from 'readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import { runCoverage, type CoverageRunContext, type CoverageRunSummary } from '../core/orchestrator.js';
import type { PartialGcovsmithConfig } from '../types/config.js';
import type { ModificationPlan } from '../types/modification.js';
import { describeError, error, info, warn } from '../utils/logger.js';

export type CliOptions = {
  outputDir?: string;
  config?: string;
  yes?: boolean;
  /** `false` when --no-llm is given */
  llm: boolean;
  debug?: boolean;
  /** Milliseconds each test program may run */
  timeout?: number;
};

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

export interface CliDependencies {
  runCoverage?: (context: CoverageRunContext) => Promise<CoverageRunSummary>;
  streams?: PromptStreams;
}

export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!/^\d+$/.test(value) || timeout <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return timeout;
}

export function createProgram(): Command {
  return new Command()
    .name('gcovsmith')
    .description('Make a C/C++ repository gcov-compatible and generate an HTML coverage report')
    .version('0.1.0')
    .argument('[repository]', 'Git URL or local path (default: repositoryUrl from the config)')
    .option('-o, --output-dir <dir>', 'Directory for the HTML report')
    .option('-c, --config <path>', 'Path to a config file')
    .option('-y, --yes', 'Apply suggested modifications without asking')
    .option('--no-llm', 'Use the built-in modification plan instead of a model')
    .option('-t, --timeout <ms>', 'Time limit for each test program, in milliseconds', parseTimeout)
    .option('--debug', 'Verbose logging');
}

/**
 * Ask on the terminal whether to apply `plan`. Anything but y/yes declines,
 * and so does a non-interactive input.
 */
export async function confirmModifications(
  plan: ModificationPlan,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  if (!streams.input.isTTY) {
    warn('Not running interactively; modifications declined (use --yes to apply them)');
    return false;
  }

  const rl = createInterface({ input: streams.input, output: streams.output });
  try {
    const count = plan.makefileChanges.length + plan.cmakeChanges.length + plan.missingFiles.length;
    const answer = await rl.question(`Apply ${count} temporary modification(s)? (y/N): `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

export function toRunContext(
  repository: string | undefined,
  options: CliOptions,
  streams?: PromptStreams
): CoverageRunContext {
  const overrides: PartialGcovsmithConfig = {
    ...(options.outputDir ? { outputDir: options.outputDir } : {}),
    ...(options.debug ? { debug: true } : {}),
  };

  return {
    repository,
    configPath: options.config,
    overrides,
    disableLlm: !options.llm,
    autoApprove: options.yes === true,
    timeoutMs: options.timeout,
    confirm: (plan) => confirmModifications(plan, streams),
  };
}

/**
 * Parse `argv`, run the pipeline and return the process exit code.
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const program = createProgram();
  program.parse([...argv], { from: 'node' });

  const repository = program.args[0];
  const context = toRunContext(repository, program.opts<CliOptions>(), dependencies.streams);
  const run = dependencies.runCoverage ?? runCoverage;

  try {
    const summary = await run(context);
    if (!summary.success) {
      error('Coverage generation failed:');
      for (const message of summary.errors) {
        error(`  - ${message}`);
      }
      return 1;
    }

    info(`Done. Open ${summary.reportPath} in a browser to view the report`);
    return 0;
  } catch (err) {
    error(`Fatal error: ${describeError(err)}`);
    if (err instanceof Error && err.stack) {
      error(err.stack);
    }
    return 1;
  }
}
