/**
 * Main orchestration for gcovsmith: analyze a repository, make it gcov-ready
 * if needed, and produce an HTML coverage report
 */

import type { GcovsmithConfig, PartialGcovsmithConfig } from '../types/config.js';
import type { RepositoryAnalysis } from '../types/analysis.js';
import type { CommandRunner } from '../types/command-runner.js';
import type { ModificationPlan, SuggestionProvider } from '../types/modification.js';
import { ConfigError } from '../types/errors.js';
import { loadConfig } from '../utils/config-loader.js';
import { initLogger, info, error, warn, success, progress, describeError } from '../utils/logger.js';
import { ProcessCommandRunner } from '../utils/command-runner.js';
import {
  cleanupRepositorySource,
  resolveRepositorySource,
  type RepositorySource,
} from '../utils/repository-source.js';
import { analyzeRepository, describeAnalysis } from '../repository/analyzer.js';
import { checkCompatibility } from '../repository/compatibility.js';
import { collectBuildFileExcerpts, createSuggestionProvider } from '../llm/suggestion-provider.js';
import { ModificationTransaction } from '../modifications/transaction.js';
import { buildWithCoverage } from './build.js';
import { collectCoverageData } from './coverage-data.js';
import { generateReport } from '../coverage/report-generator.js';

const TOTAL_STEPS = 7;

/** Asked before a plan is applied; resolves to true to go ahead */
export type ConfirmModifications = (plan: ModificationPlan) => Promise<boolean>;

export interface CoverageRunContext {
  /** Git URL or local path; falls back to `repositoryUrl` from the config */
  repository?: string;
  configPath?: string;
  /** Values that win over the config file (CLI flags) */
  overrides?: PartialGcovsmithConfig;
  /** Use the deterministic plan even when a model is configured */
  disableLlm?: boolean;
  /** Apply plans without asking */
  autoApprove?: boolean;
  confirm?: ConfirmModifications;
  /** Time limit for each test program; none when unset */
  timeoutMs?: number;
  runner?: CommandRunner;
  suggestionProvider?: SuggestionProvider;
}

export interface CoverageRunSummary {
  success: boolean;
  compatible: boolean;
  issues: string[];
  plan?: ModificationPlan;
  reportPath?: string;
  errors: string[];
}

interface PipelineState {
  config: GcovsmithConfig;
  context: CoverageRunContext;
  runner: CommandRunner;
  source: RepositorySource;
  summary: CoverageRunSummary;
}

/**
 * Human-readable lines describing what a plan would change.
 */
export function describePlan(plan: ModificationPlan): string[] {
  const lines = [`Explanation: ${plan.explanation || 'No explanation provided'}`];
  if (plan.makefileChanges.length > 0) {
    lines.push(`Makefile: ${plan.makefileChanges.length} changes`);
  }
  if (plan.cmakeChanges.length > 0) {
    lines.push(`CMake: ${plan.cmakeChanges.length} changes`);
  }
  if (plan.missingFiles.length > 0) {
    lines.push(`New files: ${plan.missingFiles.length} files (${plan.missingFiles.map((f) => f.path).join(', ')})`);
  }
  if (plan.testCompilation) {
    lines.push(`Test compilation: ${plan.testCompilation}`);
  }
  if (plan.gcovCommands.length > 0) {
    lines.push(`Gcov commands: ${plan.gcovCommands.join('; ')}`);
  }
  return lines;
}

/**
 * Build, run, extract and report. Each failed stage is recorded in the
 * summary and stops the run.
 */
async function produceCoverage(
  state: PipelineState,
  analysis: RepositoryAnalysis,
  plan?: ModificationPlan
): Promise<void> {
  const { config, context, runner, source, summary } = state;
  const rootPath = source.rootPath;

  progress(5, TOTAL_STEPS, 'Building with coverage instrumentation');
  const build = await buildWithCoverage({ rootPath, analysis, runner, plan, makeCommands: config.makeCommands });
  if (!build.success) {
    error('Failed to build with coverage');
    summary.errors.push('Failed to build with coverage');
    return;
  }

  progress(6, TOTAL_STEPS, 'Running tests and generating coverage data');
  const data = await collectCoverageData({ rootPath, analysis, runner, plan, timeoutMs: context.timeoutMs });
  if (!data.success) {
    error('Failed to run tests and generate coverage');
    summary.errors.push('Failed to run tests and generate coverage');
    return;
  }

  progress(7, TOTAL_STEPS, 'Generating HTML coverage report');
  const report = await generateReport({
    rootPath,
    outputDir: config.outputDir,
    repositoryName: source.name,
    runner,
  });
  summary.reportPath = report.reportPath;
  summary.success = true;
}

async function approve(state: PipelineState, plan: ModificationPlan): Promise<boolean> {
  const { config, context } = state;
  if (context.autoApprove || config.autoApplySuggestions) {
    info('Auto-applying modifications');
    return true;
  }
  if (!context.confirm) {
    warn('Modifications need confirmation: pass --yes or set autoApplySuggestions');
    return false;
  }
  return context.confirm(plan);
}

async function runPipeline(state: PipelineState): Promise<void> {
  const { config, context, source, summary } = state;
  const rootPath = source.rootPath;

  progress(2, TOTAL_STEPS, 'Analyzing repository structure');
  const analysis = analyzeRepository(rootPath);
  for (const line of describeAnalysis(analysis)) {
    info(`  ${line}`);
  }

  progress(3, TOTAL_STEPS, 'Checking Gcov compatibility');
  const compatibility = checkCompatibility(rootPath, analysis);
  summary.compatible = compatibility.isCompatible;
  summary.issues = [...compatibility.issues];

  if (compatibility.isCompatible) {
    success('Repository is Gcov-compatible');
    progress(4, TOTAL_STEPS, 'No modifications needed');
    await produceCoverage(state, analysis);
    return;
  }

  warn('Repository is NOT Gcov-compatible');
  for (const issue of compatibility.issues) {
    warn(`  - ${issue}`);
  }

  progress(4, TOTAL_STEPS, 'Requesting modifications');
  const provider =
    context.suggestionProvider ?? createSuggestionProvider(config, { disableLlm: context.disableLlm });
  const plan = await provider.suggest({
    analysis,
    issues: compatibility.issues,
    buildFiles: collectBuildFileExcerpts(rootPath, analysis),
  });
  summary.plan = plan;

  info('Suggested modifications:');
  for (const line of describePlan(plan)) {
    info(`  ${line}`);
  }

  if (!(await approve(state, plan))) {
    warn('Modifications were not applied');
    summary.errors.push('Modifications were not approved');
    return;
  }

  info('Applying temporary modifications...');
  const transaction = ModificationTransaction.apply(rootPath, plan);
  try {
    await produceCoverage(state, analysis, plan);
  } finally {
    info('Rolling back temporary modifications...');
    const failures = transaction.rollback();
    for (const failure of failures) {
      summary.errors.push(`Rollback failed: ${failure.error}`);
    }
  }
}

/**
 * Produce a gcov coverage report for a repository. Failures are reported in
 * the returned summary; every applied modification is rolled back and a
 * temporary clone is removed before this resolves.
 */
export async function runCoverage(context: CoverageRunContext = {}): Promise<CoverageRunSummary> {
  const config = await loadConfig({ configPath: context.configPath, overrides: context.overrides });
  initLogger(config);

  const repository = context.repository ?? config.repositoryUrl;
  if (!repository) {
    throw new ConfigError('No repository given: pass a URL or path, or set repositoryUrl in the config');
  }

  const summary: CoverageRunSummary = { success: false, compatible: false, issues: [], errors: [] };

  progress(1, TOTAL_STEPS, `Preparing repository ${repository}`);
  let source: RepositorySource;
  try {
    source = await resolveRepositorySource(repository);
  } catch (err) {
    error(describeError(err));
    summary.errors.push(describeError(err));
    return summary;
  }

  const state: PipelineState = {
    config,
    context,
    runner: context.runner ?? new ProcessCommandRunner(),
    source,
    summary,
  };

  try {
    await runPipeline(state);
  } catch (err) {
    error(`Error generating coverage report: ${describeError(err)}`);
    summary.success = false;
    summary.errors.push(describeError(err));
  } finally {
    cleanupRepositorySource(source);
  }

  if (summary.success) {
    success(`Coverage report available at: ${summary.reportPath}`);
  }
  return summary;
}
