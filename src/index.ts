// Configuration types and schema
export type { GcovsmithConfig, PartialGcovsmithConfig } from './types/config.js';
export { GcovsmithConfigSchema } from './types/config.js';

// Config loader
export { loadConfig } from './utils/config-loader.js';

// Logger utilities
export {
  initLogger,
  info,
  debug,
  warn,
  error,
  success,
  progress,
} from './utils/logger.js';

// Errors
export {
  GcovsmithError,
  RepositoryReadError,
  ModificationError,
  ReportError,
  ConfigError,
  ProviderError,
  RateLimitError,
} from './types/errors.js';

// Pipeline
export { runCoverage, describePlan } from './core/orchestrator.js';
export type { CoverageRunContext, CoverageRunSummary, ConfirmModifications } from './core/orchestrator.js';
export { buildWithCoverage, selectBuildStrategy, COVERAGE_FLAGS } from './core/build.js';
export type { BuildResult, BuildStrategy } from './core/build.js';
export { collectCoverageData, findExecutables, gcovCommandsFor } from './core/coverage-data.js';
export type { CoverageDataResult } from './core/coverage-data.js';

// Repository analysis
export { analyzeRepository, describeAnalysis } from './repository/analyzer.js';
export { checkCompatibility, COMPATIBILITY_ISSUES } from './repository/compatibility.js';
export { resolveRepositorySource, cleanupRepositorySource } from './utils/repository-source.js';
export type { RepositorySource } from './utils/repository-source.js';
export type {
  BuildSystem,
  CompatibilityResult,
  RepositoryAnalysis,
  SourceLanguage,
} from './types/analysis.js';

// Modifications
export { ModificationTransaction, applyModifications, rollbackModifications } from './modifications/transaction.js';
export type {
  MissingFile,
  ModificationPlan,
  ModificationRecord,
  RollbackFailure,
  SuggestionProvider,
  SuggestionRequest,
} from './types/modification.js';

// Coverage reports
export { parseGcovText, parseAnnotatedFiles } from './coverage/gcov-parser.js';
export { renderHtmlReport } from './coverage/html-report.js';
export { generateReport } from './coverage/report-generator.js';
export type { ReportResult } from './coverage/report-generator.js';
export type { CoverageModel, FileCoverage, LineRecord } from './types/coverage.js';

// LLM integration
export { createLLMProvider } from './llm/factory.js';
export { parseModificationPlan } from './llm/parser.js';
export { buildGcovModificationPrompt } from './llm/prompts/gcov-modifications.js';
export { createFallbackPlan, createModificationPlan } from './llm/fallback-plan.js';
export {
  createSuggestionProvider,
  FallbackSuggestionProvider,
  LLMSuggestionProvider,
} from './llm/suggestion-provider.js';
export type {
  LLMMessage,
  LLMResponse,
  LLMProvider,
  LLMGenerateOptions,
} from './types/llm.js';

// Command execution
export { ProcessCommandRunner } from './utils/command-runner.js';
export type { CommandRunner, CommandResult, CommandRunOptions } from './types/command-runner.js';
