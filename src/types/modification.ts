/**
 * Types for build-file modification plans and their reversal
 */

import type { RepositoryAnalysis } from './analysis.js';

export interface MissingFile {
  /** Path relative to the repository root */
  path: string;
  content: string;
}

export interface ModificationPlan {
  readonly makefileChanges: readonly string[];
  readonly cmakeChanges: readonly string[];
  /** Shell command that builds the tests with coverage, if the provider knows one */
  readonly testCompilation?: string;
  readonly gcovCommands: readonly string[];
  readonly missingFiles: readonly MissingFile[];
  readonly explanation: string;
}

/**
 * One filesystem change made while applying a plan.
 *
 * `backup`: `originalPath` was renamed to `backupPath` and a patched file was
 * written in its place. `created`: `path` did not exist before. `directory`:
 * the outermost directory made to hold a created file.
 */
export type ModificationRecord =
  | { readonly kind: 'backup'; readonly originalPath: string; readonly backupPath: string }
  | { readonly kind: 'created'; readonly path: string }
  | { readonly kind: 'directory'; readonly path: string };

export interface RollbackFailure {
  record: ModificationRecord;
  error: string;
}

/** Build file content handed to a suggestion provider */
export interface BuildFileExcerpt {
  path: string;
  content: string;
}

export interface SuggestionRequest {
  analysis: RepositoryAnalysis;
  issues: readonly string[];
  buildFiles: readonly BuildFileExcerpt[];
}

/**
 * Source of modification plans. Implementations never throw; they degrade
 * to a deterministic plan.
 */
export interface SuggestionProvider {
  suggest(request: SuggestionRequest): Promise<ModificationPlan>;
}
