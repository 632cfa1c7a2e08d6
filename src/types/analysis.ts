/**
 * Types for repository analysis and the compatibility decision
 */

export type BuildSystem = 'make' | 'cmake' | 'simple' | 'unknown';

export type SourceLanguage = 'c' | 'c++';

/**
 * Structural summary of a repository. Paths are relative to the analyzed
 * root and always use `/` as separator.
 */
export interface RepositoryAnalysis {
  readonly projectType: string;
  readonly buildSystem: BuildSystem;
  readonly languages: readonly SourceLanguage[];
  readonly sourceFiles: readonly string[];
  readonly buildFiles: readonly string[];
  readonly testFiles: readonly string[];
  readonly hasMakefile: boolean;
  readonly hasCmake: boolean;
  readonly hasTests: boolean;
}

export interface CompatibilityResult {
  isCompatible: boolean;
  issues: string[];
}
