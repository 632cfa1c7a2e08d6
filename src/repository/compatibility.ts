import { readFileSync } from 'fs';
import { join } from 'path';
import type { CompatibilityResult, RepositoryAnalysis } from '../types/analysis.js';
import { debug, describeError } from '../utils/logger.js';

export const COMPATIBILITY_ISSUES = {
  makefileCoverageFlags: 'Makefile missing Gcov coverage flags',
  makefileLinkFlags: 'Makefile missing Gcov linking flags',
  cmakeCoverageConfig: 'CMakeLists.txt missing coverage configuration',
  noTests: 'No test files found',
  unmanagedBuild: 'Multiple source files without build system',
} as const;

/**
 * Read a build file as text; unreadable files count as empty so the checker
 * reports the missing flags instead of failing.
 */
function readBuildFile(rootPath: string, relativePath: string): string {
  try {
    return readFileSync(join(rootPath, relativePath), 'utf-8');
  } catch (err) {
    debug(`Treating unreadable build file ${relativePath} as empty: ${describeError(err)}`);
    return '';
  }
}

/**
 * Decide whether the repository already produces gcov data. Every rule is
 * evaluated and each failing one adds an issue.
 */
export function checkCompatibility(rootPath: string, analysis: RepositoryAnalysis): CompatibilityResult {
  const issues: string[] = [];

  if (analysis.hasMakefile) {
    const makefile = analysis.buildFiles.find((file) => file.toLowerCase().includes('makefile'));
    if (makefile) {
      const content = readBuildFile(rootPath, makefile);
      if (!content.includes('-fprofile-arcs') || !content.includes('-ftest-coverage')) {
        issues.push(COMPATIBILITY_ISSUES.makefileCoverageFlags);
      }
      if (!content.includes('-lgcov')) {
        issues.push(COMPATIBILITY_ISSUES.makefileLinkFlags);
      }
    }
  }

  if (analysis.hasCmake) {
    const cmakeFiles = analysis.buildFiles.filter((file) => file.toLowerCase().includes('cmake'));
    for (const cmakeFile of cmakeFiles) {
      const content = readBuildFile(rootPath, cmakeFile).toLowerCase();
      if (!content.includes('coverage') && !content.includes('gcov')) {
        issues.push(COMPATIBILITY_ISSUES.cmakeCoverageConfig);
      }
    }
  }

  if (!analysis.hasTests) {
    issues.push(COMPATIBILITY_ISSUES.noTests);
  }

  if (analysis.buildSystem === 'simple' && analysis.sourceFiles.length > 1) {
    issues.push(COMPATIBILITY_ISSUES.unmanagedBuild);
  }

  return {
    isCompatible: issues.length === 0,
    issues,
  };
}
