/**
 * Deterministic modification plans, used without a model or when it fails
 */

import type { RepositoryAnalysis } from '../types/analysis.js';
import type { MissingFile, ModificationPlan } from '../types/modification.js';

export const FALLBACK_EXPLANATION = 'Basic Gcov compatibility modifications';

export const FALLBACK_MAKEFILE_CHANGES: readonly string[] = [
  'CFLAGS += -fprofile-arcs -ftest-coverage -g -O0',
  'CXXFLAGS += -fprofile-arcs -ftest-coverage -g -O0',
  'LDFLAGS += -lgcov',
  '',
  'coverage:',
  "\t@echo 'Generating coverage report...'",
  '\tgcov *.gcda',
  '\tlcov --capture --directory . --output-file coverage.info',
  '\tgenhtml coverage.info --output-directory coverage_html',
];

export const FALLBACK_CMAKE_CHANGES: readonly string[] = [
  '# Add coverage flags',
  'set(CMAKE_CXX_FLAGS "${CMAKE_CXX_FLAGS} -fprofile-arcs -ftest-coverage")',
  'set(CMAKE_C_FLAGS "${CMAKE_C_FLAGS} -fprofile-arcs -ftest-coverage")',
  'target_link_libraries(${TARGET_NAME} gcov)',
];

export const FALLBACK_GCOV_COMMANDS: readonly string[] = ['gcov *.gcda', 'gcov *.c *.cpp'];

export interface PlanFields {
  makefileChanges?: readonly string[];
  cmakeChanges?: readonly string[];
  testCompilation?: string;
  gcovCommands?: readonly string[];
  missingFiles?: readonly MissingFile[];
  explanation?: string;
}

/**
 * Build a frozen plan; omitted fields are empty. An empty test compilation
 * command is treated as absent.
 */
export function createModificationPlan(fields: PlanFields = {}): ModificationPlan {
  const testCompilation = fields.testCompilation?.trim() ? fields.testCompilation : undefined;

  return Object.freeze({
    makefileChanges: Object.freeze([...(fields.makefileChanges ?? [])]),
    cmakeChanges: Object.freeze([...(fields.cmakeChanges ?? [])]),
    ...(testCompilation !== undefined ? { testCompilation } : {}),
    gcovCommands: Object.freeze([...(fields.gcovCommands ?? [])]),
    missingFiles: Object.freeze((fields.missingFiles ?? []).map((file) => Object.freeze({ ...file }))),
    explanation: fields.explanation ?? '',
  });
}

/**
 * Coverage flags for Makefile projects (or flat ones without a build system)
 * and CMake projects; the same analysis always gives the same plan.
 */
export function createFallbackPlan(analysis: RepositoryAnalysis): ModificationPlan {
  const patchMakefile = analysis.hasMakefile || analysis.buildSystem === 'simple';

  return createModificationPlan({
    makefileChanges: patchMakefile ? FALLBACK_MAKEFILE_CHANGES : [],
    cmakeChanges: analysis.hasCmake ? FALLBACK_CMAKE_CHANGES : [],
    gcovCommands: FALLBACK_GCOV_COMMANDS,
    explanation: FALLBACK_EXPLANATION,
  });
}
