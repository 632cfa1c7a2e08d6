/**
 * Repository structure analysis: classifies every file of a checked-out
 * tree into build, source and test files and derives the build system.
 */

import { readdirSync, statSync, type Dirent } from 'fs';
import { extname, join, posix } from 'path';
import type { BuildSystem, RepositoryAnalysis, SourceLanguage } from '../types/analysis.js';
import { RepositoryReadError } from '../types/errors.js';
import { debug, describeError } from '../utils/logger.js';

const MAKEFILE_NAMES = new Set(['makefile', 'makefile.am']);
const CMAKE_NAME = 'cmakelists.txt';
const AUTOTOOLS_NAMES = new Set(['configure.ac', 'configure.in', 'autoconf', 'autotools']);
const SOURCE_EXTENSIONS = new Set(['.c', '.cpp', '.cc', '.cxx', '.c++']);
const TEST_DIRECTORY_NAMES = new Set(['test', 'tests']);

/** Directories that belong to version control, not to the project */
const SKIPPED_DIRECTORIES = new Set(['.git']);

type FileCategory =
  | { kind: 'makefile' }
  | { kind: 'cmake' }
  | { kind: 'autotools' }
  | { kind: 'source'; language: SourceLanguage }
  | { kind: 'test' }
  | { kind: 'other' };

/**
 * Classify a single file. Rules are tried in order and the first match wins.
 */
export function classifyFile(fileName: string, parentDirectoryName: string): FileCategory {
  const name = fileName.toLowerCase();
  const extension = extname(name);

  if (MAKEFILE_NAMES.has(name)) {
    return { kind: 'makefile' };
  }
  if (name === CMAKE_NAME) {
    return { kind: 'cmake' };
  }
  if (AUTOTOOLS_NAMES.has(name)) {
    return { kind: 'autotools' };
  }
  if (SOURCE_EXTENSIONS.has(extension)) {
    return { kind: 'source', language: extension === '.c' ? 'c' : 'c++' };
  }
  if (name.includes('test') || TEST_DIRECTORY_NAMES.has(parentDirectoryName.toLowerCase())) {
    return { kind: 'test' };
  }
  return { kind: 'other' };
}

function readEntries(directory: string): Dirent[] {
  return readdirSync(directory, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
}

function isRegularFile(entry: Dirent, fullPath: string): boolean {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    return statSync(fullPath).isFile();
  } catch {
    return false;
  }
}

function deriveBuildSystem(
  hasCmake: boolean,
  hasMakefile: boolean,
  sourceCount: number,
  buildFileCount: number
): BuildSystem {
  if (hasCmake) {
    return 'cmake';
  }
  if (hasMakefile) {
    return 'make';
  }
  if (sourceCount > 0 && buildFileCount === 0) {
    return 'simple';
  }
  return 'unknown';
}

/**
 * Walk `rootPath` once and build its structural summary.
 *
 * Directory entries are visited in name order so repeated runs over the same
 * tree produce identical results. Subdirectories that cannot be read are
 * skipped; an unreadable root throws {@link RepositoryReadError}.
 */
export function analyzeRepository(rootPath: string): RepositoryAnalysis {
  const languages: SourceLanguage[] = [];
  const sourceFiles: string[] = [];
  const buildFiles: string[] = [];
  const testFiles: string[] = [];
  let hasMakefile = false;
  let hasCmake = false;
  let hasTests = false;

  let rootEntries: Dirent[];
  try {
    rootEntries = readEntries(rootPath);
  } catch (err) {
    throw new RepositoryReadError(rootPath, `Cannot read repository root ${rootPath}: ${describeError(err)}`);
  }

  const visit = (directory: string, relativeDirectory: string, entries: Dirent[]): void => {
    const parentName = posix.basename(relativeDirectory);

    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      const relativePath = relativeDirectory ? posix.join(relativeDirectory, entry.name) : entry.name;

      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORIES.has(entry.name)) {
          continue;
        }
        let children: Dirent[];
        try {
          children = readEntries(fullPath);
        } catch (err) {
          debug(`Skipping unreadable directory ${relativePath}: ${describeError(err)}`);
          continue;
        }
        visit(fullPath, relativePath, children);
        continue;
      }

      if (!isRegularFile(entry, fullPath)) {
        continue;
      }

      const category = classifyFile(entry.name, parentName);
      switch (category.kind) {
        case 'makefile':
          hasMakefile = true;
          buildFiles.push(relativePath);
          break;
        case 'cmake':
          hasCmake = true;
          buildFiles.push(relativePath);
          break;
        case 'autotools':
          buildFiles.push(relativePath);
          break;
        case 'source':
          sourceFiles.push(relativePath);
          if (!languages.includes(category.language)) {
            languages.push(category.language);
          }
          break;
        case 'test':
          testFiles.push(relativePath);
          hasTests = true;
          break;
        case 'other':
          break;
      }
    }
  };

  visit(rootPath, '', rootEntries);

  const analysis: RepositoryAnalysis = {
    projectType: languages.length > 0 ? languages.join('/') : 'unknown',
    buildSystem: deriveBuildSystem(hasCmake, hasMakefile, sourceFiles.length, buildFiles.length),
    languages: Object.freeze(languages),
    sourceFiles: Object.freeze(sourceFiles),
    buildFiles: Object.freeze(buildFiles),
    testFiles: Object.freeze(testFiles),
    hasMakefile,
    hasCmake,
    hasTests,
  };

  return Object.freeze(analysis);
}

/**
 * Human-readable summary lines for logs
 */
export function describeAnalysis(analysis: RepositoryAnalysis): string[] {
  return [
    `Project Type: ${analysis.projectType}`,
    `Build System: ${analysis.buildSystem}`,
    `Languages: ${analysis.languages.join(', ') || 'none'}`,
    `Source Files: ${analysis.sourceFiles.length} files`,
    `Test Files: ${analysis.testFiles.length} files`,
    `Build Files: ${analysis.buildFiles.length} files`,
  ];
}
