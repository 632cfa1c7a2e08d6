/**
 * Parse gcov annotated source files (`*.gcov`) into a line coverage model.
 *
 * Each content line reads `<count>:<line number>:<source>`; only the first
 * two colons separate fields, so colons inside the source are kept.
 */

import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import {
  NOT_EXECUTABLE,
  type CoverageLevel,
  type CoverageModel,
  type ExecutionCount,
  type FileCoverage,
  type LineRecord,
} from '../types/coverage.js';
import { describeError, warn } from '../utils/logger.js';

const DIGITS = /^\d+$/;

/** gcov markers for executable lines that never ran */
const UNEXECUTED_MARKERS = new Set(['#####', '=====']);

export function percentageOf(covered: number, total: number): number {
  return total > 0 ? (covered / total) * 100 : 0;
}

export function coverageLevel(percentage: number): CoverageLevel {
  if (percentage >= 85) {
    return 'high';
  }
  if (percentage >= 50) {
    return 'medium';
  }
  return 'low';
}

function toExecutionCount(countText: string): ExecutionCount {
  if (DIGITS.test(countText)) {
    return parseInt(countText, 10);
  }
  if (UNEXECUTED_MARKERS.has(countText)) {
    return 0;
  }
  return NOT_EXECUTABLE;
}

/**
 * Parse one line of a `.gcov` file. Returns null for blank lines, lines with
 * fewer than three fields and lines whose line-number field is not numeric.
 */
export function parseGcovLine(line: string): LineRecord | null {
  if (line.trim().length === 0) {
    return null;
  }

  const firstColon = line.indexOf(':');
  const secondColon = firstColon === -1 ? -1 : line.indexOf(':', firstColon + 1);
  if (secondColon === -1) {
    return null;
  }

  const countText = line.slice(0, firstColon).trim();
  const lineNumberText = line.slice(firstColon + 1, secondColon).trim();
  if (!DIGITS.test(lineNumberText)) {
    return null;
  }

  const executionCount = toExecutionCount(countText);

  return {
    lineNumber: parseInt(lineNumberText, 10),
    executionCount,
    countText,
    sourceText: line.slice(secondColon + 1).trimEnd(),
    covered: typeof executionCount === 'number' && executionCount > 0,
  };
}

/**
 * Coverage of a single annotated file.
 */
export function parseGcovText(path: string, text: string): FileCoverage {
  const lines: LineRecord[] = [];
  let coveredLines = 0;

  for (const rawLine of text.split('\n')) {
    const record = parseGcovLine(rawLine);
    if (!record) {
      continue;
    }
    lines.push(record);
    if (record.covered) {
      coveredLines++;
    }
  }

  return {
    name: basename(path, extname(path)),
    path,
    lines,
    totalLines: lines.length,
    coveredLines,
    percentage: percentageOf(coveredLines, lines.length),
  };
}

/**
 * Aggregate coverage over several `.gcov` files. Files that cannot be read
 * are skipped with a warning; files without coverable lines are left out.
 */
export function parseAnnotatedFiles(paths: readonly string[]): CoverageModel {
  const files: FileCoverage[] = [];
  let totalLines = 0;
  let coveredLines = 0;

  for (const path of paths) {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (err) {
      warn(`Error parsing ${path}: ${describeError(err)}`);
      continue;
    }

    const file = parseGcovText(path, text);
    if (file.totalLines === 0) {
      continue;
    }

    files.push(file);
    totalLines += file.totalLines;
    coveredLines += file.coveredLines;
  }

  return {
    totalLines,
    coveredLines,
    percentage: percentageOf(coveredLines, totalLines),
    files,
  };
}
