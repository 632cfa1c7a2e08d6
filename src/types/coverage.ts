/**
 * Types for line coverage parsed from gcov annotated sources
 */

export const NOT_EXECUTABLE = 'not-executable';

export type ExecutionCount = number | typeof NOT_EXECUTABLE;

export interface LineRecord {
  lineNumber: number;
  executionCount: ExecutionCount;
  /** Count field as gcov printed it, e.g. `5`, `#####` or `-` */
  countText: string;
  sourceText: string;
  covered: boolean;
}

export interface FileCoverage {
  /** Source file name, the `.gcov` file name without its extension */
  name: string;
  /** Path of the `.gcov` file the record was parsed from */
  path: string;
  lines: LineRecord[];
  totalLines: number;
  coveredLines: number;
  percentage: number;
}

export interface CoverageModel {
  totalLines: number;
  coveredLines: number;
  percentage: number;
  files: FileCoverage[];
}

export type CoverageLevel = 'high' | 'medium' | 'low';
