import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { coverageLevel, parseAnnotatedFiles, parseGcovLine, parseGcovText, percentageOf } from './gcov-parser.js';
import { warn } from '../utils/logger.js';

vi.mock('../utils/logger.js', () => ({
  warn: vi.fn(),
  describeError: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

const MAIN_GCOV = [
  '        -:    0:Source:main.c',
  '        -:    0:Runs:1',
  '        -:    1:#include <stdio.h>',
  'function main called 1 returned 100% blocks executed 75%',
  '        1:    2:int main(void) {',
  '    #####:    3:    if (0) printf("x: %d", 1);',
  '        1:    4:    return 0;',
  '        -:    5:}',
  '',
].join('\n');

describe('parseGcovLine', () => {
  it('should record an executed line as covered', () => {
    expect(parseGcovLine('5:10:   return 0;')).toEqual({
      lineNumber: 10,
      executionCount: 5,
      countText: '5',
      sourceText: '   return 0;',
      covered: true,
    });
  });

  it('should record ##### as executable but not covered', () => {
    expect(parseGcovLine('#####:10:   return 0;')).toEqual({
      lineNumber: 10,
      executionCount: 0,
      countText: '#####',
      sourceText: '   return 0;',
      covered: false,
    });
  });

  it('should record - as not executable and not covered', () => {
    expect(parseGcovLine('-:12:}')).toEqual({
      lineNumber: 12,
      executionCount: 'not-executable',
      countText: '-',
      sourceText: '}',
      covered: false,
    });
  });

  it('should treat a zero count as not covered', () => {
    expect(parseGcovLine('0:7:x++;')?.covered).toBe(false);
  });

  it('should treat counts with suffixes as not covered', () => {
    const record = parseGcovLine('     3*:    8:  if (a && b)');
    expect(record?.covered).toBe(false);
    expect(record?.executionCount).toBe('not-executable');
  });

  it('should exclude lines whose line number is not numeric', () => {
    expect(parseGcovLine('1:-:something')).toBeNull();
    expect(parseGcovLine('branch  0 taken 1')).toBeNull();
  });

  it('should skip blank lines and lines with fewer than three fields', () => {
    expect(parseGcovLine('   ')).toBeNull();
    expect(parseGcovLine('1:2')).toBeNull();
  });

  it('should keep colons inside the source text', () => {
    expect(parseGcovLine('        2:   14:    label: x = a ? b : c;')?.sourceText).toBe('    label: x = a ? b : c;');
  });

  it('should strip trailing whitespace and carriage returns from the source', () => {
    expect(parseGcovLine('1:3:int x;   \r')?.sourceText).toBe('int x;');
  });
});

describe('parseGcovText', () => {
  it('should count every numeric line including gcov header lines', () => {
    const file = parseGcovText('/repo/main.c.gcov', MAIN_GCOV);

    expect(file.name).toBe('main.c');
    expect(file.path).toBe('/repo/main.c.gcov');
    expect(file.totalLines).toBe(7);
    expect(file.coveredLines).toBe(2);
    expect(file.percentage).toBeCloseTo(28.571, 2);
    expect(file.lines.map((line) => line.lineNumber)).toEqual([0, 0, 1, 2, 3, 4, 5]);
  });

  it('should return an empty record for text without coverable lines', () => {
    const file = parseGcovText('empty.gcov', 'function f called 0 returned 0%\n');

    expect(file.totalLines).toBe(0);
    expect(file.percentage).toBe(0);
  });
});

describe('percentageOf', () => {
  it('should be zero when there is nothing to cover', () => {
    expect(percentageOf(0, 0)).toBe(0);
  });

  it('should compute a percentage', () => {
    expect(percentageOf(1, 4)).toBe(25);
  });
});

describe('coverageLevel', () => {
  it('should classify by thresholds', () => {
    expect(coverageLevel(85)).toBe('high');
    expect(coverageLevel(84.9)).toBe('medium');
    expect(coverageLevel(50)).toBe('medium');
    expect(coverageLevel(49.9)).toBe('low');
  });
});

describe('parseAnnotatedFiles', () => {
  let dir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'gcovsmith-gcov-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should aggregate totals across files', () => {
    writeFileSync(join(dir, 'main.c.gcov'), MAIN_GCOV);
    writeFileSync(join(dir, 'util.c.gcov'), '1:1:int util(void) {\n1:2:  return 1;\n-:3:}\n');

    const model = parseAnnotatedFiles([join(dir, 'main.c.gcov'), join(dir, 'util.c.gcov')]);

    expect(model.totalLines).toBe(10);
    expect(model.coveredLines).toBe(4);
    expect(model.percentage).toBe(40);
    expect(model.files.map((file) => file.name)).toEqual(['main.c', 'util.c']);
    expect(model.files[1].percentage).toBeCloseTo(66.667, 2);
  });

  it('should leave out files without coverable lines', () => {
    writeFileSync(join(dir, 'header.h.gcov'), 'nothing useful here\n');
    writeFileSync(join(dir, 'main.c.gcov'), MAIN_GCOV);

    const model = parseAnnotatedFiles([join(dir, 'header.h.gcov'), join(dir, 'main.c.gcov')]);

    expect(model.files).toHaveLength(1);
    expect(model.files[0].name).toBe('main.c');
  });

  it('should skip unreadable files with a warning', () => {
    const model = parseAnnotatedFiles([join(dir, 'missing.c.gcov')]);

    expect(model).toEqual({ totalLines: 0, coveredLines: 0, percentage: 0, files: [] });
    expect(vi.mocked(warn)).toHaveBeenCalledTimes(1);
  });

  it('should give identical models for repeated parses', () => {
    writeFileSync(join(dir, 'main.c.gcov'), MAIN_GCOV);
    const paths = [join(dir, 'main.c.gcov')];

    expect(parseAnnotatedFiles(paths)).toEqual(parseAnnotatedFiles(paths));
  });

  it('should never report more covered than total lines', () => {
    writeFileSync(join(dir, 'a.c.gcov'), '9:1:a();\n9:2:b();\n');

    const model = parseAnnotatedFiles([join(dir, 'a.c.gcov')]);

    expect(model.coveredLines).toBeLessThanOrEqual(model.totalLines);
    expect(model.percentage).toBe(100);
  });
});
