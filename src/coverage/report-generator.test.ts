import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findGcovFiles, generateReport } from './report-generator.js';
import { ReportError } from '../types/errors.js';
import { FakeCommandRunner } from '../testing/fake-command-runner.js';

vi.mock('../utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  describeError: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

const MAIN_GCOV = ['        -:    0:Source:main.c', '        1:    1:int main(void) {', '    #####:    2:  fail();', ''].join(
  '\n'
);

const withoutLcov = () =>
  new FakeCommandRunner((command) => (command[0] === 'lcov' ? { exitCode: 127, stderr: 'not found' } : undefined));

describe('report-generator', () => {
  let root: string;
  let outputDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    root = mkdtempSync(join(tmpdir(), 'gcovsmith-report-'));
    outputDir = join(root, 'out');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('findGcovFiles', () => {
    it('should find .gcov files recursively in sorted order and skip .git', () => {
      mkdirSync(join(root, 'src'));
      mkdirSync(join(root, '.git'));
      writeFileSync(join(root, 'src', 'b.c.gcov'), '');
      writeFileSync(join(root, 'a.c.gcov'), '');
      writeFileSync(join(root, '.git', 'x.gcov'), '');
      writeFileSync(join(root, 'main.c'), '');

      expect(findGcovFiles(root)).toEqual([join(root, 'a.c.gcov'), join(root, 'src', 'b.c.gcov')]);
    });
  });

  describe('generateReport', () => {
    it('should render index.html from .gcov files when lcov is missing', async () => {
      writeFileSync(join(root, 'main.c.gcov'), MAIN_GCOV);
      const runner = withoutLcov();

      const result = await generateReport({ rootPath: root, outputDir, repositoryName: 'demo', runner });

      expect(result.generator).toBe('builtin');
      expect(result.reportPath).toBe(join(outputDir, 'index.html'));
      expect(result.model?.totalLines).toBe(3);
      expect(result.model?.coveredLines).toBe(1);

      const html = readFileSync(join(outputDir, 'index.html'), 'utf-8');
      expect(html).toContain('<strong>Overall Coverage: 33.3%</strong>');
      expect(html).toContain('<h3>main.c</h3>');
      expect(runner.commandLines()).toEqual(['lcov --version']);
    });

    it('should fail when there are no .gcov files', async () => {
      await expect(
        generateReport({ rootPath: root, outputDir, repositoryName: 'demo', runner: withoutLcov() })
      ).rejects.toThrow(new ReportError('No .gcov files found'));
      expect(existsSync(join(outputDir, 'index.html'))).toBe(false);
    });

    it('should delegate to lcov and genhtml when lcov is installed', async () => {
      const runner = new FakeCommandRunner();

      const result = await generateReport({ rootPath: root, outputDir, repositoryName: 'demo', runner });

      expect(result).toEqual({ generator: 'lcov', reportPath: join(outputDir, 'index.html') });
      expect(runner.commandLines()).toEqual([
        'lcov --version',
        'lcov --capture --directory . --output-file coverage.info',
        `genhtml coverage.info --output-directory ${outputDir}`,
      ]);
      expect(runner.calls.every((call) => call.options.cwd === root)).toBe(true);
    });

    it('should fail when lcov capture fails', async () => {
      const runner = new FakeCommandRunner((command) =>
        command.includes('--capture') ? { exitCode: 1, stderr: 'no .gcda files found\n' } : undefined
      );

      await expect(generateReport({ rootPath: root, outputDir, repositoryName: 'demo', runner })).rejects.toThrow(
        'LCOV capture failed: no .gcda files found'
      );
      expect(runner.commandLines()).toHaveLength(2);
    });

    it('should fail when genhtml fails', async () => {
      const runner = new FakeCommandRunner((command) => (command[0] === 'genhtml' ? { exitCode: 2 } : undefined));

      await expect(generateReport({ rootPath: root, outputDir, repositoryName: 'demo', runner })).rejects.toThrow(
        'genhtml failed: exit code 2'
      );
    });

    it('should fail when the output directory cannot be created', async () => {
      writeFileSync(join(root, 'main.c.gcov'), MAIN_GCOV);
      const blocked = join(root, 'blocked');
      writeFileSync(blocked, 'a file, not a directory');

      await expect(
        generateReport({ rootPath: root, outputDir: blocked, repositoryName: 'demo', runner: withoutLcov() })
      ).rejects.toBeInstanceOf(ReportError);
    });
  });
});
