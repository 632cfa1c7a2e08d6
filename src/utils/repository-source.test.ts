import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import { simpleGit } from 'simple-git';
import { findUp } from 'find-up';
import {
  cleanupRepositorySource,
  isRemoteRepository,
  repositoryNameFromUrl,
  resolveRepositorySource,
} from './repository-source.js';
import { RepositoryReadError } from '../types/errors.js';

vi.mock('simple-git', () => ({
  simpleGit: vi.fn(),
}));
vi.mock('find-up');
vi.mock('./logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  describeError: (err: unknown) => (err instanceof Error ? err.message : String(err)),
}));

describe('repository-source', () => {
  let work: string;

  beforeEach(() => {
    vi.clearAllMocks();
    work = mkdtempSync(join(tmpdir(), 'gcovsmith-source-'));
  });

  afterEach(() => {
    rmSync(work, { recursive: true, force: true });
  });

  describe('isRemoteRepository', () => {
    it('should recognise git URLs', () => {
      expect(isRemoteRepository('https://github.com/example/widgets.git')).toBe(true);
      expect(isRemoteRepository('git@github.com:example/widgets.git')).toBe(true);
      expect(isRemoteRepository('ssh://git@example.com/widgets.git')).toBe(true);
    });

    it('should treat paths as local', () => {
      expect(isRemoteRepository('./widgets')).toBe(false);
      expect(isRemoteRepository('/srv/checkouts/widgets')).toBe(false);
    });
  });

  describe('repositoryNameFromUrl', () => {
    it('should take the last path segment without .git', () => {
      expect(repositoryNameFromUrl('https://github.com/example/widgets.git')).toBe('widgets');
      expect(repositoryNameFromUrl('git@github.com:example/gadgets.git')).toBe('gadgets');
      expect(repositoryNameFromUrl('https://github.com/example/tools')).toBe('tools');
    });
  });

  describe('resolveRepositorySource', () => {
    it('should clone a URL into a temporary directory named after the repository', async () => {
      const clone = vi.fn(async (_url: string, target: string) => {
        mkdirSync(target, { recursive: true });
        writeFileSync(join(target, 'main.c'), 'int main(void) { return 0; }\n');
      });
      vi.mocked(simpleGit).mockReturnValue({ clone } as never);

      const source = await resolveRepositorySource('https://github.com/example/widgets.git');

      expect(source.name).toBe('widgets');
      expect(source.url).toBe('https://github.com/example/widgets.git');
      expect(basename(source.rootPath)).toBe('widgets');
      expect(source.temporaryDirectory).toBe(dirname(source.rootPath));
      expect(clone).toHaveBeenCalledWith('https://github.com/example/widgets.git', source.rootPath);

      cleanupRepositorySource(source);
      expect(source.temporaryDirectory && existsSync(source.temporaryDirectory)).toBe(false);
    });

    it('should remove the temporary directory when cloning fails', async () => {
      let target = '';
      const clone = vi.fn(async (_url: string, dir: string) => {
        target = dir;
        throw new Error('repository not found');
      });
      vi.mocked(simpleGit).mockReturnValue({ clone } as never);

      const failure = resolveRepositorySource('https://github.com/example/missing.git');

      await expect(failure).rejects.toBeInstanceOf(RepositoryReadError);
      await expect(failure).rejects.toThrow(
        'Failed to clone repository https://github.com/example/missing.git: repository not found'
      );
      expect(existsSync(dirname(target))).toBe(false);
    });

    it('should use a local directory in place and name it after its origin remote', async () => {
      const checkout = join(work, 'checkout');
      mkdirSync(join(checkout, 'src'), { recursive: true });
      vi.mocked(findUp).mockResolvedValue(join(checkout, '.git'));
      vi.mocked(simpleGit).mockReturnValue({
        getRemotes: vi.fn().mockResolvedValue([
          { name: 'origin', refs: { fetch: 'git@github.com:example/widgets.git', push: '' } },
        ]),
      } as never);

      const source = await resolveRepositorySource(join(checkout, 'src'));

      expect(source).toEqual({ rootPath: join(checkout, 'src'), name: 'widgets' });
      expect(findUp).toHaveBeenCalledWith('.git', { cwd: join(checkout, 'src'), type: 'directory' });
      expect(simpleGit).toHaveBeenCalledWith(checkout);
    });

    it('should name a local directory outside git after itself', async () => {
      const plain = join(work, 'plain-project');
      mkdirSync(plain);
      vi.mocked(findUp).mockResolvedValue(undefined);

      const source = await resolveRepositorySource(plain);

      expect(source).toEqual({ rootPath: plain, name: 'plain-project' });
      expect(simpleGit).not.toHaveBeenCalled();
    });

    it('should reject a missing local directory', async () => {
      await expect(resolveRepositorySource(join(work, 'nope'))).rejects.toBeInstanceOf(RepositoryReadError);
    });
  });

  describe('cleanupRepositorySource', () => {
    it('should leave local checkouts alone', () => {
      cleanupRepositorySource({ rootPath: work, name: 'w' });

      expect(existsSync(work)).toBe(true);
    });
  });
});
