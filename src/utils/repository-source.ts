/**
 * Where the repository to analyze comes from: a local checkout or a fresh
 * clone in a temporary directory
 */

import { existsSync, mkdtempSync, rmSync, statSync } from 'fs';
import { tmpdir } from 'os';
import { basename, dirname, join, resolve } from 'path';
import { simpleGit } from 'simple-git';
import gitUrlParse from 'git-url-parse';
import { findUp } from 'find-up';
import { RepositoryReadError } from '../types/errors.js';
import { debug, describeError, info, success, warn } from './logger.js';

export interface RepositorySource {
  /** Directory the pipeline works in */
  rootPath: string;
  /** Display name used in the report */
  name: string;
  /** Remote the repository was cloned from */
  url?: string;
  /** Temporary directory holding the clone; removed by {@link cleanupRepositorySource} */
  temporaryDirectory?: string;
}

const REMOTE_PATTERN = /^(?:https?|ssh|git|file):\/\/|^[\w.-]+@[\w.-]+:/;

export function isRemoteRepository(input: string): boolean {
  return REMOTE_PATTERN.test(input);
}

/**
 * Repository name from a git URL, without a trailing `.git`.
 */
export function repositoryNameFromUrl(url: string): string {
  try {
    const parsed = gitUrlParse(url);
    if (parsed.name) {
      return parsed.name.replace(/\.git$/, '');
    }
  } catch (err) {
    debug(`Could not parse ${url}: ${describeError(err)}`);
  }
  return basename(url.replace(/\/+$/, '')).replace(/\.git$/, '') || 'repository';
}

async function nameFromOrigin(gitRoot: string): Promise<string | null> {
  try {
    const remotes = await simpleGit(gitRoot).getRemotes(true);
    const origin = remotes.find((remote) => remote.name === 'origin') ?? remotes[0];
    const remoteUrl = origin?.refs.fetch || origin?.refs.push;
    return remoteUrl ? repositoryNameFromUrl(remoteUrl) : null;
  } catch (err) {
    debug(`Could not read git remotes in ${gitRoot}: ${describeError(err)}`);
    return null;
  }
}

async function cloneRepository(url: string): Promise<RepositorySource> {
  const name = repositoryNameFromUrl(url);
  const temporaryDirectory = mkdtempSync(join(tmpdir(), 'gcovsmith-'));
  const rootPath = join(temporaryDirectory, name);

  info(`Cloning repository: ${url}`);
  try {
    await simpleGit().clone(url, rootPath);
  } catch (err) {
    rmSync(temporaryDirectory, { recursive: true, force: true });
    throw new RepositoryReadError(rootPath, `Failed to clone repository ${url}: ${describeError(err)}`);
  }

  success(`Repository cloned to: ${rootPath}`);
  return { rootPath, name, url, temporaryDirectory };
}

async function openLocalRepository(input: string): Promise<RepositorySource> {
  const rootPath = resolve(input);
  if (!existsSync(rootPath) || !statSync(rootPath).isDirectory()) {
    throw new RepositoryReadError(rootPath, `Repository directory not found: ${rootPath}`);
  }

  const gitDir = await findUp('.git', { cwd: rootPath, type: 'directory' });
  if (!gitDir) {
    debug(`${rootPath} is not inside a git repository`);
    return { rootPath, name: basename(rootPath) };
  }

  const gitRoot = dirname(gitDir);
  debug(`Found git repository at ${gitRoot}`);
  const name = (await nameFromOrigin(gitRoot)) ?? basename(gitRoot);
  return { rootPath, name };
}

/**
 * Clone `input` when it is a git URL, otherwise use it as a local directory.
 */
export async function resolveRepositorySource(input: string): Promise<RepositorySource> {
  return isRemoteRepository(input) ? cloneRepository(input) : openLocalRepository(input);
}

/**
 * Remove the temporary clone, if there is one. Failures are logged.
 */
export function cleanupRepositorySource(source: RepositorySource): void {
  if (!source.temporaryDirectory) {
    return;
  }

  try {
    rmSync(source.temporaryDirectory, { recursive: true, force: true });
    debug(`Removed temporary directory: ${source.temporaryDirectory}`);
  } catch (err) {
    warn(`Could not remove temporary directory ${source.temporaryDirectory}: ${describeError(err)}`);
  }
}
