/**
 * Reversible application of a modification plan to a working tree.
 *
 * Every filesystem change is recorded as a {@link ModificationRecord}; the
 * ordered record list is all that is needed to put the tree back.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'fs';
import { dirname, isAbsolute, join, relative, resolve } from 'path';
import type { ModificationPlan, ModificationRecord, RollbackFailure } from '../types/modification.js';
import { ModificationError } from '../types/errors.js';
import { debug, describeError, info, warn } from '../utils/logger.js';

export const MAKEFILE_SEPARATOR = '\n\n# Gcov Coverage Flags\n';
export const CMAKE_SEPARATOR = '\n\n# Gcov Coverage Configuration\n';

/**
 * First unused backup name for `filePath`: `<file>.bak`, then `<file>.bak.1`, ...
 */
export function backupPathFor(filePath: string): string {
  let candidate = `${filePath}.bak`;
  for (let suffix = 1; existsSync(candidate); suffix++) {
    candidate = `${filePath}.bak.${suffix}`;
  }
  return candidate;
}

function resolveInside(rootPath: string, relativePath: string): string {
  const root = resolve(rootPath);
  const target = resolve(root, relativePath);
  const fromRoot = relative(root, target);
  if (fromRoot === '' || fromRoot.startsWith('..') || isAbsolute(fromRoot)) {
    throw new ModificationError(`Refusing to write outside the repository: ${relativePath}`);
  }
  return target;
}

/**
 * Move an existing file aside and write `content(original)` under its name.
 */
function patchExisting(
  filePath: string,
  content: (original: Buffer) => Buffer,
  records: ModificationRecord[]
): void {
  const backupPath = backupPathFor(filePath);
  renameSync(filePath, backupPath);
  records.push({ kind: 'backup', originalPath: filePath, backupPath });
  writeFileSync(filePath, content(readFileSync(backupPath)));
}

function createFile(filePath: string, content: string, records: ModificationRecord[]): void {
  const createdDirectory = mkdirSync(dirname(filePath), { recursive: true });
  if (createdDirectory) {
    records.push({ kind: 'directory', path: createdDirectory });
  }
  writeFileSync(filePath, content, 'utf-8');
  records.push({ kind: 'created', path: filePath });
}

function applyBuildFileChanges(
  filePath: string,
  changes: readonly string[],
  separator: string,
  records: ModificationRecord[]
): void {
  const addition = changes.join('\n');

  if (existsSync(filePath)) {
    patchExisting(
      filePath,
      (original) => Buffer.concat([original, Buffer.from(separator + addition, 'utf-8')]),
      records
    );
    info(`Patched ${filePath} (${changes.length} line(s) appended)`);
  } else {
    createFile(filePath, addition, records);
    info(`Created ${filePath}`);
  }
}

/**
 * Apply `plan` below `rootPath`: Makefile changes, then CMake changes, then
 * missing files. Returns the records in the order the changes were made.
 *
 * If any step fails, the changes already made are rolled back and a
 * {@link ModificationError} is thrown.
 */
export function applyModifications(rootPath: string, plan: ModificationPlan): ModificationRecord[] {
  const records: ModificationRecord[] = [];

  try {
    if (plan.makefileChanges.length > 0) {
      applyBuildFileChanges(join(rootPath, 'Makefile'), plan.makefileChanges, MAKEFILE_SEPARATOR, records);
    }

    if (plan.cmakeChanges.length > 0) {
      applyBuildFileChanges(join(rootPath, 'CMakeLists.txt'), plan.cmakeChanges, CMAKE_SEPARATOR, records);
    }

    for (const missingFile of plan.missingFiles) {
      const filePath = resolveInside(rootPath, missingFile.path);
      if (existsSync(filePath)) {
        patchExisting(filePath, () => Buffer.from(missingFile.content, 'utf-8'), records);
        info(`Replaced ${missingFile.path}`);
      } else {
        createFile(filePath, missingFile.content, records);
        info(`Created ${missingFile.path}`);
      }
    }
  } catch (err) {
    warn(`Applying modifications failed, reverting ${records.length} change(s): ${describeError(err)}`);
    rollbackModifications(records);
    throw err instanceof ModificationError
      ? err
      : new ModificationError(`Failed to apply modifications: ${describeError(err)}`);
  }

  return records;
}

function revertRecord(record: ModificationRecord): void {
  switch (record.kind) {
    case 'backup':
      if (!existsSync(record.backupPath)) {
        throw new ModificationError(`Backup ${record.backupPath} is missing`);
      }
      if (existsSync(record.originalPath)) {
        unlinkSync(record.originalPath);
      }
      renameSync(record.backupPath, record.originalPath);
      debug(`Restored ${record.originalPath}`);
      break;
    case 'created':
      if (existsSync(record.path)) {
        unlinkSync(record.path);
      }
      debug(`Removed ${record.path}`);
      break;
    case 'directory':
      rmSync(record.path, { recursive: true, force: true });
      debug(`Removed directory ${record.path}`);
      break;
  }
}

/**
 * Undo `records`, newest first. A record that cannot be reverted is logged
 * and skipped; the rest are still processed. Returns the failures.
 */
export function rollbackModifications(records: readonly ModificationRecord[]): RollbackFailure[] {
  const failures: RollbackFailure[] = [];

  for (const record of [...records].reverse()) {
    try {
      revertRecord(record);
    } catch (err) {
      const message = describeError(err);
      warn(`Error rolling back ${record.kind === 'backup' ? record.originalPath : record.path}: ${message}`);
      failures.push({ record, error: message });
    }
  }

  return failures;
}

/**
 * An applied plan that must be rolled back exactly once.
 */
export class ModificationTransaction {
  private rolledBack = false;

  private constructor(readonly records: readonly ModificationRecord[]) {}

  static apply(rootPath: string, plan: ModificationPlan): ModificationTransaction {
    return new ModificationTransaction(Object.freeze(applyModifications(rootPath, plan)));
  }

  get isRolledBack(): boolean {
    return this.rolledBack;
  }

  rollback(): RollbackFailure[] {
    if (this.rolledBack) {
      throw new ModificationError('Modifications have already been rolled back');
    }
    this.rolledBack = true;
    return rollbackModifications(this.records);
  }
}
