import { readdirSync } from 'fs';
import { join } from 'path';
import { debug, describeError } from './logger.js';

/**
 * Regular files below `rootPath` whose name passes `accept`, in sorted
 * traversal order. `.git` is not entered; unreadable directories are skipped.
 */
export function findFiles(rootPath: string, accept: (fileName: string) => boolean): string[] {
  const found: string[] = [];

  const walk = (dir: string): void => {
    let entries;
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      debug(`Skipping unreadable directory ${dir}: ${describeError(err)}`);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== '.git') {
          walk(fullPath);
        }
      } else if (entry.isFile() && accept(entry.name)) {
        found.push(fullPath);
      }
    }
  };

  walk(rootPath);
  return found;
}
