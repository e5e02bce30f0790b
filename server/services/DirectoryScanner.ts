/**
 * Directory Scanner
 * Full enumeration of a watched directory, used for lazy view loading
 */

import fs from 'fs';
import path from 'path';
import type { ScannedFile } from '../types/index.js';
import { matchesPatterns, shouldIgnore } from '../utils/paths.js';

export interface DirectoryScanner {
  /** Matching, non-empty files ordered by modification time, oldest first */
  scan(directory: string, patterns: readonly string[], recursive: boolean): Promise<ScannedFile[]>;
}

export class FsDirectoryScanner implements DirectoryScanner {
  async scan(directory: string, patterns: readonly string[], recursive: boolean): Promise<ScannedFile[]> {
    const files: ScannedFile[] = [];

    const scan = async (currentPath: string): Promise<void> => {
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(currentPath, { withFileTypes: true });
      } catch (err) {
        // A directory that does not exist yet simply has no assets
        if (isNotFound(err)) return;
        throw err;
      }

      for (const entry of entries) {
        if (shouldIgnore(entry.name)) continue;
        const entryPath = path.join(currentPath, entry.name);

        if (entry.isDirectory()) {
          if (recursive) await scan(entryPath);
          continue;
        }
        if (!entry.isFile() || !matchesPatterns(entryPath, patterns)) continue;

        try {
          const stat = await fs.promises.stat(entryPath);
          if (stat.size === 0) continue;
          files.push({ path: entryPath, modifiedAt: Math.floor(stat.mtimeMs), size: stat.size });
        } catch (err) {
          // Deleted between readdir and stat
          if (!isNotFound(err)) throw err;
        }
      }
    };

    await scan(path.resolve(directory));
    return files.sort((a, b) => a.modifiedAt - b.modifiedAt || a.path.localeCompare(b.path));
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
