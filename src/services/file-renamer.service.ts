import fs from 'fs';
import path from 'path';
import { RenameOutcome } from '../types/rename.types';
import { errorMessage } from '../utils/errors.util';

export class FileRenamerService {
  constructor(private readonly dryRun: boolean = false) {}

  /**
   * Rename one file. Never throws: every failure becomes a 'failed' outcome
   * so the rest of the batch keeps going.
   */
  renameFile(oldPath: string, newPath: string): RenameOutcome {
    const originalFileName = path.basename(oldPath);

    if (path.resolve(oldPath) === path.resolve(newPath)) {
      console.log(`  Skipping: ${originalFileName} (already named correctly)`);
      return { status: 'unchanged', originalFileName, oldPath, newPath };
    }

    const newFileName = path.basename(newPath);

    try {
      if (this.isOtherFile(oldPath, newPath)) {
        const error = `File already exists: ${newPath}`;
        console.error(`  Error renaming ${originalFileName}: ${error}`);
        return { status: 'failed', originalFileName, oldPath, newPath, error };
      }

      if (this.dryRun) {
        console.log(`  Would rename: ${originalFileName} -> ${newFileName}`);
        return { status: 'planned', originalFileName, oldPath, newPath };
      }

      fs.renameSync(oldPath, newPath);
      console.log(`  Renamed: ${originalFileName} -> ${newFileName}`);

      return { status: 'renamed', originalFileName, oldPath, newPath };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`  Error renaming ${originalFileName}: ${message}`);
      return { status: 'failed', originalFileName, oldPath, newPath, error: message };
    }
  }

  skipFile(oldPath: string, reason: string): RenameOutcome {
    const originalFileName = path.basename(oldPath);
    console.log(`  Skipping: ${originalFileName} (${reason})`);
    return { status: 'skipped', originalFileName, oldPath, reason };
  }

  /**
   * True when newPath is taken by a file other than oldPath itself.
   * A case-only rename on a case-insensitive filesystem resolves to the same inode.
   */
  private isOtherFile(oldPath: string, newPath: string): boolean {
    const target = this.getFileStats(newPath);
    if (!target) {
      return false;
    }
    const source = this.getFileStats(oldPath);
    return !source || source.ino !== target.ino || source.dev !== target.dev;
  }

  getFileStats(filePath: string): fs.Stats | null {
    try {
      return fs.statSync(filePath);
    } catch {
      return null;
    }
  }
}
