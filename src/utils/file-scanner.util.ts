import fs from 'fs';
import path from 'path';
import { FileSet, RenameOptions } from '../types/rename.types';
import { ListingError, errorCode, errorMessage } from './errors.util';

export class FileScanner {
  /**
   * @param extensions lowercase extensions with the dot; null accepts every file
   */
  constructor(private readonly extensions: readonly string[] | null) {}

  /**
   * Files directly inside the directory whose extension is one we handle,
   * sorted by name. Listing problems abort the batch as ListingError.
   */
  scanDirectory(directory: string): string[] {
    let entries: fs.Dirent[];
    try {
      const stats = fs.statSync(directory);
      if (!stats.isDirectory()) {
        throw new ListingError(`Not a directory: ${directory}`, directory, 'ENOTDIR');
      }
      entries = fs.readdirSync(directory, { withFileTypes: true });
    } catch (error) {
      if (error instanceof ListingError) {
        throw error;
      }
      const code = errorCode(error);
      throw new ListingError(this.describe(code, directory, error), directory, code);
    }

    return entries
      .filter((entry) => entry.isFile() && this.isRelevant(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  }

  /**
   * Resolve --file / --directory into the directory to work in and the names to process
   */
  resolveFileSet(options: Pick<RenameOptions, 'directory' | 'file'>): FileSet {
    if (options.file) {
      return {
        baseDir: path.dirname(options.file),
        fileNames: [path.basename(options.file)],
      };
    }
    if (options.directory) {
      return { baseDir: options.directory, fileNames: this.scanDirectory(options.directory) };
    }
    throw new ListingError('No directory or file given', '');
  }

  isRelevant(fileName: string): boolean {
    if (this.extensions === null) {
      return true;
    }
    const ext = path.extname(fileName).toLowerCase();
    return this.extensions.some((allowed) => allowed.toLowerCase() === ext);
  }

  private describe(code: string | undefined, directory: string, error: unknown): string {
    switch (code) {
      case 'ENOENT':
        return `Directory does not exist: ${directory}`;
      case 'ENOTDIR':
        return `Not a directory: ${directory}`;
      case 'EACCES':
      case 'EPERM':
        return `Permission denied: ${directory}`;
      default:
        return `Error accessing directory ${directory}: ${errorMessage(error)}`;
    }
  }
}
