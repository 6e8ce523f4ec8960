import path from 'path';
import { BatchResult, RenameOptions } from '../types/rename.types';
import { emptyBatchResult, recordOutcome } from '../utils/batch-result.util';
import { FileScanner } from '../utils/file-scanner.util';
import { NameCleaner } from '../utils/name-cleaner.util';
import { FileRenamerService } from './file-renamer.service';

/**
 * Renames movies, books and arbitrary files with a plain string-cleaning pass.
 * No parsing, no external data.
 */
export class SimpleRenamerService {
  private readonly scanner: FileScanner;

  constructor(
    extensions: readonly string[] | null,
    private readonly clean: NameCleaner
  ) {
    this.scanner = new FileScanner(extensions);
  }

  renameBatch(options: RenameOptions): BatchResult {
    const result = emptyBatchResult();
    const { baseDir, fileNames } = this.scanner.resolveFileSet(options);

    if (fileNames.length === 0) {
      console.log(`No relevant files found in '${baseDir}'.`);
      return result;
    }

    const renamer = new FileRenamerService(options.dryRun);
    for (const fileName of fileNames) {
      result.scanned++;
      const oldPath = path.join(baseDir, fileName);
      const newPath = path.join(baseDir, this.clean(fileName));
      recordOutcome(result, renamer.renameFile(oldPath, newPath));
    }

    return result;
  }
}
