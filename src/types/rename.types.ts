export type RenameStatus = 'renamed' | 'unchanged' | 'planned' | 'skipped' | 'failed';

export interface RenameOutcome {
  status: RenameStatus;
  originalFileName: string;
  oldPath: string;
  newPath?: string;
  reason?: string;
  error?: string;
}

export interface BatchResult {
  scanned: number;
  renamed: number;
  unchanged: number;
  planned: number;
  skipped: number;
  failed: number;
  aborted: boolean;
  outcomes: RenameOutcome[];
}

/**
 * Resolved command-line options for one handler run
 */
export interface RenameOptions {
  directory?: string;
  file?: string;
  dryRun: boolean;
}

export interface AnimeRenameOptions extends RenameOptions {
  season: number;
  online: boolean;
  title?: string;
  configPath?: string;
  refresh: boolean;
  assumeYes: boolean;
}

/**
 * Source file set for a batch: the directory the files live in and their basenames
 */
export interface FileSet {
  baseDir: string;
  fileNames: string[];
}

export type ConfirmPrompt = (message: string) => Promise<boolean>;
