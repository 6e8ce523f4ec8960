import { BOOK_EXTENSIONS, MOVIE_EXTENSIONS } from '../config/constants';
import { SimpleRenamerService } from '../services/simple-renamer.service';
import { RenameOptions } from '../types/rename.types';
import { ITask, TaskResult } from '../types/task.types';
import { MovieNameParser } from '../utils/movie-name-parser.util';
import { NameCleaner, cleanBookName, cleanStandardName } from '../utils/name-cleaner.util';

export type MediaKind = 'movie' | 'book' | 'std';

const movieParser = new MovieNameParser();

const HANDLERS: Record<MediaKind, { label: string; extensions: readonly string[] | null; clean: NameCleaner }> = {
  movie: { label: 'movie', extensions: MOVIE_EXTENSIONS, clean: (fileName) => movieParser.standardize(fileName) },
  book: { label: 'book', extensions: BOOK_EXTENSIONS, clean: cleanBookName },
  std: { label: 'standard', extensions: null, clean: cleanStandardName },
};

/**
 * Movie, book and standard renaming: list the files and clean each name
 */
export class MediaRenameTask implements ITask {
  readonly name: string;

  constructor(
    private readonly kind: MediaKind,
    private readonly options: RenameOptions
  ) {
    this.name = `${kind.charAt(0).toUpperCase()}${kind.slice(1)}RenameTask`;
  }

  async execute(): Promise<TaskResult> {
    const handler = HANDLERS[this.kind];
    console.log(`Processing ${handler.label} files...`);
    if (this.options.dryRun) {
      console.log('Dry run: no files will be renamed.');
    }

    const data = new SimpleRenamerService(handler.extensions, handler.clean).renameBatch(this.options);

    return {
      taskName: this.name,
      success: true,
      message: `${handler.label.charAt(0).toUpperCase()}${handler.label.slice(1)} renaming finished.`,
      data,
    };
  }
}
