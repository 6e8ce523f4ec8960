import path from 'path';
import { INVALID_FILENAME_CHARS, MOVIE_NAME_PATTERNS } from '../config/constants';

export class MovieNameParser {
  cleanMovieName(fileName: string): { cleanName: string; year?: number } {
    let name = path.basename(fileName, path.extname(fileName));

    // A year in parentheses wins over a bare number ("Blade Runner 2049 (2017)")
    const yearMatch = name.match(/\((19\d{2}|20\d{2})\)/) ?? name.match(MOVIE_NAME_PATTERNS.YEAR);
    const year = yearMatch ? parseInt(yearMatch[1], 10) : undefined;

    // Remove a trailing release group tag (-SOFCJ, -YIFY) but not "Spider-Man"
    name = name.replace(/-[A-Z0-9]{2,}$/, ' ');

    name = name.replace(MOVIE_NAME_PATTERNS.QUALITY, ' ');
    name = name.replace(MOVIE_NAME_PATTERNS.CODEC, ' ');
    name = name.replace(MOVIE_NAME_PATTERNS.AUDIO, ' ');
    name = name.replace(MOVIE_NAME_PATTERNS.LANGUAGE, ' ');

    // Everything after the year is release noise
    if (year) {
      const yearIndex = name.indexOf(year.toString());
      if (yearIndex > 0) {
        name = name.substring(0, yearIndex);
      }
    }

    name = name.replace(MOVIE_NAME_PATTERNS.BRACKETS, ' ');
    name = name.replace(MOVIE_NAME_PATTERNS.DOTS_UNDERSCORES, ' ');
    name = name.replace(INVALID_FILENAME_CHARS, ' ');
    name = name.replace(MOVIE_NAME_PATTERNS.MULTI_SPACES, ' ');
    name = name.trim();

    return { cleanName: name, year };
  }

  buildFileName(title: string, extension: string, year?: number): string {
    return year ? `${title} (${year})${extension}` : `${title}${extension}`;
  }

  /**
   * "Title (Year).ext" for a raw movie filename, or the name unchanged when nothing is left
   */
  standardize(fileName: string): string {
    const { cleanName, year } = this.cleanMovieName(fileName);
    if (!cleanName) {
      return fileName;
    }
    return this.buildFileName(cleanName, path.extname(fileName), year);
  }
}
