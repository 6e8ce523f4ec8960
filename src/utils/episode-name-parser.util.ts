import path from 'path';
import { INVALID_FILENAME_CHARS, NAME_SEPARATOR } from '../config/constants';
import { EpisodeRecord, ExtractedEpisode } from '../types/episode.types';
import { PatternRegistry } from '../services/pattern-registry.service';

/**
 * Episode Name Parser Utility
 * Extracts series/season/episode from loose anime filenames and builds
 * the standard "Series - S01 - E05 - Title.ext" name back from a record
 */
export class EpisodeNameParser {
  constructor(private readonly registry: PatternRegistry = new PatternRegistry()) {}

  extract(fileName: string): ExtractedEpisode {
    const extension = path.extname(fileName);

    for (const rule of this.registry.rules()) {
      const match = rule.regex.exec(fileName);
      if (!match) {
        continue;
      }

      const captures = match.groups ?? {};
      const seriesName = captures[rule.groups.seriesName]?.trim() || undefined;

      let season: number | undefined;
      if (rule.hasSeasonCapture) {
        season = this.toNumber(captures[rule.groups.seasonNum]);
      } else {
        season = rule.seasonDefault;
      }

      const episodeNumber = this.toNumber(captures[rule.groups.episodeNum]);

      return { originalFileName: fileName, extension, seriesName, season, episodeNumber };
    }

    return { originalFileName: fileName, extension };
  }

  buildFileName(record: EpisodeRecord): string {
    // A --title such as "Fate/Zero" must not turn into a subdirectory
    const parts = [sanitizeTitle(record.seriesName)];

    if (record.season !== undefined && record.season !== 0) {
      parts.push(`S${this.pad(record.season)}`);
    }

    parts.push(`E${this.pad(record.episodeNumber)}`);

    if (record.episodeTitle) {
      const title = sanitizeTitle(record.episodeTitle);
      if (title) {
        parts.push(title);
      }
    }

    return parts.join(NAME_SEPARATOR) + record.extension;
  }

  private toNumber(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) return undefined;
    return parseInt(trimmed, 10);
  }

  private pad(value: number): string {
    return value.toString().padStart(2, '0');
  }
}

/**
 * Drop characters that are not allowed in filenames
 */
export function sanitizeTitle(title: string): string {
  return title.trim().replace(INVALID_FILENAME_CHARS, '').trim();
}

/**
 * Filesystem-safe version of a series title, used for cache file names
 */
export function sanitizeForFileName(name: string): string {
  return name.replace(INVALID_FILENAME_CHARS, '_').replace(/\s+/g, ' ').trim();
}
