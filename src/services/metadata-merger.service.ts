import { ExtractedEpisode, MergeOptions, MergeResult } from '../types/episode.types';
import { EpisodeTitleMap } from '../models/episode-title-map';
import { sanitizeTitle } from '../utils/episode-name-parser.util';

/**
 * Season from the filename wins over the batch default; a default of 0 means "none"
 */
export function resolveSeason(extracted: number | undefined, defaultSeason?: number): number | undefined {
  if (extracted !== undefined) {
    return extracted;
  }
  return defaultSeason ? defaultSeason : undefined;
}

/**
 * Combine what the filename says with the batch options and external titles.
 * Pure: no I/O, no logging.
 */
export function mergeEpisodeMetadata(
  extracted: ExtractedEpisode,
  options: MergeOptions = {},
  titles?: EpisodeTitleMap | null
): MergeResult {
  const seriesName = options.seriesOverride?.trim() || extracted.seriesName;
  const { episodeNumber } = extracted;

  if (episodeNumber === undefined) {
    return { ok: false, reason: 'episode number not found' };
  }
  if (!seriesName || !sanitizeTitle(seriesName)) {
    return { ok: false, reason: 'series name not found' };
  }

  const season = resolveSeason(extracted.season, options.defaultSeason);
  const episodeTitle = titles ? titles.get(seriesName, season, episodeNumber) : undefined;

  return {
    ok: true,
    record: {
      originalFileName: extracted.originalFileName,
      extension: extracted.extension,
      seriesName,
      season,
      episodeNumber,
      episodeTitle,
    },
  };
}
