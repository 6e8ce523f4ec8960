/**
 * Pattern rule as it appears in the built-in list or a JSON config file
 */
export interface RawPatternRule {
  pattern: string;
  groups?: {
    series_name?: string;
    season_num?: string;
    episode_num?: string;
  };
  season_default?: number | null;
}

/**
 * Validated pattern rule, ready to match
 */
export interface PatternRule {
  source: string;
  regex: RegExp;
  groups: {
    seriesName: string;
    seasonNum: string;
    episodeNum: string;
  };
  hasSeasonCapture: boolean;
  seasonDefault?: number;
}

/**
 * What the filename alone tells us. Any field but the extension may be missing.
 */
export interface ExtractedEpisode {
  originalFileName: string;
  extension: string;
  seriesName?: string;
  season?: number;
  episodeNumber?: number;
}

export interface EpisodeRecord {
  originalFileName: string;
  extension: string;
  seriesName: string;
  season?: number;
  episodeNumber: number;
  episodeTitle?: string;
}

export interface EpisodeTitleRow {
  seriesTitle: string;
  season?: number;
  episode: number;
  title: string;
}

export interface MergeOptions {
  seriesOverride?: string;
  defaultSeason?: number;
}

export type MergeResult =
  | { ok: true; record: EpisodeRecord }
  | { ok: false; reason: string };
