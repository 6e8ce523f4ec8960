import { EpisodeTitleRow } from './episode.types';

/**
 * Source of episode titles for one series.
 * Resolves to null on any failure; callers carry on without titles.
 */
export interface EpisodeMetadataProvider {
  readonly name: string;
  fetchEpisodes(seriesTitle: string, season?: number): Promise<EpisodeTitleRow[] | null>;
}

export type HttpGet = (url: string, params: Record<string, string | number>) => Promise<unknown>;

export type TextCompleter = (prompt: string) => Promise<string | null>;
