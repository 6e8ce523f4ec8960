import axios from 'axios';
import { z } from 'zod';
import { compareTwoStrings } from 'string-similarity';
import { getConfig } from '../config/env.config';
import { EpisodeTitleRow } from '../types/episode.types';
import { EpisodeMetadataProvider, HttpGet } from '../types/metadata.types';
import { errorMessage } from '../utils/errors.util';

const searchResponseSchema = z.object({
  data: z.array(
    z.object({
      mal_id: z.number(),
      title: z.string(),
      title_english: z.string().nullish(),
      title_synonyms: z.array(z.string()).nullish(),
    })
  ),
});

const episodesResponseSchema = z.object({
  data: z.array(
    z.object({
      mal_id: z.number(),
      title: z.string().nullish(),
    })
  ),
  pagination: z
    .object({
      has_next_page: z.boolean(),
    })
    .optional(),
});

type AnimeSearchResult = z.infer<typeof searchResponseSchema>['data'][number];

export interface JikanServiceOptions {
  baseUrl?: string;
  rateLimitMs?: number;
  http?: HttpGet;
}

/**
 * Episode titles from Jikan (the unofficial MyAnimeList API)
 */
export class JikanService implements EpisodeMetadataProvider {
  readonly name = 'jikan';

  private static readonly MAX_PAGES = 50;
  private static readonly MIN_SIMILARITY = 0.3;

  private readonly baseUrl: string;
  private readonly rateLimitMs: number;
  private readonly http: HttpGet;

  constructor(options: JikanServiceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? getConfig().jikanBaseUrl).replace(/\/+$/, '');
    this.rateLimitMs = options.rateLimitMs ?? getConfig().jikanRateLimitMs;
    this.http =
      options.http ??
      (async (url, params) => {
        const response = await axios.get<unknown>(url, { params, timeout: getConfig().httpTimeoutMs });
        return response.data;
      });
  }

  async fetchEpisodes(seriesTitle: string, season?: number): Promise<EpisodeTitleRow[] | null> {
    // Later seasons are separate entries on MyAnimeList
    const query = season && season > 1 ? `${seriesTitle} Season ${season}` : seriesTitle;

    try {
      const animeId = await this.searchAnimeId(query);
      if (animeId === null) {
        return null;
      }

      const episodes = await this.fetchAnimeEpisodes(animeId);
      if (episodes.length === 0) {
        console.log(`  No episodes found for anime ID ${animeId}.`);
        return null;
      }

      return episodes.map((episode) => ({
        seriesTitle,
        season: season && season > 1 ? season : undefined,
        episode: episode.number,
        title: episode.title,
      }));
    } catch (error) {
      console.error(`  Jikan API error: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Search by title and return the MAL ID of the closest result
   */
  async searchAnimeId(query: string): Promise<number | null> {
    console.log(`  Searching Jikan for "${query}"...`);
    const data = searchResponseSchema.parse(await this.get('/anime', { q: query, limit: 5 }));

    const best = this.findBestMatch(data.data, query);
    if (!best) {
      console.log(`  No matching anime found for "${query}".`);
      return null;
    }

    console.log(`  Found: ${best.title} (MAL ID ${best.mal_id})`);
    return best.mal_id;
  }

  async fetchAnimeEpisodes(animeId: number): Promise<Array<{ number: number; title: string }>> {
    const episodes: Array<{ number: number; title: string }> = [];

    for (let page = 1; page <= JikanService.MAX_PAGES; page++) {
      const data = episodesResponseSchema.parse(await this.get(`/anime/${animeId}/episodes`, { page }));

      for (const episode of data.data) {
        const title = episode.title?.trim();
        if (title) {
          episodes.push({ number: episode.mal_id, title });
        }
      }

      if (!data.pagination?.has_next_page) {
        break;
      }
    }

    console.log(`  Fetched ${episodes.length} episode titles for anime ID ${animeId}.`);
    return episodes;
  }

  private findBestMatch(results: AnimeSearchResult[], query: string): AnimeSearchResult | null {
    let best: AnimeSearchResult | null = null;
    let bestScore = 0;

    for (const result of results) {
      const candidates = [result.title, result.title_english ?? '', ...(result.title_synonyms ?? [])];
      const score = Math.max(
        ...candidates.filter(Boolean).map((name) => compareTwoStrings(name.toLowerCase(), query.toLowerCase()))
      );
      if (score > bestScore) {
        best = result;
        bestScore = score;
      }
    }

    return bestScore >= JikanService.MIN_SIMILARITY ? best : null;
  }

  private async get(pathName: string, params: Record<string, string | number>): Promise<unknown> {
    // Jikan allows a few requests per second
    await this.sleep(this.rateLimitMs);
    return this.http(`${this.baseUrl}${pathName}`, params);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
