import fs from 'fs';
import path from 'path';
import { EPISODE_CACHE_SUFFIX } from '../config/constants';
import { EnvConfig } from '../config/env.config';
import { EpisodeTitleMap } from '../models/episode-title-map';
import { EpisodeMetadataProvider } from '../types/metadata.types';
import { formatEpisodeTitleCsv, parseEpisodeTitleCsv } from '../utils/episode-csv.util';
import { errorMessage } from '../utils/errors.util';
import { sanitizeForFileName } from '../utils/episode-name-parser.util';
import { AIEpisodeService } from './ai-episode.service';
import { JikanService } from './jikan.service';

export interface LoadTitlesOptions {
  seriesTitle: string;
  season?: number;
  baseDir: string;
  online: boolean;
  refresh?: boolean;
  writeCache?: boolean;
}

export function createMetadataProvider(config: Pick<EnvConfig, 'metadataProvider'>): EpisodeMetadataProvider {
  return config.metadataProvider === 'openai' ? new AIEpisodeService() : new JikanService();
}

/**
 * Loads external episode titles for a batch: from the CSV cache beside the files,
 * or from the provider when running online. Never throws.
 */
export class EpisodeMetadataService {
  constructor(private readonly provider: EpisodeMetadataProvider | null) {}

  cachePath(baseDir: string, seriesTitle: string): string {
    return path.join(baseDir, `${sanitizeForFileName(seriesTitle)}${EPISODE_CACHE_SUFFIX}`);
  }

  async loadTitles(options: LoadTitlesOptions): Promise<EpisodeTitleMap | null> {
    const { seriesTitle, season, baseDir, online, refresh = false, writeCache = true } = options;
    const csvPath = this.cachePath(baseDir, seriesTitle);

    if (!(online && refresh) && fs.existsSync(csvPath)) {
      const cached = this.readCache(csvPath, seriesTitle);
      if (cached) {
        return cached;
      }
    }

    if (!online) {
      return null;
    }
    if (!this.provider) {
      console.warn('  No metadata provider configured; continuing without episode titles.');
      return null;
    }

    console.log(`\n🌐 Fetching episode titles for "${seriesTitle}" from ${this.provider.name}...`);
    const rows = await this.provider.fetchEpisodes(seriesTitle, season);
    if (!rows || rows.length === 0) {
      console.log(`  No episode titles available for "${seriesTitle}"; continuing without them.`);
      return null;
    }

    const titles = new EpisodeTitleMap(rows);
    if (writeCache) {
      this.writeCache(csvPath, titles);
    }
    console.log(`  Loaded ${titles.size} episode titles.`);
    return titles;
  }

  private readCache(csvPath: string, seriesTitle: string): EpisodeTitleMap | null {
    try {
      console.log(`  Loading episode titles from '${csvPath}'...`);
      const rows = parseEpisodeTitleCsv(fs.readFileSync(csvPath, 'utf-8'), seriesTitle);
      if (rows.length === 0) {
        console.log(`  '${csvPath}' holds no usable episode titles.`);
        return null;
      }
      const titles = new EpisodeTitleMap(rows);
      console.log(`  Loaded ${titles.size} episode titles from cache.`);
      return titles;
    } catch (error) {
      console.warn(`  Warning: could not read '${csvPath}': ${errorMessage(error)}`);
      return null;
    }
  }

  private writeCache(csvPath: string, titles: EpisodeTitleMap): void {
    try {
      fs.writeFileSync(csvPath, formatEpisodeTitleCsv(titles.rows()), 'utf-8');
      console.log(`  Saved episode titles to '${csvPath}'`);
    } catch (error) {
      console.warn(`  Warning: could not write '${csvPath}': ${errorMessage(error)}`);
    }
  }
}
