import path from 'path';
import { AppConfig, relevantExtensions } from '../config/app.config';
import { EpisodeTitleMap } from '../models/episode-title-map';
import { ExtractedEpisode } from '../types/episode.types';
import { AnimeRenameOptions, BatchResult, ConfirmPrompt, FileSet } from '../types/rename.types';
import { emptyBatchResult, recordOutcome } from '../utils/batch-result.util';
import { EpisodeNameParser } from '../utils/episode-name-parser.util';
import { FileScanner } from '../utils/file-scanner.util';
import { errorMessage } from '../utils/errors.util';
import { EpisodeMetadataService } from './episode-metadata.service';
import { FileRenamerService } from './file-renamer.service';
import { mergeEpisodeMetadata } from './metadata-merger.service';

export type BatchState = 'idle' | 'listing' | 'extracting' | 'confirming' | 'renaming' | 'done';

/**
 * AnimeRenamerService drives one anime batch:
 * - lists the files (or takes the single --file)
 * - extracts series/season/episode from every name up front
 * - asks before applying one season number to several series
 * - loads external episode titles once
 * - renames each file, isolating failures per file
 */
export class AnimeRenamerService {
  private state: BatchState = 'idle';
  private readonly parser: EpisodeNameParser;
  private readonly scanner: FileScanner;

  constructor(
    config: AppConfig,
    private readonly metadata: EpisodeMetadataService,
    private readonly confirm: ConfirmPrompt
  ) {
    this.parser = new EpisodeNameParser(config.patterns);
    this.scanner = new FileScanner(relevantExtensions(config));
  }

  getState(): BatchState {
    return this.state;
  }

  /**
   * Run the batch. Listing errors propagate (nothing has been touched yet);
   * everything after that is reported per file in the result.
   */
  async renameBatch(options: AnimeRenameOptions): Promise<BatchResult> {
    const result = emptyBatchResult();

    this.state = 'listing';
    let fileSet: FileSet;
    try {
      fileSet = this.scanner.resolveFileSet(options);
    } catch (error) {
      this.state = 'done';
      throw error;
    }

    const { baseDir, fileNames } = fileSet;
    if (fileNames.length === 0) {
      console.log(`No relevant anime files found in '${baseDir}'.`);
      this.state = 'done';
      return result;
    }

    this.state = 'extracting';
    console.log(`\n🔍 Analyzing ${fileNames.length} file(s)...`);
    const extracted = fileNames.map((fileName) => this.parser.extract(fileName));

    const seriesNames = this.distinctSeries(extracted);
    if (seriesNames.length > 1 && options.season !== 0) {
      this.state = 'confirming';
      const proceed = options.assumeYes || (await this.confirm(this.ambiguityMessage(seriesNames, options.season)));
      if (!proceed) {
        console.log('Aborted: no files were renamed.');
        result.aborted = true;
        this.state = 'done';
        return result;
      }
    }

    const titles = await this.loadTitles(options, extracted, baseDir);

    this.state = 'renaming';
    console.log(`\n📝 Renaming files...`);
    const renamer = new FileRenamerService(options.dryRun);

    for (const episode of extracted) {
      result.scanned++;
      const oldPath = path.join(baseDir, episode.originalFileName);

      try {
        const merged = mergeEpisodeMetadata(
          episode,
          { seriesOverride: options.title, defaultSeason: options.season },
          titles
        );

        if (!merged.ok) {
          recordOutcome(result, renamer.skipFile(oldPath, merged.reason));
          continue;
        }

        const newPath = path.join(baseDir, this.parser.buildFileName(merged.record));
        recordOutcome(result, renamer.renameFile(oldPath, newPath));
      } catch (error) {
        const message = errorMessage(error);
        console.error(`  Unexpected error while processing '${episode.originalFileName}': ${message}`);
        recordOutcome(result, {
          status: 'failed',
          originalFileName: episode.originalFileName,
          oldPath,
          error: message,
        });
      }
    }

    this.state = 'done';
    return result;
  }

  /**
   * Series names found in the batch, compared case-insensitively, in first-seen order
   */
  private distinctSeries(extracted: ExtractedEpisode[]): string[] {
    const seen = new Map<string, string>();
    for (const episode of extracted) {
      if (!episode.seriesName) continue;
      const key = episode.seriesName.replace(/\s+/g, ' ').toLowerCase();
      if (!seen.has(key)) {
        seen.set(key, episode.seriesName);
      }
    }
    return Array.from(seen.values());
  }

  private ambiguityMessage(seriesNames: string[], season: number): string {
    const listed = seriesNames.map((name) => `"${name}"`).join(', ');
    return `Found ${seriesNames.length} different series (${listed}) but --season ${season} applies to all of them. Continue?`;
  }

  private async loadTitles(
    options: AnimeRenameOptions,
    extracted: ExtractedEpisode[],
    baseDir: string
  ): Promise<EpisodeTitleMap | null> {
    const first = extracted.find((episode) => episode.seriesName);
    const seriesTitle = options.title?.trim() || first?.seriesName;

    if (!seriesTitle) {
      if (options.online) {
        console.log('Skipping online data fetching: no --title given and none could be inferred from filenames.');
      }
      return null;
    }
    if (options.online && !options.title) {
      console.log(`Using inferred series title '${seriesTitle}'. For best results, provide --title.`);
    }

    const season = first?.season ?? (options.season || undefined);

    return this.metadata.loadTitles({
      seriesTitle,
      season,
      baseDir,
      online: options.online,
      refresh: options.refresh,
      writeCache: !options.dryRun,
    });
  }
}
