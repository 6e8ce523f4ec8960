import { EpisodeTitleRow } from '../types/episode.types';

function normalizeSeries(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Read-only lookup of external episode titles keyed by (series, season, episode).
 * A missing season is stored and looked up as season 0.
 */
export class EpisodeTitleMap {
  private readonly titles = new Map<string, string>();
  private readonly seasons = new Map<string, Set<number>>();
  private readonly entries: EpisodeTitleRow[] = [];

  constructor(rows: Iterable<EpisodeTitleRow> = []) {
    for (const row of rows) {
      const series = normalizeSeries(row.seriesTitle);
      const season = row.season ?? 0;
      const key = this.key(series, season, row.episode);
      if (this.titles.has(key)) {
        continue;
      }
      this.titles.set(key, row.title);
      this.entries.push(row);

      let known = this.seasons.get(series);
      if (!known) {
        known = new Set<number>();
        this.seasons.set(series, known);
      }
      known.add(season);
    }
  }

  get size(): number {
    return this.titles.size;
  }

  rows(): readonly EpisodeTitleRow[] {
    return this.entries;
  }

  /**
   * Title for an episode, or undefined.
   * When the source lists a single season for the series, a lookup falls back to it
   * if one side has no season: a seasoned lookup finds a season-less listing and a
   * season-less lookup finds a lone "S01" listing.
   */
  get(seriesName: string, season: number | undefined, episode: number): string | undefined {
    const series = normalizeSeries(seriesName);
    const effectiveSeason = season ?? 0;

    const exact = this.titles.get(this.key(series, effectiveSeason, episode));
    if (exact !== undefined) {
      return exact;
    }

    const known = this.seasons.get(series);
    if (!known || known.size !== 1) {
      return undefined;
    }
    const [onlySeason] = known;
    if (effectiveSeason !== 0 && onlySeason !== 0) {
      return undefined;
    }
    return this.titles.get(this.key(series, onlySeason, episode));
  }

  private key(series: string, season: number, episode: number): string {
    return `${series}\u0000${season}\u0000${episode}`;
  }
}
