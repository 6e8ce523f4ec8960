import { EPISODE_CSV_HEADERS } from '../config/constants';
import { EpisodeTitleRow } from '../types/episode.types';
import { parseCsv, toCsv } from './csv.util';

const SERIES_COLUMNS = ['series title', 'anime title', 'title'];
const SEASON_COLUMNS = ['season'];
const EPISODE_COLUMNS = ['episode', 'episode number'];
const TITLE_COLUMNS = ['episode title'];

/**
 * Parse an "S02" / "2" style season label. Empty means no season.
 * Returns null when the label is not a number at all.
 */
export function parseSeasonLabel(label: string): number | undefined | null {
  const trimmed = label.trim();
  if (trimmed === '') return undefined;
  const match = trimmed.match(/^S?(\d+)$/i);
  return match ? parseInt(match[1], 10) : null;
}

export function parseEpisodeLabel(label: string): number | null {
  const match = label.trim().match(/^E?(\d+)$/i);
  return match ? parseInt(match[1], 10) : null;
}

export function formatSeasonLabel(season: number | undefined): string {
  return season === undefined || season === 0 ? '' : `S${season.toString().padStart(2, '0')}`;
}

export function formatEpisodeLabel(episode: number): string {
  return `E${episode.toString().padStart(2, '0')}`;
}

function findColumn(header: string[], names: string[]): number {
  return header.findIndex((column) => names.includes(column.trim().toLowerCase()));
}

/**
 * Turn "Series Title,Season,Episode,Episode Title" CSV text into rows.
 * When seriesTitle is given every row is keyed under it, whatever the CSV says.
 */
export function parseEpisodeTitleCsv(text: string, seriesTitle?: string): EpisodeTitleRow[] {
  const records = parseCsv(text);
  if (records.length === 0) {
    return [];
  }

  const [header, ...body] = records;
  const seriesCol = findColumn(header, SERIES_COLUMNS);
  const seasonCol = findColumn(header, SEASON_COLUMNS);
  const episodeCol = findColumn(header, EPISODE_COLUMNS);
  const titleCol = findColumn(header, TITLE_COLUMNS);

  if (episodeCol < 0 || titleCol < 0 || (seriesCol < 0 && !seriesTitle)) {
    console.warn(`  Warning: episode CSV is missing required columns (${EPISODE_CSV_HEADERS.join(', ')})`);
    return [];
  }

  const rows: EpisodeTitleRow[] = [];
  body.forEach((record, index) => {
    const line = index + 2;
    const episode = parseEpisodeLabel(record[episodeCol] ?? '');
    const season = seasonCol >= 0 ? parseSeasonLabel(record[seasonCol] ?? '') : undefined;
    const title = (record[titleCol] ?? '').trim();
    const series = seriesTitle ?? (record[seriesCol] ?? '').trim();

    if (episode === null || season === null) {
      console.warn(`  Warning: skipping CSV line ${line} (invalid season or episode label)`);
      return;
    }
    if (!title || !series) {
      console.warn(`  Warning: skipping CSV line ${line} (missing series or episode title)`);
      return;
    }

    rows.push({ seriesTitle: series, season, episode, title });
  });

  return rows;
}

export function formatEpisodeTitleCsv(rows: readonly EpisodeTitleRow[]): string {
  return toCsv([
    EPISODE_CSV_HEADERS,
    ...rows.map((row) => [
      row.seriesTitle,
      formatSeasonLabel(row.season),
      formatEpisodeLabel(row.episode),
      row.title,
    ]),
  ]);
}
