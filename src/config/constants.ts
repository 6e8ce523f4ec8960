import { RawPatternRule } from '../types/episode.types';

export const VIDEO_EXTENSIONS = ['.mp4', '.mkv', '.ts', '.avi'];

export const SUBTITLE_EXTENSIONS = ['.srt', '.vtt', '.ass', '.sub'];

export const BOOK_EXTENSIONS = ['.pdf', '.epub', '.mobi', '.azw', '.txt'];

export const MOVIE_EXTENSIONS = VIDEO_EXTENSIONS;

// Characters that cannot appear in a filename on at least one of the supported platforms
export const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export const NAME_SEPARATOR = ' - ';

export const EPISODE_CACHE_SUFFIX = '_episodes.csv';

export const EPISODE_CSV_HEADERS = ['Series Title', 'Season', 'Episode', 'Episode Title'];

/**
 * Built-in episode patterns, most specific first.
 * A rule that captures a season must come before any rule that would also match
 * the same filename without it, otherwise the season is silently lost.
 */
export const DEFAULT_EPISODE_PATTERNS: readonly RawPatternRule[] = [
  // Watch Raise wa Tanin ga Ii 1st Season Episode 01 English Subbed at Site Name
  {
    pattern: String.raw`Watch\s+(?<series_name>.*?) (?<season_num>\d+)(?:st|nd|rd|th)? Season Episode\s+(?<episode_num>\d+)`,
  },
  // Raise wa Tanin ga Ii 1st Season Episode 01 English Subbed at Site Name
  {
    pattern: String.raw`^(?<series_name>.*?) (?<season_num>\d+)(?:st|nd|rd|th)? Season Episode\s+(?<episode_num>\d+)`,
  },
  // Raise wa Tanin ga Ii - S01 - E01 - Title (already renamed)
  {
    pattern: String.raw`^(?<series_name>.*?) - S(?<season_num>\d+) - E(?<episode_num>\d+)`,
  },
  // Watch Raise wa Tanin ga Ii Episode 01 English Subbed at Site Name
  {
    pattern: String.raw`Watch\s+(?<series_name>.*?) Episode\s+(?<episode_num>\d+)`,
  },
  // Raise wa Tanin ga Ii Episode 01 English Subbed at Site Name
  {
    pattern: String.raw`^(?<series_name>.*?) Episode\s+(?<episode_num>\d+)`,
  },
  // Raise wa Tanin ga Ii - E01 - Title (already renamed)
  {
    pattern: String.raw`^(?<series_name>.*?) - E(?<episode_num>\d+)`,
  },
];

export const MOVIE_NAME_PATTERNS = {
  YEAR: /\b(19\d{2}|20\d{2})\b/,
  QUALITY: /\b(480p|720p|1080p|2160p|4k|hd|uhd|bluray|brrip|bdrip|dvdrip|webrip|web-dl|web|hdtv)\b/gi,
  CODEC: /\b(x264|x265|h264|h265|hevc|xvid|divx|avc)\b/gi,
  AUDIO: /\b(aac|ac3|dts|truehd|atmos|dd5\.1|dd7\.1)\b/gi,
  LANGUAGE: /\b(eng|english|multi|dual|subbed|dubbed)\b/gi,
  BRACKETS: /[\[\](){}]/g,
  DOTS_UNDERSCORES: /[._]/g,
  MULTI_SPACES: /\s+/g,
};
