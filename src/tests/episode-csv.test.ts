import { parseCsv, toCsv } from '../utils/csv.util';
import {
  formatEpisodeLabel,
  formatEpisodeTitleCsv,
  formatSeasonLabel,
  parseEpisodeLabel,
  parseEpisodeTitleCsv,
  parseSeasonLabel,
} from '../utils/episode-csv.util';
import { EpisodeTitleMap } from '../models/episode-title-map';

describe('CSV utilities', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('parseCsv', () => {
    test('should split plain rows and drop blank lines', () => {
      expect(parseCsv('a,b\r\n\r\nc,d\n')).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    test('should read quoted fields with commas, quotes and line breaks', () => {
      expect(parseCsv('"Hello, World","Say ""hi""","two\nlines"')).toEqual([
        ['Hello, World', 'Say "hi"', 'two\nlines'],
      ]);
    });

    test('should skip a leading byte order mark', () => {
      expect(parseCsv('\uFEFFa,b')).toEqual([['a', 'b']]);
    });

    test('should keep empty fields', () => {
      expect(parseCsv('Show,,E01,Title')).toEqual([['Show', '', 'E01', 'Title']]);
    });
  });

  describe('toCsv', () => {
    test('should quote only the fields that need it', () => {
      expect(toCsv([['Show', 'A, B', 'say "x"']])).toBe('Show,"A, B","say ""x"""\n');
    });
  });

  describe('Season and episode labels', () => {
    test('should parse season labels', () => {
      expect(parseSeasonLabel('S02')).toBe(2);
      expect(parseSeasonLabel('3')).toBe(3);
      expect(parseSeasonLabel('  ')).toBeUndefined();
      expect(parseSeasonLabel('Season 2')).toBeNull();
    });

    test('should parse episode labels', () => {
      expect(parseEpisodeLabel('E07')).toBe(7);
      expect(parseEpisodeLabel('e12')).toBe(12);
      expect(parseEpisodeLabel('12')).toBe(12);
      expect(parseEpisodeLabel('Ep 1')).toBeNull();
    });

    test('should format labels with two digits and no label for season 0', () => {
      expect(formatSeasonLabel(1)).toBe('S01');
      expect(formatSeasonLabel(0)).toBe('');
      expect(formatSeasonLabel(undefined)).toBe('');
      expect(formatEpisodeLabel(5)).toBe('E05');
      expect(formatEpisodeLabel(120)).toBe('E120');
    });
  });

  describe('parseEpisodeTitleCsv', () => {
    test('should read the cache format', () => {
      const rows = parseEpisodeTitleCsv(
        'Series Title,Season,Episode,Episode Title\nShow,S01,E01,Pilot\nShow,,E02,"Part 2, Again"\n'
      );
      expect(rows).toEqual([
        { seriesTitle: 'Show', season: 1, episode: 1, title: 'Pilot' },
        { seriesTitle: 'Show', season: undefined, episode: 2, title: 'Part 2, Again' },
      ]);
    });

    test('should accept the "Anime Title" header and re-key rows under the given title', () => {
      const rows = parseEpisodeTitleCsv('Anime Title,Season,Episode,Episode Title\nOther Name,,E03,Third', 'Show');
      expect(rows).toEqual([{ seriesTitle: 'Show', season: undefined, episode: 3, title: 'Third' }]);
    });

    test('should skip rows with unreadable labels or no title', () => {
      const rows = parseEpisodeTitleCsv(
        'Series Title,Season,Episode,Episode Title\nShow,S01,Ep one,Bad\nShow,S01,E02,\nShow,S01,E03,Good'
      );
      expect(rows).toEqual([{ seriesTitle: 'Show', season: 1, episode: 3, title: 'Good' }]);
      expect(warnSpy).toHaveBeenCalledWith('  Warning: skipping CSV line 2 (invalid season or episode label)');
      expect(warnSpy).toHaveBeenCalledWith('  Warning: skipping CSV line 3 (missing series or episode title)');
    });

    test('should return nothing when required columns are missing', () => {
      expect(parseEpisodeTitleCsv('Name,Number\nShow,1')).toEqual([]);
      expect(parseEpisodeTitleCsv('')).toEqual([]);
    });

    test('should write rows back in the cache format', () => {
      const text = formatEpisodeTitleCsv([
        { seriesTitle: 'Show', season: 2, episode: 1, title: 'Hello, Again' },
        { seriesTitle: 'Show', episode: 2, title: 'Plain' },
      ]);
      expect(text).toBe('Series Title,Season,Episode,Episode Title\nShow,S02,E01,"Hello, Again"\nShow,,E02,Plain\n');
      expect(parseEpisodeTitleCsv(text)).toEqual([
        { seriesTitle: 'Show', season: 2, episode: 1, title: 'Hello, Again' },
        { seriesTitle: 'Show', season: undefined, episode: 2, title: 'Plain' },
      ]);
    });
  });
});

describe('EpisodeTitleMap', () => {
  test('should look up titles by series, season and episode', () => {
    const titles = new EpisodeTitleMap([
      { seriesTitle: 'Show', season: 1, episode: 1, title: 'S1 Pilot' },
      { seriesTitle: 'Show', season: 2, episode: 1, title: 'S2 Pilot' },
    ]);
    expect(titles.get('Show', 1, 1)).toBe('S1 Pilot');
    expect(titles.get('Show', 2, 1)).toBe('S2 Pilot');
    expect(titles.get('Show', 3, 1)).toBeUndefined();
    expect(titles.get('Show', undefined, 1)).toBeUndefined();
  });

  test('should compare series names ignoring case and extra spaces', () => {
    const titles = new EpisodeTitleMap([{ seriesTitle: 'Raise wa  Tanin ga Ii', episode: 4, title: 'Four' }]);
    expect(titles.get('  raise WA tanin ga ii', undefined, 4)).toBe('Four');
  });

  test('should fall back to the season-less listing for a seasoned lookup', () => {
    const titles = new EpisodeTitleMap([{ seriesTitle: 'Show', episode: 2, title: 'Two' }]);
    expect(titles.get('Show', 1, 2)).toBe('Two');
    expect(titles.get('Show', 0, 2)).toBe('Two');
  });

  test('should find a lone seasoned listing for a season-less lookup', () => {
    const titles = new EpisodeTitleMap([{ seriesTitle: 'Show', season: 1, episode: 3, title: 'Three' }]);
    expect(titles.get('Show', undefined, 3)).toBe('Three');
    expect(titles.get('Show', 0, 3)).toBe('Three');
    expect(titles.get('Show', 2, 3)).toBeUndefined();
  });

  test('should not fall back when the series has seasoned entries', () => {
    const titles = new EpisodeTitleMap([
      { seriesTitle: 'Show', episode: 2, title: 'Two' },
      { seriesTitle: 'Show', season: 2, episode: 5, title: 'Five' },
    ]);
    expect(titles.get('Show', 1, 2)).toBeUndefined();
  });

  test('should keep the first title for a duplicate key', () => {
    const titles = new EpisodeTitleMap([
      { seriesTitle: 'Show', season: 1, episode: 1, title: 'First' },
      { seriesTitle: 'show', season: 1, episode: 1, title: 'Second' },
    ]);
    expect(titles.size).toBe(1);
    expect(titles.rows()).toHaveLength(1);
    expect(titles.get('Show', 1, 1)).toBe('First');
  });

  test('should treat season 0 and no season as the same key', () => {
    const titles = new EpisodeTitleMap([{ seriesTitle: 'Show', season: 0, episode: 1, title: 'Zero' }]);
    expect(titles.get('Show', undefined, 1)).toBe('Zero');
  });
});
