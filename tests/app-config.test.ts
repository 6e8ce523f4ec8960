import { defaultAppConfig, loadAppConfig, relevantExtensions } from '../src/config/app.config';
import { DEFAULT_EPISODE_PATTERNS } from '../src/config/constants';
import { EpisodeNameParser } from '../src/utils/episode-name-parser.util';
import { FixtureDir } from './helpers/fixture-dir';

describe('App configuration', () => {
  let dir: FixtureDir;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = new FixtureDir();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    dir.remove();
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  test('should use the built-in defaults without a file', () => {
    const config = loadAppConfig();
    expect(relevantExtensions(config)).toEqual(['.mp4', '.mkv', '.ts', '.avi', '.srt', '.vtt', '.ass', '.sub']);
    expect(config.patterns.rules()).toHaveLength(DEFAULT_EPISODE_PATTERNS.length);
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('should override extensions and patterns from a JSON file', () => {
    const configPath = dir.write(
      'config.json',
      JSON.stringify({
        video_extensions: ['MP4', '.webm'],
        episode_patterns: [{ pattern: '^(?P<series_name>.+?) #(?P<episode_num>\\d+)', season_default: 4 }],
      })
    );

    const config = loadAppConfig(configPath);

    expect(config.videoExtensions).toEqual(['.mp4', '.webm']);
    expect(config.subtitleExtensions).toEqual(defaultAppConfig().subtitleExtensions);
    expect(config.patterns.rules()).toHaveLength(1);

    const extracted = new EpisodeNameParser(config.patterns).extract('My Show #7.webm');
    expect(extracted.seriesName).toBe('My Show');
    expect(extracted.season).toBe(4);
    expect(extracted.episodeNumber).toBe(7);
    expect(logSpy).toHaveBeenCalledWith(`Loaded configuration from '${configPath}'.`);
  });

  test('should fall back to defaults for malformed JSON', () => {
    const configPath = dir.write('broken.json', '{ "video_extensions": [');

    const config = loadAppConfig(configPath);

    expect(config.videoExtensions).toEqual(defaultAppConfig().videoExtensions);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toMatch(/^Warning: Error decoding JSON from '.*broken\.json'.*Using default configuration\.$/);
  });

  test('should fall back to defaults for a missing file', () => {
    const config = loadAppConfig(dir.join('missing.json'));
    expect(config.patterns.rules()).toHaveLength(DEFAULT_EPISODE_PATTERNS.length);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  test('should keep the default patterns when episode_patterns is not a list', () => {
    const configPath = dir.write('config.json', JSON.stringify({ episode_patterns: { pattern: 'x' } }));

    const config = loadAppConfig(configPath);

    expect(config.patterns.rules()).toHaveLength(DEFAULT_EPISODE_PATTERNS.length);
    expect(warnSpy).toHaveBeenCalledWith(
      `  Warning: Episode patterns must be a list of rules in '${configPath}'. Using defaults.`
    );
  });

  test('should keep default extensions when the list is invalid', () => {
    const configPath = dir.write('config.json', JSON.stringify({ subtitle_extensions: 'srt' }));

    const config = loadAppConfig(configPath);

    expect(config.subtitleExtensions).toEqual(defaultAppConfig().subtitleExtensions);
  });
});
