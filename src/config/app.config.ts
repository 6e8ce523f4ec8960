import fs from 'fs';
import { z } from 'zod';
import { DEFAULT_EPISODE_PATTERNS, SUBTITLE_EXTENSIONS, VIDEO_EXTENSIONS } from './constants';
import { PatternRegistry } from '../services/pattern-registry.service';
import { ConfigError, errorMessage } from '../utils/errors.util';

/**
 * Settings the anime handler runs with. Built once, never mutated.
 */
export interface AppConfig {
  readonly videoExtensions: readonly string[];
  readonly subtitleExtensions: readonly string[];
  readonly patterns: PatternRegistry;
}

const extensionListSchema = z.array(z.string().min(1));

const configFileSchema = z
  .object({
    video_extensions: z.unknown().optional(),
    subtitle_extensions: z.unknown().optional(),
    episode_patterns: z.unknown().optional(),
  })
  .passthrough();

export function defaultAppConfig(): AppConfig {
  return Object.freeze({
    videoExtensions: VIDEO_EXTENSIONS,
    subtitleExtensions: SUBTITLE_EXTENSIONS,
    patterns: new PatternRegistry(DEFAULT_EPISODE_PATTERNS),
  });
}

export function relevantExtensions(config: AppConfig): string[] {
  return [...config.videoExtensions, ...config.subtitleExtensions];
}

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function readExtensions(value: unknown, key: string, configPath: string): string[] | undefined {
  const parsed = extensionListSchema.safeParse(value);
  if (!parsed.success) {
    console.warn(`  Warning: '${key}' in '${configPath}' is not a list of strings. Using defaults.`);
    return undefined;
  }
  return parsed.data.map(normalizeExtension);
}

function readConfigFile(configPath: string): z.infer<typeof configFileSchema> {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file '${configPath}' could not be read: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Error decoding JSON from '${configPath}': ${errorMessage(error)}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Configuration in '${configPath}' must be a JSON object`);
  }
  return parsed.data;
}

/**
 * Build the configuration, applying overrides from a JSON file when one is given.
 * Any problem with the file is reported and the affected section keeps its defaults.
 */
export function loadAppConfig(configPath?: string): AppConfig {
  const defaults = defaultAppConfig();
  if (!configPath) {
    return defaults;
  }

  let data: z.infer<typeof configFileSchema>;
  try {
    data = readConfigFile(configPath);
  } catch (error) {
    console.warn(`Warning: ${errorMessage(error)}. Using default configuration.`);
    return defaults;
  }
  console.log(`Loaded configuration from '${configPath}'.`);

  let videoExtensions = defaults.videoExtensions;
  let subtitleExtensions = defaults.subtitleExtensions;
  const patterns = new PatternRegistry(DEFAULT_EPISODE_PATTERNS);

  if (data.video_extensions !== undefined) {
    const custom = readExtensions(data.video_extensions, 'video_extensions', configPath);
    if (custom) {
      videoExtensions = custom;
      console.log(`  Loaded custom video extensions: ${custom.join(', ')}`);
    }
  }

  if (data.subtitle_extensions !== undefined) {
    const custom = readExtensions(data.subtitle_extensions, 'subtitle_extensions', configPath);
    if (custom) {
      subtitleExtensions = custom;
      console.log(`  Loaded custom subtitle extensions: ${custom.join(', ')}`);
    }
  }

  if (data.episode_patterns !== undefined) {
    try {
      const count = patterns.replace(data.episode_patterns);
      console.log(`  Using ${count} episode patterns.`);
    } catch (error) {
      console.warn(`  Warning: ${errorMessage(error)} in '${configPath}'. Using defaults.`);
    }
  }

  return Object.freeze({ videoExtensions, subtitleExtensions, patterns });
}
