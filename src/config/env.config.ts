import dotenv from 'dotenv';

dotenv.config();

export type MetadataProviderName = 'jikan' | 'openai';

export interface EnvConfig {
  metadataProvider: MetadataProviderName;
  openaiApiKey: string;
  openaiModel: string;
  jikanBaseUrl: string;
  jikanRateLimitMs: number;
  httpTimeoutMs: number;
}

function parseProvider(value: string | undefined): MetadataProviderName {
  if (value === undefined || value === '') {
    return 'jikan';
  }
  if (value === 'jikan' || value === 'openai') {
    return value;
  }
  console.warn(`Unknown METADATA_PROVIDER "${value}", using jikan`);
  return 'jikan';
}

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

let envConfig: EnvConfig | null = null;

/**
 * Read the environment (and .env) once and cache the result
 */
export function getConfig(): EnvConfig {
  if (envConfig) {
    return envConfig;
  }

  envConfig = {
    metadataProvider: parseProvider(process.env.METADATA_PROVIDER),
    openaiApiKey: process.env.OPENAI_API_KEY || '',
    openaiModel: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    jikanBaseUrl: process.env.JIKAN_BASE_URL || 'https://api.jikan.moe/v4',
    jikanRateLimitMs: parseNumber(process.env.JIKAN_RATE_LIMIT_MS, 1000),
    httpTimeoutMs: parseNumber(process.env.HTTP_TIMEOUT_MS, 15000),
  };

  return envConfig;
}

// Clear cache (useful for testing or after changing process.env)
export function resetConfig(): void {
  envConfig = null;
}
