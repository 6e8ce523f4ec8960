import { z } from 'zod';
import { DEFAULT_EPISODE_PATTERNS } from '../config/constants';
import { PatternRule, RawPatternRule } from '../types/episode.types';
import { ConfigError, errorMessage } from '../utils/errors.util';

const captureName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid capture group name');

export const patternRuleSchema = z.object({
  pattern: z.string().min(1),
  groups: z
    .object({
      series_name: captureName.optional(),
      season_num: captureName.optional(),
      episode_num: captureName.optional(),
    })
    .optional(),
  season_default: z.number().int().nonnegative().nullable().optional(),
});

/**
 * Rewrite legacy `(?P<name>...)` named groups into the `(?<name>...)` form
 */
export function normalizePatternSource(source: string): string {
  return source.replace(/\(\?P<([A-Za-z_][A-Za-z0-9_]*)>/g, '(?<$1>');
}

/**
 * Names of every named capture group declared in a regex.
 * The empty alternative always matches, so `groups` lists each name even when unset.
 */
function captureNames(regex: RegExp): string[] {
  const probe = new RegExp(`(?:${regex.source})|`, regex.flags).exec('');
  return probe?.groups ? Object.keys(probe.groups) : [];
}

export function compilePatternRule(raw: RawPatternRule): PatternRule {
  const source = normalizePatternSource(raw.pattern);
  let regex: RegExp;
  try {
    regex = new RegExp(source, 'i');
  } catch (error) {
    throw new ConfigError(`Invalid pattern "${raw.pattern}": ${errorMessage(error)}`);
  }

  const groups = {
    seriesName: raw.groups?.series_name ?? 'series_name',
    seasonNum: raw.groups?.season_num ?? 'season_num',
    episodeNum: raw.groups?.episode_num ?? 'episode_num',
  };

  // A rule without a series capture is still usable together with a --title override
  const names = captureNames(regex);
  const seasonDefault = raw.season_default ?? undefined;

  return {
    source,
    regex,
    groups,
    hasSeasonCapture: names.includes(groups.seasonNum),
    seasonDefault,
  };
}

/**
 * Ordered list of episode pattern rules. First match wins.
 */
export class PatternRegistry {
  private compiled: PatternRule[];

  constructor(rules: readonly RawPatternRule[] = DEFAULT_EPISODE_PATTERNS) {
    this.compiled = rules.map((rule) => compilePatternRule(rule));
  }

  rules(): readonly PatternRule[] {
    return this.compiled;
  }

  /**
   * Replace the rules with an externally supplied list.
   * Throws ConfigError if the value is not a list; invalid items are dropped with a warning.
   * Returns the number of rules now in use.
   */
  replace(value: unknown): number {
    if (!Array.isArray(value)) {
      throw new ConfigError('Episode patterns must be a list of rules');
    }

    const accepted: PatternRule[] = [];
    value.forEach((item: unknown, index: number) => {
      const parsed = patternRuleSchema.safeParse(item);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'rule';
        console.warn(`  Warning: skipping episode pattern #${index + 1} (${where}: ${issue?.message ?? 'invalid'})`);
        return;
      }
      try {
        accepted.push(compilePatternRule(parsed.data));
      } catch (error) {
        console.warn(`  Warning: skipping episode pattern #${index + 1} (${errorMessage(error)})`);
      }
    });

    if (accepted.length === 0) {
      console.warn('  Warning: no valid episode patterns supplied, keeping the current ones');
      return this.compiled.length;
    }

    this.compiled = accepted;
    return accepted.length;
  }
}
