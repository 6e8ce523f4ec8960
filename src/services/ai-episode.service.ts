import OpenAI from 'openai';
import { getConfig } from '../config/env.config';
import { EpisodeTitleRow } from '../types/episode.types';
import { EpisodeMetadataProvider, TextCompleter } from '../types/metadata.types';
import { parseEpisodeTitleCsv } from '../utils/episode-csv.util';
import { errorMessage } from '../utils/errors.util';

/**
 * Episode titles generated by a chat model as CSV text
 */
export class AIEpisodeService implements EpisodeMetadataProvider {
  readonly name = 'openai';

  private openai: OpenAI | null = null;
  private readonly complete: TextCompleter;

  constructor(completer?: TextCompleter) {
    this.complete = completer ?? ((prompt) => this.completeWithOpenAI(prompt));
  }

  private getOpenAI(): OpenAI {
    if (!this.openai) {
      const apiKey = getConfig().openaiApiKey;
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY is not set');
      }
      this.openai = new OpenAI({ apiKey });
    }
    return this.openai;
  }

  private async completeWithOpenAI(prompt: string): Promise<string | null> {
    const response = await this.getOpenAI().chat.completions.create({
      model: getConfig().openaiModel,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0.1,
    });
    return response.choices[0]?.message?.content ?? null;
  }

  buildPrompt(seriesTitle: string, season?: number): string {
    const queryTitle = season ? `${seriesTitle} - Season ${season}` : seriesTitle;

    return `Generate a CSV file listing all episodes of the anime [${queryTitle}] in the following format:

Anime Title,Season,Episode,Episode Title
${queryTitle},S##,E##,Episode Title
${queryTitle},S##,E##,Episode Title
...

Requirements:
- Keep spaces in titles and episode titles but remove invalid filename characters (\\, /, :, *, ?, ", <, >, |).
- Season data should be empty if the anime has only one season.
- Use the official English episode titles.
- Use two-digit labels (E01, E02, ... E10 instead of E1, E2, ...).
- Quote any field that contains a comma.
- Output only the CSV content, without additional text or explanations.`;
  }

  async fetchEpisodes(seriesTitle: string, season?: number): Promise<EpisodeTitleRow[] | null> {
    try {
      console.log(`  Asking ${getConfig().openaiModel} for episode titles of "${seriesTitle}"...`);
      const content = await this.complete(this.buildPrompt(seriesTitle, season));
      if (!content) {
        throw new Error('No response from AI');
      }

      const rows = parseEpisodeTitleCsv(stripCodeFence(content), seriesTitle);
      if (rows.length === 0) {
        console.log('  The AI response contained no usable episode rows.');
        return null;
      }
      return rows;
    } catch (error) {
      console.error(`  Error fetching episode data from OpenAI: ${errorMessage(error)}`);
      return null;
    }
  }
}

/**
 * Remove a surrounding Markdown code block (```csv ... ```) if present
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/);
  return fenced ? fenced[1].trim() : trimmed;
}
