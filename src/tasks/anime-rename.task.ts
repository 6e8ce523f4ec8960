import { loadAppConfig } from '../config/app.config';
import { getConfig } from '../config/env.config';
import { AnimeRenamerService } from '../services/anime-renamer.service';
import { EpisodeMetadataService, createMetadataProvider } from '../services/episode-metadata.service';
import { EpisodeMetadataProvider } from '../types/metadata.types';
import { AnimeRenameOptions, ConfirmPrompt } from '../types/rename.types';
import { ITask, TaskResult } from '../types/task.types';
import { confirmPrompt } from '../utils/prompt.util';

export interface AnimeRenameTaskDeps {
  confirm?: ConfirmPrompt;
  provider?: EpisodeMetadataProvider | null;
}

export class AnimeRenameTask implements ITask {
  name = 'AnimeRenameTask';

  constructor(
    private readonly options: AnimeRenameOptions,
    private readonly deps: AnimeRenameTaskDeps = {}
  ) {}

  async execute(): Promise<TaskResult> {
    const { options } = this;
    console.log('Processing anime files...');
    console.log(`Online mode: ${options.online}`);
    if (options.dryRun) {
      console.log('Dry run: no files will be renamed.');
    }

    const appConfig = loadAppConfig(options.configPath);
    const provider = this.deps.provider !== undefined
      ? this.deps.provider
      : options.online
        ? createMetadataProvider(getConfig())
        : null;

    const renamer = new AnimeRenamerService(
      appConfig,
      new EpisodeMetadataService(provider),
      this.deps.confirm ?? confirmPrompt
    );

    const data = await renamer.renameBatch(options);

    return {
      taskName: this.name,
      success: true,
      message: data.aborted ? 'Nothing was renamed.' : 'Anime renaming finished.',
      data,
    };
  }
}
