#!/usr/bin/env node
import { Command } from 'commander';
import { TaskRunner } from './tasks/task-runner';
import { AnimeRenameTask } from './tasks/anime-rename.task';
import { MediaKind, MediaRenameTask } from './tasks/media-rename.task';
import { ITask } from './types/task.types';
import { parseSeason, validatePathOptions } from './utils/cli-args.util';
import { errorMessage } from './utils/errors.util';

const VERSION = '1.0.0';

interface CommonCliOptions {
  directory?: string;
  file?: string;
  dryRun?: boolean;
}

interface AnimeCliOptions extends CommonCliOptions {
  season: number;
  online?: boolean;
  title?: string;
  config?: string;
  refresh?: boolean;
  yes?: boolean;
}

async function runTask(task: ITask): Promise<void> {
  const result = await new TaskRunner().run(task);
  if (!result.success) {
    process.exitCode = 1;
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option('-d, --directory <path>', 'Path to the directory containing files')
    .option('-f, --file <path>', 'Path to an individual file')
    .option('--dry-run', 'Show what would be renamed without touching any file');
}

function addMediaCommand(program: Command, kind: MediaKind, description: string): void {
  addCommonOptions(program.command(kind).description(description)).action(async (opts: CommonCliOptions) => {
    validatePathOptions(opts);
    await runTask(
      new MediaRenameTask(kind, { directory: opts.directory, file: opts.file, dryRun: Boolean(opts.dryRun) })
    );
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('media-namer')
    .description('Rename anime episodes, movies, books and other files into a standard naming scheme')
    .version(VERSION);

  addCommonOptions(program.command('anime').description('Standardize anime episode file names'))
    .option('-s, --season <number>', 'Season to use when the filename has none (0 = none)', parseSeason, 0)
    .option('--online', 'Fetch episode titles from the configured metadata provider')
    .option('--title <name>', 'Override the series title for all matched files')
    .option('-c, --config <path>', 'JSON file overriding extensions and episode patterns')
    .option('--refresh', 'Ignore cached episode titles and fetch them again (with --online)')
    .option('-y, --yes', 'Do not ask for confirmation when one season is applied to several series')
    .action(async (opts: AnimeCliOptions) => {
      validatePathOptions(opts);
      await runTask(
        new AnimeRenameTask({
          directory: opts.directory,
          file: opts.file,
          dryRun: Boolean(opts.dryRun),
          season: opts.season,
          online: Boolean(opts.online),
          title: opts.title,
          configPath: opts.config,
          refresh: Boolean(opts.refresh),
          assumeYes: Boolean(opts.yes),
        })
      );
    });

  addMediaCommand(program, 'movie', 'Standardize movie file names as "Title (Year)"');
  addMediaCommand(program, 'book', 'Standardize book file names');
  addMediaCommand(program, 'std', 'Standardize file names within a directory');

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
