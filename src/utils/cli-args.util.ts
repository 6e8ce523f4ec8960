import fs from 'fs';
import { InvalidArgumentError } from 'commander';
import { CliArgumentError } from './errors.util';

export interface PathOptions {
  directory?: string;
  file?: string;
  config?: string;
}

/**
 * commander argument parser for --season: a non-negative integer
 */
export function parseSeason(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Season must be a non-negative integer.');
  }
  return parseInt(value.trim(), 10);
}

function validatePath(target: string, description: string, kind: 'directory' | 'file'): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(target);
  } catch {
    throw new CliArgumentError(`The provided ${description} path does not exist: '${target}'`);
  }
  if (kind === 'directory' && !stats.isDirectory()) {
    throw new CliArgumentError(`The provided ${description} path is not a directory: '${target}'`);
  }
  if (kind === 'file' && !stats.isFile()) {
    throw new CliArgumentError(`The provided ${description} path is not a file: '${target}'`);
  }
}

/**
 * Checks the combination and existence of the path arguments before any handler runs
 */
export function validatePathOptions(options: PathOptions): void {
  if (options.directory && options.file) {
    throw new CliArgumentError('Cannot specify both --file and --directory; please choose one.');
  }
  if (!options.directory && !options.file) {
    throw new CliArgumentError('One of --directory or --file is required.');
  }

  if (options.directory) {
    validatePath(options.directory, 'directory', 'directory');
  }
  if (options.file) {
    validatePath(options.file, 'file', 'file');
  }
  if (options.config) {
    validatePath(options.config, 'configuration file', 'file');
  }
}
