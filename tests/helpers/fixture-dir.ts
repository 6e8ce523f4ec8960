import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * A throwaway directory on disk filled with empty (or given) files
 */
export class FixtureDir {
  readonly path: string;

  constructor(files: Record<string, string> | string[] = []) {
    this.path = fs.mkdtempSync(path.join(os.tmpdir(), 'media-namer-'));
    const entries = Array.isArray(files) ? files.map((name): [string, string] => [name, '']) : Object.entries(files);
    for (const [name, content] of entries) {
      this.write(name, content);
    }
  }

  write(name: string, content = ''): string {
    const target = path.join(this.path, name);
    fs.writeFileSync(target, content, 'utf-8');
    return target;
  }

  join(name: string): string {
    return path.join(this.path, name);
  }

  read(name: string): string {
    return fs.readFileSync(this.join(name), 'utf-8');
  }

  list(): string[] {
    return fs.readdirSync(this.path).sort((a, b) => a.localeCompare(b));
  }

  remove(): void {
    fs.rmSync(this.path, { recursive: true, force: true });
  }
}

/**
 * Silence console output for the duration of a test file
 */
export function muteConsole(): void {
  let spies: jest.SpyInstance[] = [];

  beforeEach(() => {
    spies = [
      jest.spyOn(console, 'log').mockImplementation(() => {}),
      jest.spyOn(console, 'warn').mockImplementation(() => {}),
      jest.spyOn(console, 'error').mockImplementation(() => {}),
    ];
  });

  afterEach(() => {
    spies.forEach((spy) => spy.mockRestore());
  });
}
