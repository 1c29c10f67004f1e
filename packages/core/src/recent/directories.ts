import { promises as fs } from 'node:fs';
import { atomicWrite } from '../utils/atomic-write.js';
import { withFileLock } from '../utils/file-lock.js';
import { expandHome, getRecentDirectoriesPath } from '../utils/paths.js';

/** Directories sessions were started in, most recent first. */
export interface RecentDirectoryStore {
  load(): Promise<string[]>;
  /** Moves `directory` to the front, adding it when new. */
  remember(directory: string): Promise<void>;
  /** Drops `directory`. Returns false when it was not listed. */
  forget(directory: string): Promise<boolean>;
}

/** Maximum number of directories kept. */
const MAX_ENTRIES = 50;

function parseLines(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Plain-text store at ~/.paneward/paths.txt, one directory per line.
 * Entries are written as the user typed them and compared by resolved path.
 */
export class FileRecentDirectoryStore implements RecentDirectoryStore {
  constructor(private readonly filePath: string = getRecentDirectoriesPath()) {}

  async load(): Promise<string[]> {
    try {
      return parseLines(await fs.readFile(this.filePath, 'utf-8'));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw err;
    }
  }

  async remember(directory: string): Promise<void> {
    const entry = directory.trim();
    if (entry === '') return;
    const resolved = expandHome(entry);

    await withFileLock(this.filePath, async () => {
      const existing = await this.load();
      const rest = existing.filter((p) => expandHome(p) !== resolved);
      await this.save([entry, ...rest].slice(0, MAX_ENTRIES));
    });
  }

  async forget(directory: string): Promise<boolean> {
    return withFileLock(this.filePath, async () => {
      const existing = await this.load();
      const kept = existing.filter((p) => p !== directory);
      if (kept.length === existing.length) return false;
      await this.save(kept);
      return true;
    });
  }

  private async save(entries: string[]): Promise<void> {
    await atomicWrite(this.filePath, entries.length > 0 ? entries.join('\n') + '\n' : '');
  }
}
