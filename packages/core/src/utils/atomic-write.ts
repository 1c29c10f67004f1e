import path from 'node:path';
import fs from 'graceful-fs';
import { FileSystemError } from '../errors.js';

const fsPromises = fs.promises;

/**
 * Writes `content` through a temporary sibling file and a rename, so a
 * concurrent reader sees either the old file or the new one. The parent
 * directory is created when missing.
 *
 * @throws {FileSystemError} If the write or rename fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(tmpPath, content, 'utf-8');
    await fsPromises.rename(tmpPath, filePath);
  } catch (err) {
    await fsPromises.unlink(tmpPath).catch(() => undefined);
    throw new FileSystemError(
      `Atomic write failed for ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err,
    );
  }
}
