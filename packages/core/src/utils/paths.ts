import os from 'node:os';
import path from 'node:path';

/**
 * Path resolution for the ~/.paneward directory.
 * PANEWARD_HOME overrides the location (used by tests and portable installs).
 */

/** @returns Root ~/.paneward directory path */
export function getHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['PANEWARD_HOME'];
  return override ? path.resolve(override) : path.join(os.homedir(), '.paneward');
}

/** @returns Path to config.yaml */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHomeDir(env), 'config.yaml');
}

/** @returns Path to the recent directories list */
export function getRecentDirectoriesPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHomeDir(env), 'paths.txt');
}

/** Expands a leading `~` and resolves to an absolute path. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return path.resolve(p);
}
