import { logger } from '@paneward/core';
import type { CommandResult } from '@paneward/engine';
import type { PanewardApp } from '../app.js';
import { renderStatusTable } from '../render/status-table.js';
import { resolveSessionId } from './interactive.js';

/** Throws the command's error so the top-level handler picks the exit code. */
function unwrap<T>(result: CommandResult<T>): T {
  if (!result.ok) throw result.error;
  if (result.warning) logger.warn(result.warning);
  return result.value;
}

/** One poll so one-shot commands see the sessions tmux already has. */
async function populate(app: PanewardApp): Promise<void> {
  const report = await app.poller.runOnce();
  if (report.skipped) logger.warn('tmux did not answer; the list may be incomplete');
}

function resolve(app: PanewardApp, session: string): string {
  return resolveSessionId(app.registry, session, app.config.sessionPrefix) ?? session;
}

export async function listCommand(app: PanewardApp, color: boolean): Promise<void> {
  await populate(app);
  for (const line of renderStatusTable(app.registry.view(), { color })) {
    logger.info(line);
  }
}

export interface NewCommandOptions {
  dir?: string;
  command?: string;
}

export async function newCommand(
  app: PanewardApp,
  name: string | undefined,
  options: NewCommandOptions,
): Promise<void> {
  await populate(app);
  const view = unwrap(
    await app.controller.create(name, { directory: options.dir, command: options.command }),
  );
  logger.success(`Created ${view.displayName} (tmux session ${view.id})`);
}

export async function removeCommand(app: PanewardApp, session: string): Promise<void> {
  await populate(app);
  const id = resolve(app, session);
  unwrap(await app.controller.delete(id));
  logger.success(`Deleted ${id}`);
}

export async function switchCommand(app: PanewardApp, session: string): Promise<void> {
  await populate(app);
  const view = unwrap(await app.controller.switchTo(resolve(app, session)));
  logger.success(`Switched to ${view.displayName}`);
}

export interface DirsCommandOptions {
  forget?: string;
}

export async function dirsCommand(app: PanewardApp, options: DirsCommandOptions): Promise<void> {
  if (options.forget !== undefined) {
    if (await app.recentDirectories.forget(options.forget)) {
      logger.success(`Forgot ${options.forget}`);
    } else {
      logger.warn(`${options.forget} was not in the list`);
    }
    return;
  }

  const dirs = await app.recentDirectories.load();
  if (dirs.length === 0) {
    logger.info('No recent directories.');
    return;
  }
  for (const dir of dirs) logger.info(dir);
}
