#!/usr/bin/env node
import { Command } from 'commander';
import { createApp } from './app.js';
import type { PanewardApp } from './app.js';
import { resolveConfig } from './commands/options.js';
import type { GlobalOptions } from './commands/options.js';
import {
  dirsCommand,
  listCommand,
  newCommand,
  removeCommand,
  switchCommand,
} from './commands/sessions.js';
import type { DirsCommandOptions, NewCommandOptions } from './commands/sessions.js';
import { watch } from './commands/watch.js';
import { isTmuxAvailable } from './tmux/index.js';
import { CLIError, ExitCode, handleError } from './utils/error-handler.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('paneward')
  .description('Watch agent sessions running in tmux and show which ones need you')
  .version(VERSION)
  .option('--verbose', 'Print debug output')
  .option('--interval <ms>', 'Poll interval in milliseconds')
  .option('--config <path>', 'Config file (default: ~/.paneward/config.yaml)');

/** Loads config, checks for tmux and hands the wired app to `run`. */
function withApp(run: (app: PanewardApp) => Promise<void>): () => Promise<void> {
  return async () => {
    const config = await resolveConfig(program.opts<GlobalOptions>());
    if (!(await isTmuxAvailable())) {
      throw new CLIError('tmux is not installed or not on PATH', ExitCode.TmuxError);
    }
    await run(createApp(config));
  };
}

program
  .command('watch', { isDefault: true })
  .description('Show a live status table and accept commands on stdin')
  .action(withApp((app) => watch(app)));

program
  .command('list')
  .alias('ls')
  .description('Poll once and print the status table')
  .action(withApp((app) => listCommand(app, process.stdout.isTTY === true)));

program
  .command('new [name]')
  .description('Create a session and start the launch command in it')
  .option('-d, --dir <directory>', 'Start directory')
  .option('-c, --command <command>', 'Command to run instead of the configured one ("" for a shell)')
  .action(async (name: string | undefined, options: NewCommandOptions) =>
    withApp((app) => newCommand(app, name, options))(),
  );

program
  .command('rm <session>')
  .description('Kill a session')
  .action(async (session: string) => withApp((app) => removeCommand(app, session))());

program
  .command('switch <session>')
  .description('Switch attached tmux clients to a session')
  .action(async (session: string) => withApp((app) => switchCommand(app, session))());

program
  .command('dirs')
  .description('List directories sessions were recently started in')
  .option('--forget <directory>', 'Remove a directory from the list')
  .action(async (options: DirsCommandOptions) => {
    const config = await resolveConfig(program.opts<GlobalOptions>());
    await dirsCommand(createApp(config), options);
  });

program.parseAsync(process.argv).catch(handleError);
