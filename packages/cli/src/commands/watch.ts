import * as readline from 'node:readline';
import chalk from 'chalk';
import { errorMessage, logger } from '@paneward/core';
import type { PanewardApp } from '../app.js';
import { renderStatusTable } from '../render/status-table.js';
import { executeLine } from './interactive.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface WatchIO {
  input: NodeJS.ReadableStream;
  /** A terminal, or any writable; `columns` and `isTTY` are read when present. */
  output: NodeJS.WritableStream & { columns?: number; isTTY?: boolean };
}

/**
 * Polls in the background and redraws the status table whenever it
 * changes, reading commands from stdin until `quit`, EOF or SIGINT.
 */
export async function watch(
  app: PanewardApp,
  io: WatchIO = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const rl = readline.createInterface({ input: io.input, output: io.output, prompt: '> ' });
  let lastFrame = '';
  let message = chalk.dim('Type "help" for commands.');
  let pending = false;

  const draw = (force: boolean): void => {
    const lines = renderStatusTable(app.registry.view(), {
      width: Math.min(io.output.columns ?? 60, 100),
      color: io.output.isTTY === true,
    });
    const frame = lines.join('\n');
    if (!force && frame === lastFrame) return;
    lastFrame = frame;
    io.output.write(`${CLEAR_SCREEN}${frame}\n\n${message}\n`);
    rl.prompt(true);
  };

  const unsubscribe = app.registry.subscribe(() => {
    if (pending) return;
    pending = true;
    setImmediate(() => {
      pending = false;
      draw(false);
    });
  });

  await app.poller.start();
  draw(true);

  await new Promise<void>((resolve) => {
    let closing = false;
    const close = (): void => {
      if (closing) return;
      closing = true;
      unsubscribe();
      rl.close();
      app.poller
        .stop()
        .catch((err: unknown) => logger.error(`Poller did not stop cleanly: ${errorMessage(err)}`))
        .finally(() => resolve());
    };

    rl.on('line', (line) => {
      executeLine(app, line)
        .then((outcome) => {
          if (outcome.quit) {
            close();
            return;
          }
          if (outcome.message !== '') message = outcome.error ? chalk.red(outcome.message) : outcome.message;
          draw(true);
        })
        .catch((err: unknown) => {
          message = chalk.red(`Error: ${errorMessage(err)}`);
          draw(true);
        });
    });
    rl.on('SIGINT', close);
    rl.on('close', close);
  });
}
