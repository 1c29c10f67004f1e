import { sessionIdFor } from '@paneward/core';
import type { SessionRegistry } from '@paneward/core';
import type { CommandResult } from '@paneward/engine';
import type { PanewardApp } from '../app.js';

export const INTERACTIVE_HELP = [
  'Commands:',
  '  new [name] [directory]   create a session (blank name = random)',
  '  rename <session> <name>  change the display name',
  '  rm <session>             kill a session',
  '  ack <session>            mark a ready session as seen',
  '  switch <session>         switch attached tmux clients to a session',
  '  list                     redraw the table',
  '  help                     show this help',
  '  quit                     stop watching',
].join('\n');

/** Outcome of one interactive line. */
export interface LineOutcome {
  message: string;
  /** True when the user asked to leave the watch loop. */
  quit: boolean;
  /** True when the line failed or was not understood. */
  error: boolean;
}

/**
 * Resolves what the user typed to a session id: an exact id, a name inside
 * the configured prefix, or a unique display name.
 */
export function resolveSessionId(
  registry: SessionRegistry,
  token: string,
  prefix: string,
): string | undefined {
  if (registry.has(token)) return token;

  const prefixed = sessionIdFor(token, prefix);
  if (registry.has(prefixed)) return prefixed;

  const byLabel = registry.list().filter((s) => s.displayName === token);
  return byLabel.length === 1 ? byLabel[0].id : undefined;
}

function describe<T>(result: CommandResult<T>, done: (value: T) => string): LineOutcome {
  if (!result.ok) {
    return { message: `Error: ${result.error.message}`, quit: false, error: true };
  }
  const message = result.warning ? `${done(result.value)} (warning: ${result.warning})` : done(result.value);
  return { message, quit: false, error: false };
}

function reply(message: string, error = false): LineOutcome {
  return { message, quit: false, error };
}

/** Parses and executes one command typed while watching. */
export async function executeLine(app: PanewardApp, line: string): Promise<LineOutcome> {
  const [verb, ...args] = line.trim().split(/\s+/).filter((w) => w !== '');
  if (!verb) return reply('');

  const prefix = app.config.sessionPrefix;
  const target = (): string | undefined =>
    args[0] === undefined ? undefined : resolveSessionId(app.registry, args[0], prefix) ?? args[0];

  switch (verb) {
    case 'new': {
      const result = await app.controller.create(args[0], { directory: args[1] });
      return describe(result, (s) => `Created ${s.displayName} (${s.id})`);
    }
    case 'rename': {
      const id = target();
      if (!id || args.length < 2) return reply('Usage: rename <session> <name>', true);
      return describe(app.controller.rename(id, args.slice(1).join(' ')), (s) => `Renamed ${s.id} to ${s.displayName}`);
    }
    case 'rm': {
      const id = target();
      if (!id) return reply('Usage: rm <session>', true);
      return describe(await app.controller.delete(id), () => `Deleted ${id}`);
    }
    case 'ack': {
      const id = target();
      if (!id) return reply('Usage: ack <session>', true);
      return describe(app.controller.acknowledge(id), (s) => `${s.displayName} is ${s.status}`);
    }
    case 'switch': {
      const id = target();
      if (!id) return reply('Usage: switch <session>', true);
      return describe(await app.controller.switchTo(id), (s) => `Switched to ${s.id}`);
    }
    case 'list':
      return reply('');
    case 'help':
    case '?':
      return reply(INTERACTIVE_HELP);
    case 'quit':
    case 'q':
    case 'exit':
      return { message: '', quit: true, error: false };
    default:
      return reply(`Unknown command "${verb}". Type "help" for commands.`, true);
  }
}
