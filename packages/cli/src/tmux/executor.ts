import { execa } from 'execa';
import { ExternalCommandError, TimeoutError, logger } from '@paneward/core';
import { DEFAULT_TIMING } from '@paneward/engine';
import { CLIError, ExitCode } from '../utils/error-handler.js';

/** Reads a property off a thrown value without asserting its shape. */
function field(error: unknown, key: string): unknown {
  return typeof error === 'object' && error !== null ? Reflect.get(error, key) : undefined;
}

/**
 * Executes a tmux command with a time budget.
 * Wraps execa with friendly error handling.
 *
 * @returns stdout without its final newline
 * @throws {TimeoutError} when the call outlives `timeoutMs`
 * @throws {ExternalCommandError} when tmux exits non-zero, including when no server is running
 * @throws {CLIError} when tmux is not installed
 */
export async function tmux(
  args: string[],
  timeoutMs: number = DEFAULT_TIMING.commandTimeoutMs,
): Promise<string> {
  logger.debug(`tmux ${args.join(' ')}`);
  try {
    const result = await execa('tmux', args, { timeout: timeoutMs });
    return result.stdout;
  } catch (error: unknown) {
    const stderr = field(error, 'stderr');
    const stderrText = typeof stderr === 'string' ? stderr.trim() : '';

    if (field(error, 'code') === 'ENOENT') {
      throw new CLIError(
        'tmux is not installed. Please install tmux 3.0+ to use Paneward.\n' +
          '  macOS: brew install tmux\n' +
          '  Linux: sudo apt install tmux',
        ExitCode.TmuxError,
      );
    }

    if (field(error, 'timedOut') === true) {
      throw new TimeoutError(`tmux ${args[0] ?? ''}`.trim(), timeoutMs);
    }

    const exitCode = field(error, 'exitCode');
    throw new ExternalCommandError(
      `tmux ${args[0] ?? ''} failed: ${stderrText || (error instanceof Error ? error.message : String(error))}`,
      stderrText,
      typeof exitCode === 'number' ? exitCode : undefined,
    );
  }
}

/** Checks whether tmux is available on the system. */
export async function isTmuxAvailable(): Promise<boolean> {
  try {
    await execa('tmux', ['-V'], { timeout: DEFAULT_TIMING.commandTimeoutMs });
    return true;
  } catch {
    return false;
  }
}
