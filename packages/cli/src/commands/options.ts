import { loadConfig, parseConfig, setVerbose } from '@paneward/core';
import type { PanewardConfig } from '@paneward/core';
import { CLIError, ExitCode } from '../utils/error-handler.js';

/** Flags shared by every command. */
export interface GlobalOptions {
  verbose?: boolean;
  interval?: string;
  config?: string;
}

/** Parses a `--interval` value in milliseconds. */
export function parseInterval(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new CLIError(`Invalid interval "${value}": expected a positive number of milliseconds`, ExitCode.ValidationError);
  }
  return ms;
}

/**
 * Loads config.yaml and applies command line flags. A shorter `--interval`
 * pulls the tmux call budget down with it so the pair stays valid.
 */
export async function resolveConfig(options: GlobalOptions): Promise<PanewardConfig> {
  setVerbose(options.verbose === true);

  const config = await loadConfig({}, options.config);
  if (options.interval === undefined) return config;

  const pollIntervalMs = parseInterval(options.interval);
  return parseConfig(
    {
      ...config,
      pollIntervalMs,
      commandTimeoutMs: Math.min(config.commandTimeoutMs, Math.floor(pollIntervalMs * 0.75)),
    },
    '--interval',
  );
}
