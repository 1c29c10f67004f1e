/**
 * Centralized timing for the poll loop and external calls.
 *
 * The poller and controller import their defaults from here so a
 * standalone engine (no config.yaml) behaves like the CLI's defaults.
 */

export interface EngineTiming {
  /** Milliseconds between poll cycles. */
  pollIntervalMs: number;
  /** Budget for each call into the multiplexer; shorter than a poll interval. */
  commandTimeoutMs: number;
}

/**
 * Two seconds keeps the list feeling live without hammering the tmux
 * server. Each tmux call gets 1.5s so a hung call still ends before the
 * next tick.
 */
export const DEFAULT_TIMING: EngineTiming = {
  pollIntervalMs: 2_000,
  commandTimeoutMs: 1_500,
};

/**
 * Merge overrides with defaults. A command timeout that does not fit inside
 * the interval is cut to three quarters of it.
 */
export function getEngineTiming(overrides?: Partial<EngineTiming>): EngineTiming {
  const merged = { ...DEFAULT_TIMING, ...overrides };
  if (merged.commandTimeoutMs >= merged.pollIntervalMs) {
    merged.commandTimeoutMs = Math.max(1, Math.floor(merged.pollIntervalMs * 0.75));
  }
  return merged;
}
