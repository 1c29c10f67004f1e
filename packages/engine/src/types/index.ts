/**
 * Types for @paneward/engine.
 *
 * Defines poll cycle reporting and the result contract of controller
 * commands surfaced to the presentation layer.
 */

import type {
  AlreadyExistsError,
  DuplicateNameError,
  ExternalCommandError,
  NoClientError,
  NotFoundError,
  TimeoutError,
  ValidationError,
} from '@paneward/core';

// ─── Poll Cycle ──────────────────────────────────────────────────────────

/** Outcome of one poll cycle. */
export interface CycleReport {
  /** Sequence number of this cycle, starting at 1. */
  cycle: number;
  /** True when listing failed and nothing was touched. */
  skipped: boolean;
  /** Ids adopted from the multiplexer this cycle. */
  added: string[];
  /** Ids dropped after the removal grace period. */
  removed: string[];
  /** Sessions captured and classified. */
  captured: number;
  /** Ids whose capture failed; their status was retained. */
  failed: string[];
  /** Ids whose result arrived after a newer cycle had already been applied. */
  discarded: string[];
}

// ─── Controller Commands ─────────────────────────────────────────────────

/** Failures a controller command can return. */
export type CommandError =
  | DuplicateNameError
  | AlreadyExistsError
  | NotFoundError
  | ValidationError
  | TimeoutError
  | NoClientError
  | ExternalCommandError;

/**
 * Result of a controller command. Success may carry a soft warning
 * (e.g. the tmux session was already gone on delete).
 */
export type CommandResult<T> =
  | { ok: true; value: T; warning?: string }
  | { ok: false; error: CommandError };

/** Options for creating a session. */
export interface CreateOptions {
  /** Start directory; `~` is expanded and the entry is remembered. */
  directory?: string;
  /** Overrides the configured launch command. Empty string launches a bare shell. */
  command?: string;
}
