/**
 * Session Controller
 *
 * Executes operator commands against both the multiplexer and the
 * SessionRegistry, keeping the two consistent. Commands never throw: every
 * outcome is a CommandResult the presentation layer can surface as a message.
 */

import {
  AlreadyExistsError,
  DuplicateNameError,
  ExternalCommandError,
  NoClientError,
  NotFoundError,
  SESSION_NAME_PATTERN,
  SessionStatus,
  TimeoutError,
  ValidationError,
  errorMessage,
  expandHome,
  generateSessionName,
  logger,
  newSession,
  sessionIdFor,
  withTimeout,
} from '@paneward/core';
import type {
  PaneSnapshotSource,
  RecentDirectoryStore,
  SessionRegistry,
  SessionView,
} from '@paneward/core';
import { DEFAULT_TIMING } from '../config/timing.js';
import type { CommandError, CommandResult, CreateOptions } from '../types/index.js';

export interface ControllerConfig {
  /** tmux names are `{prefix}-{name}` (default: 'pw') */
  sessionPrefix: string;
  /** Command typed into new sessions; empty launches a bare shell (default: 'claude') */
  launchCommand: string;
  /** Budget for each tmux call in milliseconds (default: 1500) */
  commandTimeoutMs: number;
}

/**
 * Multiplexer calls one operation may make in sequence. The outer bound on
 * an operation is `commandTimeoutMs` times its count, so a source that keeps
 * each call within budget never trips it.
 */
const CALLS_PER_OPERATION = {
  /** has-session, new-session, three set-option, send-keys */
  create: 6,
  /** list-clients plus a switch-client for each of up to three clients */
  switch: 4,
  delete: 1,
} as const;

export interface ControllerDeps {
  registry: SessionRegistry;
  source: PaneSnapshotSource;
  /** Remembers start directories passed to create(). */
  recentDirectories?: RecentDirectoryStore;
  clock?: () => number;
  random?: () => number;
}

const DEFAULT_CONFIG: ControllerConfig = {
  sessionPrefix: 'pw',
  launchCommand: 'claude',
  commandTimeoutMs: DEFAULT_TIMING.commandTimeoutMs,
};

function success<T>(value: T, warning?: string): CommandResult<T> {
  return warning === undefined ? { ok: true, value } : { ok: true, value, warning };
}

function failure<T>(error: CommandError): CommandResult<T> {
  return { ok: false, error };
}

/** Narrows a thrown value to a CommandError, wrapping anything unexpected. */
function toCommandError(err: unknown): CommandError {
  if (
    err instanceof DuplicateNameError ||
    err instanceof AlreadyExistsError ||
    err instanceof NotFoundError ||
    err instanceof ValidationError ||
    err instanceof TimeoutError ||
    err instanceof NoClientError ||
    err instanceof ExternalCommandError
  ) {
    return err;
  }
  return new ExternalCommandError(errorMessage(err));
}

function notFound(id: string): NotFoundError {
  return new NotFoundError(`No session "${id}"`, 'session', id);
}

export class SessionController {
  private readonly config: ControllerConfig;
  private readonly registry: SessionRegistry;
  private readonly source: PaneSnapshotSource;
  private readonly recentDirectories: RecentDirectoryStore | undefined;
  private readonly clock: () => number;
  private readonly random: () => number;
  /** Ids with a create in flight; guards against double submits. */
  private readonly pendingCreates = new Set<string>();

  constructor(deps: ControllerDeps, config: Partial<ControllerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.registry = deps.registry;
    this.source = deps.source;
    this.recentDirectories = deps.recentDirectories;
    this.clock = deps.clock ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Creates a tmux session and registers it once tmux succeeds, so it shows
   * up before the next poll. A blank name gets a random `adjective-noun` name.
   *
   * Fails with DuplicateNameError when the id is already tracked or being
   * created. A failed tmux call leaves no registry entry behind.
   */
  async create(name?: string, options: CreateOptions = {}): Promise<CommandResult<SessionView>> {
    const displayName = name?.trim() || generateSessionName(this.random);
    if (!SESSION_NAME_PATTERN.test(displayName)) {
      return failure(
        new ValidationError(
          `Invalid session name "${displayName}": use 1-64 letters, digits, "-" or "_"`,
          'name',
        ),
      );
    }

    const id = sessionIdFor(displayName, this.config.sessionPrefix);
    if (this.registry.has(id) || this.pendingCreates.has(id)) {
      return failure(new DuplicateNameError(id));
    }

    const directory = options.directory?.trim() ? expandHome(options.directory.trim()) : undefined;
    const command = options.command ?? this.config.launchCommand;

    this.pendingCreates.add(id);
    try {
      await withTimeout(
        this.source.createSession(id, {
          displayName,
          directory,
          command: command === '' ? undefined : command,
        }),
        this.budget('create'),
        `new-session ${id}`,
      );
    } catch (err) {
      logger.debug(`Create ${id} failed: ${errorMessage(err)}`);
      return failure(toCommandError(err));
    } finally {
      this.pendingCreates.delete(id);
    }

    // The poller may have adopted the session while tmux was creating it.
    if (this.registry.has(id)) {
      this.registry.update(id, (s) => ({ ...s, displayName }));
    } else {
      this.registry.upsert(newSession(id, displayName, this.clock()));
    }
    logger.debug(`Created session ${id}`);

    let warning: string | undefined;
    if (options.directory?.trim() && this.recentDirectories) {
      try {
        await this.recentDirectories.remember(options.directory.trim());
      } catch (err) {
        warning = `Could not remember directory: ${errorMessage(err)}`;
        logger.debug(warning);
      }
    }

    return this.viewResult(id, warning);
  }

  /** Changes the display label only; the tmux name is untouched. */
  rename(id: string, displayName: string): CommandResult<SessionView> {
    const label = displayName.trim();
    if (label === '') {
      return failure(new ValidationError('Display name cannot be empty', 'displayName'));
    }
    if (!this.registry.update(id, (s) => ({ ...s, displayName: label }))) {
      return failure(notFound(id));
    }
    return this.viewResult(id);
  }

  /**
   * Kills the tmux session, then drops the registry entry. Idempotent: if
   * tmux fails (typically because the session is already gone) the entry is
   * still removed and the failure comes back as a warning.
   */
  async delete(id: string): Promise<CommandResult<void>> {
    if (this.registry.activeId === id) {
      await this.moveClientsAway(id);
    }

    let warning: string | undefined;
    try {
      await withTimeout(
        this.source.deleteSession(id),
        this.budget('delete'),
        `kill-session ${id}`,
      );
    } catch (err) {
      warning = `Session ${id} could not be killed: ${errorMessage(err)}`;
      logger.debug(warning);
    }

    this.registry.remove(id);
    return success(undefined, warning);
  }

  /**
   * Marks a ready session as seen. Any other status is left alone, since
   * the operator may have raced a transition.
   */
  acknowledge(id: string): CommandResult<SessionView> {
    const session = this.registry.get(id);
    if (!session) return failure(notFound(id));

    if (session.status === SessionStatus.Ready) {
      this.registry.transition(id, SessionStatus.Seen);
    }
    return this.viewResult(id);
  }

  /**
   * Points every attached tmux client at the session, marks it active and
   * visited, and acknowledges it.
   */
  async switchTo(id: string): Promise<CommandResult<SessionView>> {
    if (!this.registry.has(id)) return failure(notFound(id));

    let switched: boolean;
    try {
      switched = await withTimeout(
        this.source.switchClient(id),
        this.budget('switch'),
        `switch-client ${id}`,
      );
    } catch (err) {
      return failure(toCommandError(err));
    }
    if (!switched) return failure(new NoClientError(id));

    this.registry.setActive(id);
    const now = this.clock();
    this.registry.update(id, (s) => ({ ...s, lastVisitedAt: now }));
    return this.acknowledge(id);
  }

  private budget(operation: keyof typeof CALLS_PER_OPERATION): number {
    return this.config.commandTimeoutMs * CALLS_PER_OPERATION[operation];
  }

  /** Switch clients to another session first so deleting the active one does not detach them. */
  private async moveClientsAway(id: string): Promise<void> {
    const target = this.registry.list().find((s) => s.id !== id);
    if (!target) return;

    try {
      const switched = await withTimeout(
        this.source.switchClient(target.id),
        this.budget('switch'),
        `switch-client ${target.id}`,
      );
      if (switched) this.registry.setActive(target.id);
    } catch (err) {
      logger.debug(`Could not switch away from ${id}: ${errorMessage(err)}`);
    }
  }

  private viewResult(id: string, warning?: string): CommandResult<SessionView> {
    const view = this.registry.viewOf(id);
    // Only reachable if a listener removed the entry synchronously
    if (!view) return failure(notFound(id));
    return success(view, warning);
  }
}
