import {
  AlreadyExistsError,
  CaptureFailedError,
  ListUnavailableError,
  NotFoundError,
  TimeoutError,
  errorMessage,
  hasSessionPrefix,
  logger,
} from '@paneward/core';
import type { CreateSessionOptions, PaneSnapshotSource } from '@paneward/core';
import {
  capturePane,
  createSession,
  killSession,
  listSessions,
  sessionExists,
  switchClients,
} from './session-manager.js';
import { sendKeys } from './send-keys.js';
import type { TmuxSourceOptions } from './types.js';

/**
 * PaneSnapshotSource backed by the local tmux server.
 *
 * Only sessions inside the configured prefix are listed, so unrelated tmux
 * sessions never show up as agents. Failures are mapped onto the core error
 * taxonomy; TimeoutError passes through unchanged.
 */
export class TmuxPaneSource implements PaneSnapshotSource {
  constructor(private readonly options: TmuxSourceOptions) {}

  async listSessions(): Promise<string[]> {
    try {
      const sessions = await listSessions(this.options.timeoutMs);
      return sessions
        .map((s) => s.name)
        .filter((name) => hasSessionPrefix(name, this.options.sessionPrefix));
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new ListUnavailableError(`Could not list tmux sessions: ${errorMessage(err)}`, err);
    }
  }

  async capturePane(id: string): Promise<string> {
    try {
      return await capturePane(id, this.options.timeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new CaptureFailedError(`Could not capture ${id}: ${errorMessage(err)}`, id, err);
    }
  }

  async createSession(id: string, options: CreateSessionOptions): Promise<void> {
    if (await sessionExists(id, this.options.timeoutMs)) {
      throw new AlreadyExistsError(id);
    }

    try {
      await createSession(id, options.displayName, options.directory, this.options.timeoutMs);
    } catch (err) {
      if (errorMessage(err).includes('duplicate session')) throw new AlreadyExistsError(id, err);
      throw err;
    }

    if (options.command) {
      try {
        await sendKeys(id, options.command, this.options.timeoutMs);
      } catch (err) {
        logger.warn(`Session ${id} created but "${options.command}" was not sent: ${errorMessage(err)}`);
      }
    }
  }

  async deleteSession(id: string): Promise<void> {
    try {
      await killSession(id, this.options.timeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) throw err;
      throw new NotFoundError(`Could not kill ${id}: ${errorMessage(err)}`, 'tmux session', id);
    }
  }

  async switchClient(id: string): Promise<boolean> {
    return switchClients(id, this.options.timeoutMs);
  }
}
