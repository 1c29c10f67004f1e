import { ExternalCommandError, logger } from '@paneward/core';
import { tmux } from './executor.js';
import type { TmuxSessionInfo } from './types.js';

/** tmux reports an empty server as an error; list commands treat it as no rows. */
export function isEmptyServer(err: unknown): boolean {
  return (
    err instanceof ExternalCommandError &&
    (err.stderr.includes('no server running') || err.stderr.includes('no sessions'))
  );
}

/** Runs a list command, mapping an empty server to empty output. */
async function listOutput(args: string[], timeoutMs?: number): Promise<string> {
  try {
    return await tmux(args, timeoutMs);
  } catch (err) {
    if (isEmptyServer(err)) return '';
    throw err;
  }
}

/**
 * Exact-match target for a session. A bare name would let tmux fall back
 * to prefix matching, so `pw-a` could resolve to `pw-ab`.
 */
export function sessionTarget(sessionId: string): string {
  return `=${sessionId}`;
}

/** Exact-match target for a session's active pane. */
export function paneTarget(sessionId: string): string {
  return `=${sessionId}:`;
}

/**
 * Creates a detached tmux session and labels its status line.
 *
 * @param sessionId - tmux session name ({prefix}-{name})
 * @param displayName - Label shown on the left of the status line
 * @param directory - Start directory
 */
export async function createSession(
  sessionId: string,
  displayName: string,
  directory?: string,
  timeoutMs?: number,
): Promise<void> {
  logger.debug(`Creating tmux session: ${sessionId}`);

  const args = ['new-session', '-d', '-s', sessionId];
  if (directory) args.push('-c', directory);
  await tmux(args, timeoutMs);

  // Cosmetic; a failure here leaves a usable session.
  try {
    await setSessionOption(sessionId, 'mouse', 'on', timeoutMs);
    await setSessionOption(sessionId, 'status-left', ` ${displayName} | `, timeoutMs);
    await setSessionOption(sessionId, 'status-right', '', timeoutMs);
  } catch (err) {
    logger.debug(`Could not style session ${sessionId}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/** Sets a tmux session option with `set-option -t`. */
export async function setSessionOption(
  sessionId: string,
  key: string,
  value: string,
  timeoutMs?: number,
): Promise<void> {
  await tmux(['set-option', '-t', sessionTarget(sessionId), key, value], timeoutMs);
}

/** Kills a tmux session. Rejects when tmux cannot find it. */
export async function killSession(sessionId: string, timeoutMs?: number): Promise<void> {
  logger.debug(`Killing tmux session: ${sessionId}`);
  await tmux(['kill-session', '-t', sessionTarget(sessionId)], timeoutMs);
}

/** Lists every session on the tmux server. */
export async function listSessions(timeoutMs?: number): Promise<TmuxSessionInfo[]> {
  const output = await listOutput(
    ['list-sessions', '-F', '#{session_name}|#{session_created}|#{session_attached}'],
    timeoutMs,
  );
  if (!output) return [];

  const sessions: TmuxSessionInfo[] = [];
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const [name, createdTs, attached] = trimmed.split('|');
    if (!name) continue;

    const created = createdTs ? parseInt(createdTs, 10) : NaN;
    sessions.push({
      name,
      createdAt: Number.isNaN(created) ? Date.now() : created * 1000,
      attached: attached !== undefined && attached !== '0',
    });
  }
  return sessions;
}

/** Checks if a tmux session with the given name exists. */
export async function sessionExists(sessionId: string, timeoutMs?: number): Promise<boolean> {
  try {
    await tmux(['has-session', '-t', sessionTarget(sessionId)], timeoutMs);
    return true;
  } catch (err) {
    if (err instanceof ExternalCommandError) return false;
    throw err;
  }
}

/** Text currently visible in the session's active pane. */
export async function capturePane(sessionId: string, timeoutMs?: number): Promise<string> {
  return tmux(['capture-pane', '-p', '-t', paneTarget(sessionId)], timeoutMs);
}

/**
 * Switches every attached client to the session.
 *
 * @returns false when no client is attached
 */
export async function switchClients(sessionId: string, timeoutMs?: number): Promise<boolean> {
  const output = await listOutput(['list-clients', '-F', '#{client_tty}'], timeoutMs);
  const clients = output.split('\n').map((c) => c.trim()).filter((c) => c !== '');
  if (clients.length === 0) return false;

  for (const client of clients) {
    await tmux(['switch-client', '-c', client, '-t', sessionTarget(sessionId)], timeoutMs);
  }
  return true;
}
