import { tmux } from './executor.js';
import { paneTarget } from './session-manager.js';

/**
 * Types a command line into a session's active pane and presses Enter.
 *
 * @param sessionId - Target tmux session
 * @param command - The command/text to send
 */
export async function sendKeys(sessionId: string, command: string, timeoutMs?: number): Promise<void> {
  await tmux(['send-keys', '-t', paneTarget(sessionId), command, 'Enter'], timeoutMs);
}
