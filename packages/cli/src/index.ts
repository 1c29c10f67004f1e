// @paneward/cli — barrel export

// ── Tmux Integration ───────────────────────────────────────────────
export {
  type TmuxSourceOptions,
  type TmuxSessionInfo,
  tmux,
  isTmuxAvailable,
  createSession,
  killSession,
  listSessions,
  sessionExists,
  capturePane,
  switchClients,
  sendKeys,
  TmuxPaneSource,
} from './tmux/index.js';

// ── App Wiring & Commands ──────────────────────────────────────────
export { createApp, type PanewardApp, type AppOverrides } from './app.js';
export { executeLine, resolveSessionId, type LineOutcome } from './commands/interactive.js';
export { watch, type WatchIO } from './commands/watch.js';

// ── Rendering ──────────────────────────────────────────────────────
export { renderStatusTable, sortForDisplay, STATUS_PRIORITY, type RenderOptions } from './render/status-table.js';

// ── Error Handling ─────────────────────────────────────────────────
export { CLIError, ExitCode, exitCodeFor, handleError } from './utils/error-handler.js';
