export type { TmuxSourceOptions, TmuxSessionInfo } from './types.js';
export { tmux, isTmuxAvailable } from './executor.js';
export {
  createSession,
  setSessionOption,
  killSession,
  listSessions,
  sessionExists,
  capturePane,
  switchClients,
  sessionTarget,
  isEmptyServer,
  paneTarget,
} from './session-manager.js';
export { sendKeys } from './send-keys.js';
export { TmuxPaneSource } from './pane-source.js';
