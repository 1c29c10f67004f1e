/**
 * @paneward/engine — Polling loop and operator commands.
 *
 * The poller keeps the session registry in step with the multiplexer; the
 * controller applies create/rename/delete/acknowledge/switch commands.
 */

// ── Polling ──────────────────────────────────────────────────────────
export { SessionPoller } from './lifecycle/session-poller.js';
export type { PollerConfig } from './lifecycle/session-poller.js';

// ── Commands ─────────────────────────────────────────────────────────
export { SessionController } from './lifecycle/session-controller.js';
export type { ControllerConfig, ControllerDeps } from './lifecycle/session-controller.js';

// ── Timing ───────────────────────────────────────────────────────────
export { DEFAULT_TIMING, getEngineTiming } from './config/timing.js';
export type { EngineTiming } from './config/timing.js';

// ── Types ────────────────────────────────────────────────────────────
export type {
  CycleReport,
  CommandError,
  CommandResult,
  CreateOptions,
} from './types/index.js';
