export { SessionStatus, SESSION_STATUSES, newSession } from './types.js';
export type {
  Session,
  SessionView,
  CreateSessionOptions,
  PaneSnapshotSource,
} from './types.js';
export { SessionRegistry, applyTransition } from './registry.js';
export type { RegistryChange, RegistryListener } from './registry.js';
export { SESSION_NAME_PATTERN, sessionIdFor, hasSessionPrefix, displayNameFromId } from './naming.js';
