/**
 * @paneward/core — Session model, status classification and shared
 * utilities used by the engine and the command line.
 */

// ── Session Model & Registry ─────────────────────────────────────────
export {
  SessionStatus,
  SESSION_STATUSES,
  newSession,
  SessionRegistry,
  applyTransition,
  SESSION_NAME_PATTERN,
  sessionIdFor,
  hasSessionPrefix,
  displayNameFromId,
} from './session/index.js';
export type {
  Session,
  SessionView,
  CreateSessionOptions,
  PaneSnapshotSource,
  RegistryChange,
  RegistryListener,
} from './session/index.js';

// ── Status Classification ───────────────────────────────────────────
export {
  normalizePane,
  fingerprint,
  classify,
  detectsInputPrompt,
  DEFAULT_CLASSIFIER_OPTIONS,
  compileRules,
  trailingRegions,
  matchesAny,
  DEFAULT_PROMPT_PATTERNS,
  DEFAULT_ACTIVITY_PATTERNS,
} from './status/index.js';
export type {
  ClassifierOptions,
  PatternRule,
  PatternScope,
  CompiledRule,
} from './status/index.js';

// ── Configuration ───────────────────────────────────────────────────
export {
  PanewardConfigSchema,
  PatternRuleSchema,
  parseConfig,
  loadConfig,
  classifierOptionsFrom,
} from './config/index.js';
export type { PanewardConfig, PanewardConfigInput } from './config/index.js';

// ── Recent Directories ──────────────────────────────────────────────
export { FileRecentDirectoryStore } from './recent/directories.js';
export type { RecentDirectoryStore } from './recent/directories.js';

// ── Error Classes ───────────────────────────────────────────────────
export {
  PanewardError,
  ListUnavailableError,
  CaptureFailedError,
  DuplicateNameError,
  AlreadyExistsError,
  NotFoundError,
  TimeoutError,
  ValidationError,
  NoClientError,
  ExternalCommandError,
  FileSystemError,
  LockTimeoutError,
  errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// ── Utility Functions ───────────────────────────────────────────────
export { logger, setVerbose, isVerbose } from './utils/logger.js';
export { withTimeout } from './utils/timeout.js';
export { withFileLock } from './utils/file-lock.js';
export type { LockOptions } from './utils/file-lock.js';
export { atomicWrite } from './utils/atomic-write.js';
export { generateSessionName } from './utils/names.js';
export { formatTimeAgo } from './utils/time.js';
export {
  getHomeDir,
  getConfigPath,
  getRecentDirectoriesPath,
  expandHome,
} from './utils/paths.js';
