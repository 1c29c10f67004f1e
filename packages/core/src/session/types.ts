/**
 * Status taxonomy, ordered by how urgently a session needs the operator.
 *
 *  - needs_input: the agent is blocked on a prompt or confirmation
 *  - working:     output changed recently
 *  - ready:       output has been quiet past the debounce window
 *  - seen:        a ready session the operator has already looked at
 */
export const SessionStatus = {
  NeedsInput: 'needs_input',
  Working: 'working',
  Ready: 'ready',
  Seen: 'seen',
} as const;

export type SessionStatus = (typeof SessionStatus)[keyof typeof SessionStatus];

export const SESSION_STATUSES: readonly SessionStatus[] = Object.values(SessionStatus);

/** One tracked agent session. Stored frozen; replaced wholesale on every update. */
export interface Session {
  /** tmux session name. */
  readonly id: string;
  /** User-editable label, independent of the tmux name. */
  readonly displayName: string;
  /** Epoch ms; never changes after creation. */
  readonly createdAt: number;
  readonly status: SessionStatus;
  /** Status held immediately before the current one, `null` before the first transition. */
  readonly previousStatus: SessionStatus | null;
  /** Digest of the most recent normalized capture, `null` until the first capture. */
  readonly lastOutputFingerprint: string | null;
  /** Epoch ms of the last fingerprint change. Never decreases. */
  readonly lastChangedAt: number;
  readonly acknowledged: boolean;
  /** Epoch ms of the last time the operator switched to this session. */
  readonly lastVisitedAt: number;
  /** Consecutive capture failures. */
  readonly captureFailures: number;
  readonly stale: boolean;
  /** Sequence number of the last poll cycle applied; 0 when never polled. */
  readonly lastCycle: number;
}

/** The subset of a session the presentation layer renders. */
export interface SessionView {
  id: string;
  displayName: string;
  status: SessionStatus;
  createdAt: number;
  lastVisitedAt: number;
  stale: boolean;
  active: boolean;
}

/** Options passed to the multiplexer when a session is created. */
export interface CreateSessionOptions {
  /** Label shown in the tmux status line. */
  displayName: string;
  /** Start directory. Defaults to the multiplexer's own default. */
  directory?: string;
  /** Command typed into the new session once it exists. */
  command?: string;
}

/**
 * The I/O boundary to the terminal multiplexer. Implementations perform no
 * policy; they translate calls and map failures onto the error taxonomy.
 *
 *  - listSessions  rejects with ListUnavailableError
 *  - capturePane   rejects with CaptureFailedError
 *  - createSession rejects with AlreadyExistsError
 *  - deleteSession rejects with NotFoundError
 */
export interface PaneSnapshotSource {
  listSessions(): Promise<string[]>;
  capturePane(id: string): Promise<string>;
  createSession(id: string, options: CreateSessionOptions): Promise<void>;
  deleteSession(id: string): Promise<void>;
  /** Switches attached clients to `id`. Resolves false when no client is attached. */
  switchClient(id: string): Promise<boolean>;
}

/** Builds a fresh session entity in the initial `working` state. */
export function newSession(id: string, displayName: string, now: number): Session {
  return {
    id,
    displayName,
    createdAt: now,
    status: SessionStatus.Working,
    previousStatus: null,
    lastOutputFingerprint: null,
    lastChangedAt: now,
    acknowledged: false,
    lastVisitedAt: now,
    captureFailures: 0,
    stale: false,
    lastCycle: 0,
  };
}
