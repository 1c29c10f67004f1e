/**
 * Session Poller
 *
 * Background loop that keeps the SessionRegistry in step with the
 * multiplexer. Each cycle lists live sessions, adopts new ones, drops ones
 * that stayed missing through the grace period, then captures and
 * classifies every matched session.
 *
 * Lifecycle:
 *   new SessionPoller(registry, source, config) -> start() -> [cycles] -> stop()
 */

import {
  classify,
  applyTransition,
  displayNameFromId,
  DEFAULT_CLASSIFIER_OPTIONS,
  errorMessage,
  fingerprint,
  logger,
  newSession,
  normalizePane,
  withTimeout,
} from '@paneward/core';
import type { ClassifierOptions, PaneSnapshotSource, SessionRegistry } from '@paneward/core';
import { DEFAULT_TIMING, getEngineTiming } from '../config/timing.js';
import type { CycleReport } from '../types/index.js';

// ─── Configuration ───────────────────────────────────────────────────────

/** Poller configuration. All fields have defaults. */
export interface PollerConfig {
  /** Milliseconds between cycles (default: 2000) */
  pollIntervalMs: number;
  /** Budget for each list/capture call in milliseconds (default: 1500) */
  commandTimeoutMs: number;
  /** Trailing pane lines kept for fingerprinting (default: 8) */
  captureLines: number;
  /** Consecutive capture failures before a session is flagged stale (default: 3) */
  staleAfterFailures: number;
  /** Consecutive missing cycles before a session is dropped (default: 2) */
  removalGraceCycles: number;
  /** Prefix stripped from adopted session ids for their display name (default: 'pw') */
  sessionPrefix: string;
  classifier: ClassifierOptions;
}

const DEFAULT_CONFIG: PollerConfig = {
  pollIntervalMs: DEFAULT_TIMING.pollIntervalMs,
  commandTimeoutMs: DEFAULT_TIMING.commandTimeoutMs,
  captureLines: 8,
  staleAfterFailures: 3,
  removalGraceCycles: 2,
  sessionPrefix: 'pw',
  classifier: DEFAULT_CLASSIFIER_OPTIONS,
};

// ─── Poller ──────────────────────────────────────────────────────────────

export class SessionPoller {
  private readonly config: PollerConfig;
  private readonly clock: () => number;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private readonly missingCycles = new Map<string, number>();
  private sequence = 0;
  private running = false;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly source: PaneSnapshotSource,
    config: Partial<PollerConfig> = {},
    clock: () => number = Date.now,
  ) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = {
      ...merged,
      ...getEngineTiming({
        pollIntervalMs: merged.pollIntervalMs,
        commandTimeoutMs: merged.commandTimeoutMs,
      }),
    };
    this.clock = clock;
  }

  /**
   * Run one cycle, then poll on the interval. Resolves with the first
   * cycle's report so callers can render a populated registry.
   */
  async start(): Promise<CycleReport | null> {
    if (this.running) return null;
    this.running = true;

    const first = await this.runOnce();

    // stop() may have been called while the first cycle ran
    if (this.running) {
      this.intervalHandle = setInterval(() => this.tick(), this.config.pollIntervalMs);
    }
    return first;
  }

  /**
   * Stop scheduling cycles and wait for the in-flight one to settle.
   * Each external call is bounded, so this resolves within one command timeout.
   */
  async stop(): Promise<void> {
    this.running = false;

    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Cycles started so far. */
  get cycleCount(): number {
    return this.sequence;
  }

  /**
   * Execute a single cycle. Public so tests and the CLI's `list` command can
   * poll without the interval. Never rejects.
   */
  async runOnce(): Promise<CycleReport> {
    const run = this.executeCycle(++this.sequence);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      if (this.inFlight === run) this.inFlight = null;
    }
  }

  private tick(): void {
    if (this.inFlight) {
      logger.debug(`Poll cycle ${this.sequence} still running, skipping tick`);
      return;
    }
    this.runOnce().catch((err: unknown) => {
      logger.error(`Poll cycle failed: ${errorMessage(err)}`);
    });
  }

  private async executeCycle(cycle: number): Promise<CycleReport> {
    const report: CycleReport = {
      cycle,
      skipped: false,
      added: [],
      removed: [],
      captured: 0,
      failed: [],
      discarded: [],
    };

    // Ids removed after this point were deleted while the listing was in flight
    const listedAt = this.registry.version;

    let listed: string[];
    try {
      listed = await withTimeout(
        this.source.listSessions(),
        this.config.commandTimeoutMs,
        'list-sessions',
      );
    } catch (err) {
      logger.warn(`Skipping poll cycle ${cycle}: ${errorMessage(err)}`);
      report.skipped = true;
      return report;
    }

    const present = new Set(listed);
    this.reconcile(present, listedAt, report);

    const matched = this.registry
      .list()
      .filter((s) => present.has(s.id))
      .map((s) => s.id);

    await Promise.all(matched.map((id) => this.pollSession(id, cycle, report)));
    return report;
  }

  /** Adopt newly listed sessions and drop ones missing past the grace period. */
  private reconcile(present: Set<string>, listedAt: number, report: CycleReport): void {
    const now = this.clock();

    for (const id of present) {
      this.missingCycles.delete(id);
      if (this.registry.has(id)) continue;
      if (this.registry.removedSince(id, listedAt)) {
        logger.debug(`Session ${id} was deleted during the listing, not adopting`);
        continue;
      }
      this.registry.upsert(newSession(id, displayNameFromId(id, this.config.sessionPrefix), now));
      report.added.push(id);
      logger.debug(`Adopted session ${id}`);
    }

    for (const session of this.registry.list()) {
      if (present.has(session.id)) continue;

      const missing = (this.missingCycles.get(session.id) ?? 0) + 1;
      if (missing >= this.config.removalGraceCycles) {
        this.registry.remove(session.id);
        this.missingCycles.delete(session.id);
        report.removed.push(session.id);
        logger.debug(`Session ${session.id} gone for ${missing} cycles, removed`);
      } else {
        this.missingCycles.set(session.id, missing);
      }
    }

    // Forget counters for sessions deleted through another path
    for (const id of this.missingCycles.keys()) {
      if (!this.registry.has(id)) this.missingCycles.delete(id);
    }
  }

  private async pollSession(id: string, cycle: number, report: CycleReport): Promise<void> {
    let raw: string;
    try {
      raw = await withTimeout(
        this.source.capturePane(id),
        this.config.commandTimeoutMs,
        `capture-pane ${id}`,
      );
    } catch (err) {
      this.recordFailure(id, cycle, err, report);
      return;
    }

    const text = normalizePane(raw, this.config.captureLines);
    const digest = fingerprint(text);
    const now = this.clock();

    // Read, classify and write without yielding, so no other writer interleaves.
    const current = this.registry.get(id);
    if (!current) return; // deleted while the capture was in flight

    if (current.lastCycle >= cycle) {
      report.discarded.push(id);
      return;
    }

    const changed = digest !== current.lastOutputFingerprint;
    const lastChangedAt = changed ? Math.max(now, current.lastChangedAt) : current.lastChangedAt;
    const status = classify(current.status, changed, now - lastChangedAt, text, this.config.classifier);

    const observed = applyTransition(
      {
        ...current,
        lastOutputFingerprint: digest,
        lastChangedAt,
        lastCycle: cycle,
        captureFailures: 0,
        stale: false,
        acknowledged: changed ? false : current.acknowledged,
      },
      status,
    );
    this.registry.update(id, () => observed);
    report.captured++;
  }

  /** A failed capture keeps the last status and counts toward staleness. */
  private recordFailure(id: string, cycle: number, err: unknown, report: CycleReport): void {
    report.failed.push(id);
    logger.debug(`Capture failed for ${id}: ${errorMessage(err)}`);

    this.registry.update(id, (current) => {
      if (current.lastCycle >= cycle) return current;

      const captureFailures = current.captureFailures + 1;
      const stale = captureFailures >= this.config.staleAfterFailures;
      if (stale && !current.stale) {
        logger.warn(`Session ${id} has failed ${captureFailures} captures in a row`);
      }
      return { ...current, captureFailures, stale, lastCycle: cycle };
    });
  }
}
