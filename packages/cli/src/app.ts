import {
  FileRecentDirectoryStore,
  SessionRegistry,
  classifierOptionsFrom,
} from '@paneward/core';
import type { PaneSnapshotSource, PanewardConfig, RecentDirectoryStore } from '@paneward/core';
import { SessionController, SessionPoller } from '@paneward/engine';
import { TmuxPaneSource } from './tmux/index.js';

/** Everything a front end needs, wired from one validated config. */
export interface PanewardApp {
  config: PanewardConfig;
  registry: SessionRegistry;
  source: PaneSnapshotSource;
  poller: SessionPoller;
  controller: SessionController;
  recentDirectories: RecentDirectoryStore;
}

export interface AppOverrides {
  source?: PaneSnapshotSource;
  recentDirectories?: RecentDirectoryStore;
  clock?: () => number;
}

/**
 * Builds the registry, tmux source, poller and controller. Tests swap the
 * tmux source and directory store for in-process fakes.
 */
export function createApp(config: PanewardConfig, overrides: AppOverrides = {}): PanewardApp {
  const registry = new SessionRegistry();
  const source =
    overrides.source ??
    new TmuxPaneSource({ sessionPrefix: config.sessionPrefix, timeoutMs: config.commandTimeoutMs });
  const recentDirectories = overrides.recentDirectories ?? new FileRecentDirectoryStore();
  const clock = overrides.clock ?? Date.now;

  const poller = new SessionPoller(
    registry,
    source,
    {
      pollIntervalMs: config.pollIntervalMs,
      commandTimeoutMs: config.commandTimeoutMs,
      captureLines: config.captureLines,
      staleAfterFailures: config.staleAfterFailures,
      removalGraceCycles: config.removalGraceCycles,
      sessionPrefix: config.sessionPrefix,
      classifier: classifierOptionsFrom(config),
    },
    clock,
  );

  const controller = new SessionController(
    { registry, source, recentDirectories, clock },
    {
      sessionPrefix: config.sessionPrefix,
      launchCommand: config.launchCommand,
      commandTimeoutMs: config.commandTimeoutMs,
    },
  );

  return { config, registry, source, poller, controller, recentDirectories };
}
