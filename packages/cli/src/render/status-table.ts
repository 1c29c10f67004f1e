import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { SessionStatus, formatTimeAgo } from '@paneward/core';
import type { SessionView } from '@paneward/core';

/** Sort rank: lower sorts first. */
export const STATUS_PRIORITY: Record<SessionStatus, number> = {
  needs_input: 1,
  working: 2,
  ready: 3,
  seen: 4,
};

const STATUS_LABEL: Record<SessionStatus, string> = {
  needs_input: 'needs input',
  working: 'working',
  ready: 'ready',
  seen: 'seen',
};

function statusColor(c: ChalkInstance, status: SessionStatus): (text: string) => string {
  switch (status) {
    case SessionStatus.NeedsInput:
      return c.red;
    case SessionStatus.Working:
      return c.yellow;
    case SessionStatus.Ready:
      return c.green;
    case SessionStatus.Seen:
      return c.white;
  }
}

/** Most urgent first; within a status, most recently visited first. */
export function sortForDisplay(rows: readonly SessionView[]): SessionView[] {
  return [...rows].sort(
    (a, b) =>
      STATUS_PRIORITY[a.status] - STATUS_PRIORITY[b.status] || b.lastVisitedAt - a.lastVisitedAt,
  );
}

export interface RenderOptions {
  /** Line width used to right-align the time column (default: 60) */
  width?: number;
  now?: number;
  /** Emit ANSI colors (default: true) */
  color?: boolean;
}

/**
 * Renders one line per session:
 *
 *   `* ● swift-fox [stale]          ready  3m`
 *
 * `*` marks the active session, whose time column shows `-`.
 */
export function renderStatusTable(rows: readonly SessionView[], options: RenderOptions = {}): string[] {
  const width = options.width ?? 60;
  const now = options.now ?? Date.now();
  const c = new Chalk({ level: options.color === false ? 0 : 1 });

  if (rows.length === 0) {
    return [c.dim('No sessions. Create one with: paneward new [name]')];
  }

  return sortForDisplay(rows).map((row) => {
    const marker = row.active ? '*' : ' ';
    const stale = row.stale ? ' [stale]' : '';
    const left = `${marker} ${statusColor(c, row.status)('●')} ${row.displayName}${c.dim(stale)}`;
    const leftPlain = `${marker} ● ${row.displayName}${stale}`;

    const label = STATUS_LABEL[row.status];
    const ago = row.active ? '-' : formatTimeAgo(row.lastVisitedAt, now);
    const rightPlain = `${label}  ${ago}`;
    const right = `${statusColor(c, row.status)(label)}  ${c.dim(ago)}`;

    const padding = Math.max(1, width - leftPlain.length - rightPlain.length);
    return `${left}${' '.repeat(padding)}${right}`;
  });
}
