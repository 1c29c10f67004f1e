/** Formats elapsed time as a compact label: now, 5m, 3h, 2d, 1w. */
export function formatTimeAgo(since: number, now: number = Date.now()): string {
  const seconds = Math.floor((now - since) / 1000);

  if (seconds < 60) return 'now';
  if (seconds < 3_600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86_400) return `${Math.floor(seconds / 3_600)}h`;
  if (seconds < 604_800) return `${Math.floor(seconds / 86_400)}d`;
  return `${Math.floor(seconds / 604_800)}w`;
}
