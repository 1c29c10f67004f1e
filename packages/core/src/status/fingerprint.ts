import crypto from 'node:crypto';

/**
 * Normalizes a raw pane capture so cosmetic redraws (cursor blink, trailing
 * padding, a blank last row) do not count as output changes.
 *
 * CRLF becomes LF, trailing whitespace is trimmed per line, trailing blank
 * lines are dropped, and only the last `maxLines` lines are kept.
 */
export function normalizePane(raw: string, maxLines: number = Number.POSITIVE_INFINITY): string {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n').map((line) => line.trimEnd());

  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const kept = lines.length > maxLines ? lines.slice(lines.length - maxLines) : lines;
  return kept.join('\n');
}

/** SHA-256 hex digest of already-normalized pane text. */
export function fingerprint(normalized: string): string {
  return crypto.createHash('sha256').update(normalized, 'utf8').digest('hex');
}
