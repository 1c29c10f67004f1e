import { describe, it, expect, vi, afterEach } from 'vitest';
import { generateSessionName } from '../../src/utils/names.js';
import { formatTimeAgo } from '../../src/utils/time.js';
import { withTimeout } from '../../src/utils/timeout.js';
import { expandHome, getConfigPath, getHomeDir, getRecentDirectoriesPath } from '../../src/utils/paths.js';
import { SESSION_NAME_PATTERN } from '../../src/session/naming.js';
import { TimeoutError } from '../../src/errors.js';
import os from 'node:os';
import path from 'node:path';

afterEach(() => {
  vi.useRealTimers();
});

describe('generateSessionName', () => {
  it('picks an adjective then a noun', () => {
    const values = [0.5, 0.25];
    expect(generateSessionName(() => values.shift() ?? 0)).toBe('keen-lynx');
  });

  it('covers both ends of the word lists', () => {
    expect(generateSessionName(() => 0)).toBe('swift-fox');
    expect(generateSessionName(() => 0.999)).toBe('clear-prism');
  });

  it('produces valid session names', () => {
    expect(SESSION_NAME_PATTERN.test(generateSessionName())).toBe(true);
  });
});

describe('formatTimeAgo', () => {
  it('formats compact labels', () => {
    expect(formatTimeAgo(0, 59_999)).toBe('now');
    expect(formatTimeAgo(0, 60_000)).toBe('1m');
    expect(formatTimeAgo(0, 3_600_000)).toBe('1h');
    expect(formatTimeAgo(0, 2 * 86_400_000)).toBe('2d');
    expect(formatTimeAgo(0, 3 * 604_800_000)).toBe('3w');
  });
});

describe('withTimeout', () => {
  it('resolves with the value and clears its timer', async () => {
    vi.useFakeTimers();
    await expect(withTimeout(Promise.resolve(42), 1_000, 'op')).resolves.toBe(42);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('passes rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1_000, 'op')).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError when the budget runs out', async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 100, 'capture-pane pw-a');
    const assertion = expect(pending).rejects.toThrow(TimeoutError);

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    await expect(pending).rejects.toThrow('capture-pane pw-a timed out after 100ms');
  });
});

describe('paths', () => {
  it('honours PANEWARD_HOME', () => {
    const env = { PANEWARD_HOME: '/tmp/pw-home' };
    expect(getHomeDir(env)).toBe('/tmp/pw-home');
    expect(getConfigPath(env)).toBe('/tmp/pw-home/config.yaml');
    expect(getRecentDirectoriesPath(env)).toBe('/tmp/pw-home/paths.txt');
  });

  it('defaults to ~/.paneward', () => {
    expect(getHomeDir({})).toBe(path.join(os.homedir(), '.paneward'));
  });

  it('expands a leading tilde', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/code')).toBe(path.join(os.homedir(), 'code'));
    expect(expandHome('/abs/dir/')).toBe('/abs/dir');
  });
});
