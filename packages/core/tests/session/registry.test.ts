import { describe, it, expect, vi } from 'vitest';
import { SessionRegistry, applyTransition } from '../../src/session/registry.js';
import type { RegistryChange } from '../../src/session/registry.js';
import { SessionStatus, newSession } from '../../src/session/types.js';

describe('newSession', () => {
  it('starts working with no history', () => {
    const s = newSession('pw-foo', 'foo', 1_000);
    expect(s).toEqual({
      id: 'pw-foo',
      displayName: 'foo',
      createdAt: 1_000,
      status: SessionStatus.Working,
      previousStatus: null,
      lastOutputFingerprint: null,
      lastChangedAt: 1_000,
      acknowledged: false,
      lastVisitedAt: 1_000,
      captureFailures: 0,
      stale: false,
      lastCycle: 0,
    });
  });
});

describe('applyTransition', () => {
  it('records the previous status', () => {
    const next = applyTransition(newSession('a', 'a', 0), SessionStatus.Ready);
    expect(next.status).toBe(SessionStatus.Ready);
    expect(next.previousStatus).toBe(SessionStatus.Working);
  });

  it('sets acknowledged on seen and clears it on working', () => {
    const seen = applyTransition({ ...newSession('a', 'a', 0), status: SessionStatus.Ready }, SessionStatus.Seen);
    expect(seen.acknowledged).toBe(true);
    expect(applyTransition(seen, SessionStatus.Working).acknowledged).toBe(false);
  });

  it('returns the same object when the status is unchanged', () => {
    const s = newSession('a', 'a', 0);
    expect(applyTransition(s, SessionStatus.Working)).toBe(s);
  });
});

describe('SessionRegistry', () => {
  it('stores frozen copies', () => {
    const registry = new SessionRegistry();
    const input = newSession('pw-a', 'a', 0);
    registry.upsert(input);

    const stored = registry.get('pw-a');
    expect(stored).toEqual(input);
    expect(stored).not.toBe(input);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('lists by creation time, then id', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-c', 'c', 200));
    registry.upsert(newSession('pw-b', 'b', 100));
    registry.upsert(newSession('pw-a', 'a', 200));

    expect(registry.list().map((s) => s.id)).toEqual(['pw-b', 'pw-a', 'pw-c']);
    expect(registry.size).toBe(3);
  });

  it('update returns false for an unknown id', () => {
    const registry = new SessionRegistry();
    expect(registry.update('missing', (s) => s)).toBe(false);
  });

  it('update never moves lastChangedAt backwards or changes identity fields', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-a', 'a', 5_000));

    registry.update('pw-a', (s) => ({ ...s, id: 'other', createdAt: 1, lastChangedAt: 10, displayName: 'renamed' }));

    const stored = registry.get('pw-a');
    expect(stored?.id).toBe('pw-a');
    expect(stored?.createdAt).toBe(5_000);
    expect(stored?.lastChangedAt).toBe(5_000);
    expect(stored?.displayName).toBe('renamed');
    expect(registry.has('other')).toBe(false);
  });

  it('transition applies status bookkeeping', () => {
    const registry = new SessionRegistry();
    registry.upsert({ ...newSession('pw-a', 'a', 0), status: SessionStatus.Ready });

    expect(registry.transition('pw-a', SessionStatus.Seen)).toBe(true);
    expect(registry.get('pw-a')).toMatchObject({
      status: SessionStatus.Seen,
      previousStatus: SessionStatus.Ready,
      acknowledged: true,
    });
  });

  it('transition is a no-op for the same status or a removed session', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-a', 'a', 0));
    const before = registry.version;

    expect(registry.transition('pw-a', SessionStatus.Working)).toBe(false);
    expect(registry.transition('gone', SessionStatus.Ready)).toBe(false);
    expect(registry.version).toBe(before);
  });

  it('remove is idempotent and clears the active session', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-a', 'a', 0));
    registry.setActive('pw-a');
    expect(registry.activeId).toBe('pw-a');

    expect(registry.remove('pw-a')).toBe(true);
    expect(registry.remove('pw-a')).toBe(false);
    expect(registry.activeId).toBeNull();
  });

  it('reports ids removed after a given version', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-a', 'a', 0));
    const before = registry.version;

    registry.remove('pw-a');

    expect(registry.removedSince('pw-a', before)).toBe(true);
    expect(registry.removedSince('pw-a', registry.version)).toBe(false);
    expect(registry.removedSince('pw-b', before)).toBe(false);

    registry.upsert(newSession('pw-a', 'a', 0));
    expect(registry.removedSince('pw-a', before)).toBe(false);
  });

  it('ignores setActive for unknown ids', () => {
    const registry = new SessionRegistry();
    registry.setActive('nope');
    expect(registry.activeId).toBeNull();
  });

  it('projects views with the active flag', () => {
    const registry = new SessionRegistry();
    registry.upsert(newSession('pw-a', 'a', 0));
    registry.upsert(newSession('pw-b', 'b', 1));
    registry.setActive('pw-b');

    expect(registry.view().map((v) => [v.id, v.active])).toEqual([
      ['pw-a', false],
      ['pw-b', true],
    ]);
    expect(registry.viewOf('pw-b')).toEqual({
      id: 'pw-b',
      displayName: 'b',
      status: SessionStatus.Working,
      createdAt: 1,
      lastVisitedAt: 1,
      stale: false,
      active: true,
    });
    expect(registry.viewOf('missing')).toBeUndefined();
  });

  it('notifies subscribers after each mutation', () => {
    const registry = new SessionRegistry();
    const changes: RegistryChange[] = [];
    const unsubscribe = registry.subscribe((c) => changes.push(c));

    registry.upsert(newSession('pw-a', 'a', 0));
    registry.update('pw-a', (s) => ({ ...s, displayName: 'x' }));
    registry.remove('pw-a');
    unsubscribe();
    registry.upsert(newSession('pw-b', 'b', 0));

    expect(changes.map((c) => [c.kind, c.id])).toEqual([
      ['upsert', 'pw-a'],
      ['update', 'pw-a'],
      ['remove', 'pw-a'],
    ]);
    expect(changes[1].session?.displayName).toBe('x');
    expect(changes[2].session).toBeNull();
  });

  it('keeps notifying when a listener throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const registry = new SessionRegistry();
    const seen: string[] = [];
    registry.subscribe(() => {
      throw new Error('listener bug');
    });
    registry.subscribe((c) => seen.push(c.id));

    registry.upsert(newSession('pw-a', 'a', 0));

    expect(seen).toEqual(['pw-a']);
    expect(registry.has('pw-a')).toBe(true);
  });
});
