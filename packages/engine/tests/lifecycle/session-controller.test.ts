import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AlreadyExistsError,
  DuplicateNameError,
  ExternalCommandError,
  NoClientError,
  NotFoundError,
  SessionRegistry,
  SessionStatus,
  TimeoutError,
  ValidationError,
  newSession,
} from '@paneward/core';
import type { RecentDirectoryStore } from '@paneward/core';
import { SessionController } from '../../src/lifecycle/session-controller.js';
import type { CommandError, CommandResult } from '../../src/types/index.js';
import { FakePaneSource } from '../helpers/fake-source.js';

let registry: SessionRegistry;
let source: FakePaneSource;
let remembered: string[];
let recentDirectories: RecentDirectoryStore;
let controller: SessionController;

function expectOk<T>(result: CommandResult<T>): T {
  if (!result.ok) throw new Error(`expected success, got ${result.error.message}`);
  return result.value;
}

function expectError<T>(result: CommandResult<T>): CommandError {
  if (result.ok) throw new Error('expected a failure');
  return result.error;
}

beforeEach(() => {
  registry = new SessionRegistry();
  source = new FakePaneSource();
  remembered = [];
  recentDirectories = {
    load: async () => [...remembered],
    remember: async (dir) => {
      remembered.unshift(dir);
    },
    forget: async () => false,
  };
  controller = new SessionController(
    { registry, source, recentDirectories, clock: () => 10_000, random: () => 0 },
    { sessionPrefix: 'pw', launchCommand: 'claude', commandTimeoutMs: 500 },
  );
});

afterEach(() => {
  vi.useRealTimers();
});

describe('SessionController.create', () => {
  it('creates the tmux session and registers it as working', async () => {
    const view = expectOk(await controller.create('foo'));

    expect(view).toEqual({
      id: 'pw-foo',
      displayName: 'foo',
      status: SessionStatus.Working,
      createdAt: 10_000,
      lastVisitedAt: 10_000,
      stale: false,
      active: false,
    });
    expect(source.created).toEqual([
      { id: 'pw-foo', options: { displayName: 'foo', directory: undefined, command: 'claude' } },
    ]);
    expect(registry.has('pw-foo')).toBe(true);
  });

  it('generates a name when none is given', async () => {
    const view = expectOk(await controller.create('  '));
    expect(view.id).toBe('pw-swift-fox');
    expect(view.displayName).toBe('swift-fox');
  });

  it('rejects a name tmux cannot target', async () => {
    const error = expectError(await controller.create('a:b'));
    expect(error).toBeInstanceOf(ValidationError);
    expect(source.created).toEqual([]);
  });

  it('rejects a name already tracked', async () => {
    expectOk(await controller.create('foo'));
    const error = expectError(await controller.create('foo'));

    expect(error).toBeInstanceOf(DuplicateNameError);
    expect(error.code).toBe('DUPLICATE_NAME');
    expect(source.created).toHaveLength(1);
  });

  it('rejects a second create for a name still being created', async () => {
    const [first, second] = await Promise.all([controller.create('foo'), controller.create('foo')]);

    expect(first.ok).toBe(true);
    expect(expectError(second)).toBeInstanceOf(DuplicateNameError);
    expect(source.created).toHaveLength(1);
  });

  it('surfaces a tmux name clash as AlreadyExists', async () => {
    source.panes.set('pw-foo', '');
    expect(expectError(await controller.create('foo'))).toBeInstanceOf(AlreadyExistsError);
    expect(registry.has('pw-foo')).toBe(false);
  });

  it('leaves no entry behind when tmux fails', async () => {
    source.createFailure = new ExternalCommandError('tmux new-session failed: boom');

    const error = expectError(await controller.create('foo'));
    expect(error).toBeInstanceOf(ExternalCommandError);
    expect(error.message).toBe('tmux new-session failed: boom');
    expect(registry.size).toBe(0);

    source.createFailure = null;
    expect(expectOk(await controller.create('foo')).id).toBe('pw-foo');
  });

  it('wraps unexpected failures', async () => {
    source.createFailure = new Error('socket closed');
    const error = expectError(await controller.create('foo'));
    expect(error).toBeInstanceOf(ExternalCommandError);
    expect(error.message).toBe('socket closed');
  });

  it('times out a hung create without registering it', async () => {
    vi.useFakeTimers();
    source.createImpl = () => new Promise<void>(() => undefined);

    const pending = controller.create('foo');
    await vi.advanceTimersByTimeAsync(3_000);
    const error = expectError(await pending);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('new-session pw-foo timed out after 3000ms');
    expect(registry.has('pw-foo')).toBe(false);
  });

  it('allows each tmux call its own budget during a slow create', async () => {
    vi.useFakeTimers();
    // six sequential calls of 400ms each, every one inside the 500ms budget
    source.createImpl = async (id) => {
      for (let call = 0; call < 6; call++) {
        await new Promise<void>((resolve) => setTimeout(resolve, 400));
      }
      source.panes.set(id, '');
    };

    const pending = controller.create('foo');
    await vi.advanceTimersByTimeAsync(2_400);
    const view = expectOk(await pending);

    expect(view.id).toBe('pw-foo');
    expect(registry.has('pw-foo')).toBe(true);
  });

  it('keeps the label when the poller adopted the session first', async () => {
    source.createImpl = async (id) => {
      registry.upsert(newSession(id, 'adopted', 9_000));
    };

    const view = expectOk(await controller.create('foo'));
    expect(view.displayName).toBe('foo');
    expect(view.createdAt).toBe(9_000);
  });

  it('passes the start directory and remembers it', async () => {
    expectOk(await controller.create('foo', { directory: '/work/app' }));

    expect(source.created[0].options.directory).toBe('/work/app');
    expect(remembered).toEqual(['/work/app']);
  });

  it('warns when the directory cannot be remembered', async () => {
    recentDirectories.remember = async () => {
      throw new Error('disk full');
    };

    const result = await controller.create('foo', { directory: '/work/app' });
    expect(result).toMatchObject({ ok: true, warning: 'Could not remember directory: disk full' });
  });

  it('launches a bare shell for an empty command', async () => {
    expectOk(await controller.create('foo', { command: '' }));
    expect(source.created[0].options.command).toBeUndefined();
  });
});

describe('SessionController.rename', () => {
  it('changes only the label', async () => {
    expectOk(await controller.create('foo'));

    const view = expectOk(controller.rename('pw-foo', '  API work '));
    expect(view).toMatchObject({ id: 'pw-foo', displayName: 'API work' });
  });

  it('fails for an unknown session', () => {
    expect(expectError(controller.rename('pw-nope', 'x'))).toBeInstanceOf(NotFoundError);
  });

  it('rejects an empty label', async () => {
    expectOk(await controller.create('foo'));
    expect(expectError(controller.rename('pw-foo', '   '))).toBeInstanceOf(ValidationError);
  });
});

describe('SessionController.delete', () => {
  it('is idempotent', async () => {
    expectOk(await controller.create('foo'));

    const first = await controller.delete('pw-foo');
    expect(first).toEqual({ ok: true, value: undefined });
    expect(registry.has('pw-foo')).toBe(false);

    const second = await controller.delete('pw-foo');
    expect(second.ok).toBe(true);
    expect(second.ok && second.warning).toBe(
      "Session pw-foo could not be killed: can't find session: pw-foo",
    );
  });

  it('moves clients off the active session first', async () => {
    expectOk(await controller.create('a'));
    expectOk(await controller.create('b'));
    registry.setActive('pw-a');

    expectOk(await controller.delete('pw-a'));

    expect(source.switched).toEqual(['pw-b']);
    expect(registry.activeId).toBe('pw-b');
    expect(source.deleted).toEqual(['pw-a']);
  });
});

describe('SessionController.acknowledge', () => {
  it('moves ready to seen', () => {
    registry.upsert({ ...newSession('pw-a', 'a', 0), status: SessionStatus.Ready });

    const view = expectOk(controller.acknowledge('pw-a'));
    expect(view.status).toBe(SessionStatus.Seen);
    expect(registry.get('pw-a')?.acknowledged).toBe(true);
  });

  it('leaves other statuses alone', () => {
    registry.upsert({ ...newSession('pw-a', 'a', 0), status: SessionStatus.NeedsInput });
    expect(expectOk(controller.acknowledge('pw-a')).status).toBe(SessionStatus.NeedsInput);
  });

  it('fails for an unknown session', () => {
    expect(expectError(controller.acknowledge('pw-nope'))).toBeInstanceOf(NotFoundError);
  });
});

describe('SessionController.switchTo', () => {
  it('switches clients, marks the session visited and acknowledges it', async () => {
    registry.upsert({ ...newSession('pw-a', 'a', 0), status: SessionStatus.Ready });

    const view = expectOk(await controller.switchTo('pw-a'));

    expect(source.switched).toEqual(['pw-a']);
    expect(view).toMatchObject({ status: SessionStatus.Seen, active: true, lastVisitedAt: 10_000 });
  });

  it('reports when no client is attached', async () => {
    source.clients = 0;
    registry.upsert(newSession('pw-a', 'a', 0));

    expect(expectError(await controller.switchTo('pw-a'))).toBeInstanceOf(NoClientError);
    expect(registry.activeId).toBeNull();
  });

  it('allows list-clients and several switch-client calls to finish', async () => {
    vi.useFakeTimers();
    registry.upsert(newSession('pw-a', 'a', 0));
    source.switchImpl = async () => {
      for (let call = 0; call < 3; call++) {
        await new Promise<void>((resolve) => setTimeout(resolve, 400));
      }
      return true;
    };

    const pending = controller.switchTo('pw-a');
    await vi.advanceTimersByTimeAsync(1_200);
    const view = expectOk(await pending);

    expect(view.active).toBe(true);
  });

  it('fails for an unknown session', async () => {
    expect(expectError(await controller.switchTo('pw-nope'))).toBeInstanceOf(NotFoundError);
    expect(source.switched).toEqual([]);
  });
});
