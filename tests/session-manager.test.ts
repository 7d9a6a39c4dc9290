import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SessionManagerClosedError } from '../src/errors.js';
import { SessionManager } from '../src/session-manager.js';
import { createRecordingLogger, FakeSessionFactory } from './fakes.js';

let factory: FakeSessionFactory;
let clock: number;
let manager: SessionManager;

beforeEach(() => {
  factory = new FakeSessionFactory();
  clock = 1_000;
  manager = new SessionManager({ factory, idleTimeoutMs: 5_000, now: () => clock });
});

afterEach(async () => {
  await manager.shutdown();
  vi.useRealTimers();
});

describe('SessionManager connect', () => {
  it('replaces the previous session and closes it once', async () => {
    const a = await manager.connect('s1', 'u', 'p', 'ws://x', {});
    const b = await manager.connect('s1', 'u', 'p', 'ws://x', { k: 'v' });

    expect(a).toBe(factory.opened[0]);
    expect(b).toBe(factory.opened[1]);
    expect(factory.opened[0].closeCount).toBe(1);
    expect(factory.opened[1].closeCount).toBe(0);
    expect(manager.get('s1')).toBe(b);
    expect(manager.size).toBe(1);
  });

  it('passes properties to the factory only when some are given', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x', {});
    await manager.connect('s2', 'u', 'p', 'ws://x', { $Region: 'EU' });

    expect('properties' in factory.requests[0]).toBe(false);
    expect(factory.requests[1].properties).toEqual({ $Region: 'EU' });
    expect(factory.requests[1]).toMatchObject({ principal: 'u', password: 'p', url: 'ws://x' });
  });

  it('keeps the working session when a reconnect fails to open', async () => {
    const a = await manager.connect('s1', 'u', 'p', 'ws://x');
    factory.failWith = new Error('authentication failed');

    await expect(manager.connect('s1', 'u', 'wrong', 'ws://x')).rejects.toThrow('authentication failed');
    expect(manager.get('s1')).toBe(a);
    expect(factory.opened[0].closeCount).toBe(0);
  });

  it('leaves one survivor when connects for the same caller overlap', async () => {
    factory.deferOpens = true;
    const first = manager.connect('s1', 'u', 'p', 'ws://x');
    const second = manager.connect('s1', 'u', 'p', 'ws://x');
    const [a, b] = factory.opened;

    factory.complete(b);
    factory.complete(a);
    await Promise.all([first, second]);

    expect(manager.size).toBe(1);
    expect(manager.get('s1')).toBe(a);
    expect(a.closeCount).toBe(0);
    expect(b.closeCount).toBe(1);
  });

  it('keeps the first session when an overlapping connect fails to open', async () => {
    factory.deferOpens = true;
    const first = manager.connect('s1', 'u', 'p', 'ws://x');
    const second = manager.connect('s1', 'u', 'wrong', 'ws://x');
    const [a, b] = factory.opened;

    factory.complete(a);
    factory.fail(b, new Error('authentication failed'));

    await expect(first).resolves.toBe(a);
    await expect(second).rejects.toThrow('authentication failed');
    expect(manager.get('s1')).toBe(a);
    expect(a.closeCount).toBe(0);
    expect(b.closeCount).toBe(0);
  });

  it('keeps callers independent', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    const s2 = await manager.connect('s2', 'u', 'p', 'ws://x');

    await manager.disconnect('s1');

    expect(manager.get('s1')).toBeUndefined();
    expect(manager.get('s2')).toBe(s2);
    expect(manager.callerIds()).toEqual(['s2']);
  });

  it('rejects connect after shutdown without opening a session', async () => {
    await manager.shutdown();

    await expect(manager.connect('s1', 'u', 'p', 'ws://x')).rejects.toBeInstanceOf(SessionManagerClosedError);
    expect(factory.requests).toHaveLength(0);
  });

  it('closes a session whose open completes after shutdown', async () => {
    factory.deferOpens = true;
    const pending = manager.connect('s1', 'u', 'p', 'ws://x');
    await manager.shutdown();

    factory.complete(factory.opened[0]);

    await expect(pending).rejects.toBeInstanceOf(SessionManagerClosedError);
    expect(factory.opened[0].closeCount).toBe(1);
    expect(manager.size).toBe(0);
  });
});

describe('SessionManager get and disconnect', () => {
  it('returns the same handle until disconnected', async () => {
    const a = await manager.connect('s1', 'u', 'p', 'ws://x');

    expect(manager.get('s1')).toBe(a);
    expect(manager.get('s1')).toBe(a);
    expect(manager.get('unknown')).toBeUndefined();
  });

  it('disconnect removes and closes a present session', async () => {
    const a = await manager.connect('s1', 'u', 'p', 'ws://x');

    const removed = await manager.disconnect('s1');

    expect(removed).toBe(a);
    expect(factory.opened[0].closeCount).toBe(1);
    expect(manager.get('s1')).toBeUndefined();
  });

  it('disconnect of an absent caller closes nothing', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');

    expect(await manager.disconnect('s2')).toBeUndefined();
    expect(factory.opened[0].closeCount).toBe(0);
  });

  it('disconnect still removes the entry when close fails', async () => {
    const logger = createRecordingLogger();
    await manager.shutdown();
    manager = new SessionManager({ factory, logger });
    await manager.connect('s1', 'u', 'p', 'ws://x');
    factory.opened[0].closeError = new Error('socket already gone');

    await manager.disconnect('s1');

    expect(manager.get('s1')).toBeUndefined();
    const failure = logger.records.find((record) => record.message === 'session_close_failed');
    expect(failure?.level).toBe('warn');
    expect(failure?.context).toMatchObject({ callerId: 's1', error: 'socket already gone' });
  });
});

describe('SessionManager sweep', () => {
  it('forgets a closed session without closing it again', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    factory.opened[0].state = 'closed';

    const result = await manager.sweep();

    expect(result).toEqual({ closed: ['s1'], idle: [] });
    expect(manager.get('s1')).toBeUndefined();
    expect(factory.opened[0].closeCount).toBe(0);
  });

  it('closes a session idle for longer than the timeout', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');

    clock += 5_000;
    expect(await manager.sweep()).toEqual({ closed: [], idle: [] });

    clock += 1;
    expect(await manager.sweep()).toEqual({ closed: [], idle: ['s1'] });
    expect(factory.opened[0].closeCount).toBe(1);
    expect(manager.size).toBe(0);
  });

  it('treats get as activity', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');

    clock += 4_000;
    manager.get('s1');
    clock += 4_000;
    expect((await manager.sweep()).idle).toEqual([]);

    clock += 1_001;
    expect((await manager.sweep()).idle).toEqual(['s1']);
  });

  it('keeps recovering sessions that are still active', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    factory.opened[0].state = 'recovering';

    expect(await manager.sweep()).toEqual({ closed: [], idle: [] });
    expect(manager.size).toBe(1);
  });

  it('skips a session whose state cannot be read', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    await manager.connect('s2', 'u', 'p', 'ws://x');
    factory.opened[0].stateError = new Error('state unavailable');
    factory.opened[1].state = 'closed';

    const result = await manager.sweep();

    expect(result).toEqual({ closed: ['s2'], idle: [] });
    expect(manager.callerIds()).toEqual(['s1']);
  });

  it('runs periodically on its timer', async () => {
    await manager.shutdown();
    vi.useFakeTimers();
    manager = new SessionManager({ factory, idleTimeoutMs: 5_000, sweepIntervalMs: 1_000 });
    await manager.connect('s1', 'u', 'p', 'ws://x');

    await vi.advanceTimersByTimeAsync(5_000);
    expect(manager.size).toBe(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(manager.size).toBe(0);
    expect(factory.opened[0].closeCount).toBe(1);
  });
});

describe('SessionManager listener', () => {
  it('forgets a session the server closed', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');

    factory.opened[0].closeFromServer();

    expect(manager.get('s1')).toBeUndefined();
    expect(factory.opened[0].closeCount).toBe(0);
  });

  it('ignores a late close of a replaced session', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    const b = await manager.connect('s1', 'u', 'p', 'ws://x');

    factory.opened[0].closeFromServer();

    expect(manager.get('s1')).toBe(b);
  });

  it('keeps the entry for non-terminal state changes', async () => {
    const a = await manager.connect('s1', 'u', 'p', 'ws://x');

    factory.requests[0].listener.onStateChange(a, 'connected', 'recovering');

    expect(manager.get('s1')).toBe(a);
  });
});

describe('SessionManager shutdown', () => {
  it('closes and forgets every session', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    await manager.connect('s2', 'u', 'p', 'ws://x');

    await manager.shutdown();

    expect(factory.opened.map((session) => session.closeCount)).toEqual([1, 1]);
    expect(manager.get('s1')).toBeUndefined();
    expect(manager.get('s2')).toBeUndefined();
    expect(manager.isShutdown).toBe(true);
  });

  it('closes the rest when one close fails', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');
    await manager.connect('s2', 'u', 'p', 'ws://x');
    factory.opened[0].closeError = new Error('boom');

    await expect(manager.shutdown()).resolves.toBeUndefined();
    expect(factory.opened[1].closeCount).toBe(1);
  });

  it('is idempotent', async () => {
    await manager.connect('s1', 'u', 'p', 'ws://x');

    await manager.shutdown();
    await manager.shutdown();

    expect(factory.opened[0].closeCount).toBe(1);
  });

  it('stops the sweep timer', async () => {
    await manager.shutdown();
    vi.useFakeTimers();
    manager = new SessionManager({ factory, sweepIntervalMs: 1_000 });
    expect(vi.getTimerCount()).toBe(1);

    await manager.shutdown();

    expect(vi.getTimerCount()).toBe(0);
  });
});
