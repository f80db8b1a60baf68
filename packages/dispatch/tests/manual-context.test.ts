import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DispatchSlot } from '../src/core/dispatch-slot.js';
import { ManualDispatchContext } from '../src/core/manual-context.js';
import { EmptyQueueError, InvalidCallbackError } from '../src/errors/errors.js';

describe('ManualDispatchContext queue and pump', () => {
  let slot: DispatchSlot;

  beforeEach(() => {
    slot = new DispatchSlot();
  });

  it('runs posted callbacks in FIFO order', () => {
    const context = new ManualDispatchContext({ slot });
    const seen: string[] = [];

    context.post((s) => seen.push(s), 'a');
    context.post((s) => seen.push(s), 'b');
    context.post((s) => seen.push(s), 'c');

    expect(seen).toEqual([]);
    expect(context.runAll()).toBe(3);
    expect(seen).toEqual(['a', 'b', 'c']);
    expect(context.isEmpty).toBe(true);
  });

  it('passes the posted state to the callback', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    const callback = vi.fn();
    const state = { id: 42 };

    context.post(callback, state);
    context.runOne();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(state);
  });

  it('drains callbacks posted while draining', () => {
    const context = new ManualDispatchContext({ slot });
    const seen: string[] = [];

    context.post(() => {
      seen.push('a');
      context.post(() => seen.push('d'), undefined);
    }, undefined);
    context.post(() => seen.push('b'), undefined);
    context.post(() => seen.push('c'), undefined);

    expect(context.runAll()).toBe(4);
    expect(seen).toEqual(['a', 'b', 'c', 'd']);
    expect(context.pendingCount).toBe(0);
  });

  it('follows a chain of continuations to its end', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    const seen: number[] = [];
    const step = (n: number): void => {
      seen.push(n);
      if (n < 5) context.post(step, n + 1);
    };

    context.post(step, 1);

    expect(context.runAll()).toBe(5);
    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it('tracks pending count across posts and runs', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    for (let i = 0; i < 5; i++) context.post(() => undefined, i);

    expect(context.pendingCount).toBe(5);
    context.runOne();
    context.runOne();
    expect(context.pendingCount).toBe(3);
    expect(context.isEmpty).toBe(false);
  });

  it('returns zero from runAll on an empty queue', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    expect(context.runAll()).toBe(0);
  });

  it('throws EmptyQueueError from runOne on an empty queue', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    expect(() => context.runOne()).toThrow(EmptyQueueError);
  });

  it('rejects a missing callback', () => {
    const context = new ManualDispatchContext({ slot, install: false });

    expect(() => context.post(undefined as never, 1)).toThrow(InvalidCallbackError);
    expect(() => context.post(null as never, 1)).toThrow(InvalidCallbackError);
    expect(context.pendingCount).toBe(0);
  });

  it('propagates callback errors and does not retry the callback', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    const after = vi.fn();

    context.post(() => {
      throw new Error('boom');
    }, undefined);
    context.post(after, undefined);

    expect(() => context.runOne()).toThrow('boom');
    expect(context.pendingCount).toBe(1);

    context.runOne();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('stops runAll at a throwing callback and keeps the rest queued', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    const seen: number[] = [];

    context.post(() => seen.push(1), undefined);
    context.post(() => {
      throw new Error('second');
    }, undefined);
    context.post(() => seen.push(3), undefined);

    expect(() => context.runAll()).toThrow('second');
    expect(seen).toEqual([1]);
    expect(context.pendingCount).toBe(1);

    context.runAll();
    expect(seen).toEqual([1, 3]);
  });

  it('works as a plain queue while not installed', () => {
    const context = new ManualDispatchContext({ slot, install: false });
    const seen: number[] = [];

    context.post((n) => seen.push(n), 1);
    context.runAll();

    expect(seen).toEqual([1]);
    expect(context.isInstalled).toBe(false);
    expect(slot.current).toBeUndefined();
  });

  describe('post listeners', () => {
    it('reports the pending count after each post', () => {
      const counts: number[] = [];
      const context = new ManualDispatchContext({
        slot,
        install: false,
        onPost: (count) => counts.push(count),
      });

      context.post(() => undefined, 1);
      context.post(() => undefined, 2);
      context.runOne();
      context.post(() => undefined, 3);

      expect(counts).toEqual([1, 2, 2]);
    });

    it('stops notifying after unsubscribe', () => {
      const context = new ManualDispatchContext({ slot, install: false });
      const listener = vi.fn();
      const off = context.onPost(listener);

      context.post(() => undefined, 1);
      off();
      context.post(() => undefined, 2);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(1);
    });

    it('notifies only after the callback is queued', () => {
      const context = new ManualDispatchContext({ slot, install: false });
      let observed = -1;
      context.onPost(() => {
        observed = context.pendingCount;
      });

      context.post(() => undefined, undefined);

      expect(observed).toBe(1);
    });
  });

  it('assigns distinct default names and honours an explicit name', () => {
    const a = new ManualDispatchContext({ slot, install: false });
    const b = new ManualDispatchContext({ slot, install: false });
    const named = new ManualDispatchContext({ slot, install: false, name: 'ui' });

    expect(a.name).toMatch(/^context_\d+$/);
    expect(b.name).not.toBe(a.name);
    expect(named.name).toBe('ui');
  });
});
