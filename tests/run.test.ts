import { describe, expect, it, vi } from 'vitest';
import { LayeredStore } from '../src/index';

describe('run()', () => {
  it('commits and returns the callback result', () => {
    const store = new LayeredStore<number>();
    store.set('balance', 100);

    const result = store.run((s) => {
      s.set('balance', (s.get('balance') ?? 0) - 10);
      return s.get('balance');
    });

    expect(result).toBe(90);
    expect(store.depth).toBe(0);
    expect(store['base'].get('balance')).toBe(90);
  });

  it('commits into the enclosing transaction when nested', () => {
    const store = new LayeredStore<number>();
    store.begin();
    store.run((s) => s.set('a', 1));

    expect(store.depth).toBe(1);
    expect(store.get('a')).toBe(1);
    store.rollback();
    expect(store.has('a')).toBe(false);
  });

  it('rolls back and rethrows when the callback throws', () => {
    const store = new LayeredStore<number>();
    store.set('a', 1);

    expect(() =>
      store.run((s) => {
        s.set('a', 2);
        s.begin();
        s.set('b', 3);
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(store.depth).toBe(0);
    expect(store.get('a')).toBe(1);
    expect(store.has('b')).toBe(false);
  });

  it('rejects an async callback and rolls its writes back', async () => {
    const store = new LayeredStore<number>();

    let pending: Promise<void> | undefined;
    expect(() =>
      store.run((s) => {
        s.set('a', 1);
        pending = Promise.resolve();
        return pending;
      }),
    ).toThrow('LayeredStore: run() was given an asynchronous callback');

    await pending;
    expect(store.depth).toBe(0);
    expect(store.has('a')).toBe(false);
  });

  it('rejects a callback that commits the transaction it was given', () => {
    const onRollback = vi.fn();
    const store = new LayeredStore<number>({ onRollback });
    store.begin();

    expect(() =>
      store.run((s) => {
        s.set('a', 1);
        s.commit();
      }),
    ).toThrow('LayeredStore: run() callback left the transaction stack unbalanced.');

    // The outer transaction is left in place; the committed write now lives in it.
    expect(store.depth).toBe(1);
    expect(store.get('a')).toBe(1);
    expect(onRollback).not.toHaveBeenCalled();
  });

  it('rejects a callback that leaves a nested transaction open, rolling both back', () => {
    const store = new LayeredStore<number>();

    expect(() =>
      store.run((s) => {
        s.set('a', 1);
        s.begin();
        s.set('b', 2);
      }),
    ).toThrow('unbalanced');

    expect(store.depth).toBe(0);
    expect(store.keys()).toEqual([]);
  });

  it('unwinds every layer and rethrows the callback error even when onRollback throws', () => {
    const onRollback = vi.fn(() => {
      throw new Error('hook');
    });
    const store = new LayeredStore<number>({ onRollback });
    store.set('a', 1);

    expect(() =>
      store.run((s) => {
        s.set('a', 2);
        s.begin();
        s.set('b', 1);
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(store.depth).toBe(0);
    expect(store.get('a')).toBe(1);
    expect(store.has('b')).toBe(false);
    expect(onRollback).not.toHaveBeenCalled();
  });
});
