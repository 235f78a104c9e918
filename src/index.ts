import type { z } from 'zod';
import { type BaseStore, InMemoryStore } from './modules/base';
import { TransactionLayer } from './modules/layer';
import { parseSnapshot } from './modules/snapshot';
import type { BeginEvent, CommitEvent, RollbackEvent, StoreSnapshot } from './types';

export { type BaseStore, InMemoryStore } from './modules/base';
export { TransactionLayer } from './modules/layer';
export { parseSnapshot, snapshotShapeSchema } from './modules/snapshot';
export * from './types';

export interface LayeredStoreConfig<V> {
  /** Committed mapping. Defaults to a fresh InMemoryStore. */
  base?: BaseStore<V>;
  /**
   * Lifecycle hook fired after begin() pushes a layer.
   * Hooks run synchronously once the state change is complete; route them to
   * your logger or metrics as needed.
   */
  onBegin?: (event: BeginEvent) => void;
  /** Fired after commit() merges a layer. Not fired when commit() returns false. */
  onCommit?: (event: CommitEvent<V>) => void;
  /** Fired after rollback() discards a layer. Not fired when rollback() returns false. */
  onRollback?: (event: RollbackEvent<V>) => void;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
  );
}

/**
 * In-memory key-value store with nested, rollback-capable transactions.
 *
 * Reads see the innermost transaction first, then each outer one, then the
 * committed mapping. Outside a transaction, writes go straight to the
 * committed mapping.
 *
 * @example
 * const store = new LayeredStore<number>();
 * store.set('a', 1);
 * store.begin();
 * store.set('a', 10);
 * store.rollback();
 * store.get('a'); // 1
 */
export class LayeredStore<V = unknown> {
  private base: BaseStore<V>;
  /** Innermost last. */
  private layers: TransactionLayer<V>[] = [];
  private onBegin?: (event: BeginEvent) => void;
  private onCommit?: (event: CommitEvent<V>) => void;
  private onRollback?: (event: RollbackEvent<V>) => void;

  constructor(config: LayeredStoreConfig<V> = {}) {
    this.base = config.base ?? new InMemoryStore<V>();
    this.onBegin = config.onBegin;
    this.onCommit = config.onCommit;
    this.onRollback = config.onRollback;
  }

  /**
   * Validates untrusted data (e.g. a snapshot read back from JSON) and returns
   * a typed snapshot for restore(). Each stored value is parsed with `schema`.
   */
  public static parseSnapshot<V>(
    schema: z.ZodType<V, z.ZodTypeDef, unknown>,
    data: unknown,
  ): StoreSnapshot<V> {
    return parseSnapshot(schema, data);
  }

  /** Number of active transactions. */
  public get depth(): number {
    return this.layers.length;
  }

  public inTransaction(): boolean {
    return this.layers.length > 0;
  }

  /**
   * Returns the visible value for the key, or undefined when it is absent or
   * deleted by an active transaction.
   */
  public get(key: string): V | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const entry = this.layers[i].lookup(key);
      if (entry) return entry.kind === 'value' ? entry.value : undefined;
    }
    return this.base.get(key);
  }

  /**
   * Whether the key is visible. Unlike get(), this tells a stored
   * `undefined` apart from an absent key.
   */
  public has(key: string): boolean {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const entry = this.layers[i].lookup(key);
      if (entry) return entry.kind === 'value';
    }
    return this.base.has(key);
  }

  /** All visible keys, in no particular order. */
  public keys(): string[] {
    const visible = new Set(this.base.keys());
    for (const layer of this.layers) {
      for (const [key, entry] of layer.entries()) {
        if (entry.kind === 'tombstone') {
          visible.delete(key);
        } else {
          visible.add(key);
        }
      }
    }
    return Array.from(visible);
  }

  public set(key: string, value: V): void {
    const layer = this.layers.at(-1);
    if (layer) {
      layer.set(key, value);
    } else {
      this.base.set(key, value);
    }
  }

  /** Deleting a key that does not exist is a no-op. */
  public delete(key: string): void {
    const layer = this.layers.at(-1);
    if (layer) {
      layer.delete(key);
    } else {
      this.base.delete(key);
    }
  }

  public begin(): true {
    this.layers.push(new TransactionLayer<V>());
    this.onBegin?.({ depth: this.layers.length });
    return true;
  }

  /**
   * Merges the innermost transaction into its parent, or into the committed
   * mapping when it is the outermost one.
   * Returns false, changing nothing, when no transaction is active.
   */
  public commit(): boolean {
    const layer = this.layers.pop();
    if (!layer) return false;

    const parent = this.layers.at(-1);
    if (parent) {
      layer.mergeInto(parent);
    } else {
      layer.applyTo(this.base);
    }

    this.onCommit?.({
      depth: this.layers.length,
      target: parent ? 'layer' : 'base',
      changes: layer.toRecord(),
    });
    return true;
  }

  /**
   * Discards the innermost transaction.
   * Returns false, changing nothing, when no transaction is active.
   */
  public rollback(): boolean {
    const layer = this.layers.pop();
    if (!layer) return false;

    this.onRollback?.({ depth: this.layers.length, discarded: layer.toRecord() });
    return true;
  }

  /**
   * Runs `fn` inside a new transaction. Commits and returns its result on
   * success; rolls back and rethrows if it throws.
   *
   * `fn` must be synchronous and must leave the transaction it was given open.
   * Nested transactions it begins must be resolved before it returns.
   * Layers discarded because `fn` failed do not fire onRollback; the thrown
   * error is the report.
   *
   * @example
   * const total = store.run((s) => {
   *   s.set('balance', (s.get('balance') ?? 0) - 10);
   *   return s.get('balance');
   * });
   */
  public run<T>(fn: (store: this) => T): T {
    const entryDepth = this.layers.length;
    this.begin();
    const layer = this.layers[entryDepth];

    let result: T;
    try {
      result = fn(this);
    } catch (error) {
      this.unwindTo(entryDepth);
      throw error;
    }

    if (isPromiseLike(result)) {
      this.unwindTo(entryDepth);
      throw new Error(
        'LayeredStore: run() was given an asynchronous callback, but store operations are synchronous. Await the async work first, then call run().',
      );
    }

    if (this.layers.length !== entryDepth + 1 || this.layers[entryDepth] !== layer) {
      this.unwindTo(entryDepth);
      throw new Error('LayeredStore: run() callback left the transaction stack unbalanced.');
    }

    this.commit();
    return result;
  }

  /**
   * Captures an immutable copy of the committed mapping and every active
   * transaction. Stored values are shared, not cloned.
   *
   * @example
   * const snap = store.snapshot('before import');
   * // ... risky writes ...
   * store.restore(snap);
   */
  public snapshot(label?: string): StoreSnapshot<V> {
    return {
      base: this.base.snapshot(),
      layers: this.layers.map((layer) => layer.toRecord()),
      label,
      createdAt: Date.now(),
    };
  }

  /**
   * Replaces the committed mapping and the whole transaction stack with the
   * snapshot's contents, depth included.
   */
  public restore(snapshot: StoreSnapshot<V>): this {
    this.base.restore({ ...snapshot.base });
    this.layers = snapshot.layers.map((record) => TransactionLayer.fromRecord(record));
    return this;
  }

  /**
   * Discards layers above `depth` without firing onRollback, so a failing
   * hook can neither stop the unwind nor replace the error run() rethrows.
   */
  private unwindTo(depth: number): void {
    this.layers.length = Math.min(this.layers.length, depth);
  }
}
