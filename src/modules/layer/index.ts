import type { LayerEntry, LayerRecord } from '../../types';
import type { BaseStore } from '../base';

const TOMBSTONE: LayerEntry<never> = Object.freeze({ kind: 'tombstone' });

/**
 * One frame of the transaction stack: pending writes and deletes for a single
 * nesting level, not yet merged into its parent.
 */
export class TransactionLayer<V> {
  private _entries = new Map<string, LayerEntry<V>>();

  /**
   * Rebuilds a layer from its record form (see toRecord()).
   * Entries are copied, so later changes to the record do not reach the layer.
   */
  public static fromRecord<V>(record: LayerRecord<V>): TransactionLayer<V> {
    const layer = new TransactionLayer<V>();
    for (const [key, entry] of Object.entries(record)) {
      if (entry.kind === 'tombstone') {
        layer.delete(key);
      } else {
        layer.set(key, entry.value);
      }
    }
    return layer;
  }

  public get size(): number {
    return this._entries.size;
  }

  /**
   * Returns this layer's entry for the key, or undefined when the layer has
   * none and the lookup should fall through to the next-outer scope.
   */
  public lookup(key: string): LayerEntry<V> | undefined {
    return this._entries.get(key);
  }

  public set(key: string, value: V): void {
    this._entries.set(key, { kind: 'value', value });
  }

  public delete(key: string): void {
    this._entries.set(key, TOMBSTONE);
  }

  public entries(): IterableIterator<[string, LayerEntry<V>]> {
    return this._entries.entries();
  }

  /**
   * Folds this layer into its parent layer. Entries here take precedence, and
   * a tombstone stays a tombstone so it keeps shadowing outer scopes.
   */
  public mergeInto(target: TransactionLayer<V>): void {
    for (const [key, entry] of this._entries) {
      target._entries.set(key, entry);
    }
  }

  /** Folds this layer into the committed mapping. */
  public applyTo(base: BaseStore<V>): void {
    for (const [key, entry] of this._entries) {
      if (entry.kind === 'tombstone') {
        base.delete(key);
      } else {
        base.set(key, entry.value);
      }
    }
  }

  public toRecord(): LayerRecord<V> {
    const pairs: Array<[string, LayerEntry<V>]> = [];
    for (const [key, entry] of this._entries) {
      pairs.push([key, { ...entry }]);
    }
    return Object.fromEntries(pairs);
  }
}
