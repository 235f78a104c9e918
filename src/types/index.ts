/**
 * Core types shared by the store, its layers and snapshots.
 */

/**
 * An entry recorded in a transaction layer.
 * A tombstone marks the key as deleted at that layer, which is not the same
 * as the layer having no entry for the key at all.
 */
export type LayerEntry<V> = { kind: 'value'; value: V } | { kind: 'tombstone' };

/** Layer contents keyed by key, as carried by snapshots and hook events. */
export type LayerRecord<V> = Record<string, LayerEntry<V>>;

/**
 * An immutable copy of the full store state.
 * Created by store.snapshot() and consumed by store.restore().
 */
export interface StoreSnapshot<V> {
  readonly base: Record<string, V>;
  /** Innermost layer last. */
  readonly layers: LayerRecord<V>[];
  readonly label?: string;
  readonly createdAt: number;
}

export interface BeginEvent {
  /** Depth after the new layer was pushed. */
  depth: number;
}

export interface CommitEvent<V> {
  /** Depth after the committed layer was popped. */
  depth: number;
  /** Where the changes were merged: the committed mapping or the parent layer. */
  target: 'base' | 'layer';
  changes: LayerRecord<V>;
}

export interface RollbackEvent<V> {
  /** Depth after the discarded layer was popped. */
  depth: number;
  discarded: LayerRecord<V>;
}
