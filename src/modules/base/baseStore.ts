/**
 * The committed key-value mapping behind a LayeredStore.
 *
 * Transaction layers only ever reach the committed state through these
 * methods. Use InMemoryStore for the default Map-backed mapping, or supply
 * your own implementation when the committed state must live elsewhere.
 */
export interface BaseStore<V> {
  get(key: string): V | undefined;
  has(key: string): boolean;
  set(key: string, value: V): void;
  /** Returns false when the key was not present. */
  delete(key: string): boolean;
  keys(): string[];
  /** Capture all entries for a store snapshot. */
  snapshot(): Record<string, V>;
  /** Replace all entries with the given ones. */
  restore(data: Record<string, V>): void;
}
