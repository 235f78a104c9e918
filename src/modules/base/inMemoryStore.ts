import type { BaseStore } from './baseStore';

/**
 * In-process committed mapping backed by a plain Map.
 *
 * All operations are synchronous. `undefined` from get() is ambiguous when V
 * itself admits undefined, so callers that store it should ask has().
 */
export class InMemoryStore<V> implements BaseStore<V> {
  private store = new Map<string, V>();

  get(key: string): V | undefined {
    return this.store.get(key);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  set(key: string, value: V): void {
    this.store.set(key, value);
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }

  snapshot(): Record<string, V> {
    return Object.fromEntries(this.store);
  }

  restore(data: Record<string, V>): void {
    this.store = new Map(Object.entries(data));
  }
}
