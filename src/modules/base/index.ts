export type { BaseStore } from './baseStore';
export { InMemoryStore } from './inMemoryStore';
