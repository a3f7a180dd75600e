export { appendJsonl, createJsonlStore } from './jsonl-store.js';
export type { AppendOptions } from './jsonl-store.js';
export { PersistenceError } from './errors.js';
