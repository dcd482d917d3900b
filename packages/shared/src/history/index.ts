export type { HistoryStore } from './types';
export { InMemoryHistoryStore } from './in-memory-store';
export {
  rankSubmissions,
  embedOrNull,
  clampHistoryLimit,
  DEFAULT_HISTORY_LIMIT,
  MAX_HISTORY_LIMIT,
} from './ranking';
export { findAutofillSource } from './autofill';
