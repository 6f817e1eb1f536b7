export {
  MemoryFactStore,
  DEFAULT_INITIAL_TRANSACTION_ID,
  type MemoryFactStoreConfig,
} from './memory-fact-store.js';
export { planTransaction, applyFacts } from './transaction-planner.js';
