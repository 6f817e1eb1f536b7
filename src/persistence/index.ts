export { PersistentFactStore, type PersistentFactStoreConfig } from './persistent-fact-store.js';
