export * from './fact.js';
export * from './snapshot.js';
export * from './store.js';
