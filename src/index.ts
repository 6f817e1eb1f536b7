// Types
export * from './types/index.js';

// Tagged values
export * from './utils/index.js';

// Reconstruction pipeline
export * from './reconstruction/index.js';

// Stores
export * from './core/index.js';
export * from './persistence/index.js';

// YAML history files
export * from './yaml/index.js';
