/**
 * @tessera/types - Type definitions for the tessera inference engine
 */

// Node variants and classification
export * from './nodes.js';
