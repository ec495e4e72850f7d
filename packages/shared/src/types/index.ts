/**
 * Core types for deadline-lens
 */

export * from './stream.js';
