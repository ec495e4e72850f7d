/**
 * @deadline-lens/shared
 * Shared types, utilities, and configuration for deadline-lens
 */

export * from './types/index.js';
export * from './time/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
