/**
 * @flowgauge/shared
 * Shared types, logging, errors and configuration for flowgauge
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
