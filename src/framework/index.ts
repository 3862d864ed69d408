/**
 * Framework barrel export.
 *
 * Generic, domain-independent building blocks. Pipeline stages live in
 * ../stages, engine adapters in ../engine.
 */

export * from './types.js';
export * from './stage.js';
export * from './validated-merge.js';
export * from './errors.js';
export * from './logger.js';
export * from './random.js';
export * from './scope.js';
