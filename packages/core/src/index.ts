/**
 * @lexid/core
 *
 * Sortable identifiers (ULID, short ULID, SLID): construction strategies,
 * codec, progression, integrity checks, errors and configuration.
 */

// Errors - structured error handling
export * from './errors/index.js';

// Identifiers - formats, codec, strategies, generator
export * from './id/index.js';

// Configuration - defaults, file, environment, overrides
export * from './config/index.js';
