/**
 * @clipkeep/core - shared building blocks for the clipkeep packages
 *
 * - Structured errors with stable codes ({@link ClipError})
 * - A silent-by-default structured logger
 * - A typed, explicitly constructed event bus
 * - Timeout and delay helpers for bounded async steps
 *
 * @packageDocumentation
 */

// Errors
export * from './errors/index.js';

// Logging
export * from './observability/index.js';

// Events
export * from './events/index.js';

// Async helpers
export * from './async/index.js';
