/**
 * @tunecast/shared-infrastructure
 *
 * Env parsing and structured logging shared by the tunecast packages.
 */

// Environment utilities
export * from './env/index.js';

// Logging
export * from './logging/index.js';
