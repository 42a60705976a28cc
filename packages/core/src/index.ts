/**
 * @registry-bridge/core - shared types and utilities
 *
 * Dependency direction: core → registry → mcp, a2a
 */

// Error system
export * from './errors.js';
// Logger
export * from './logger.js';
// Configuration
export * from './schemas.js';
export * from './config.js';
// Registry descriptors
export * from './descriptors.js';
// Agent framework types
export * from './message.js';
export * from './tool.js';
export * from './toolkit.js';
// Utilities
export * from './utils/env-expander.js';
export * from './utils/events.js';
export * from './utils/mutex.js';
export * from './utils/stable-stringify.js';
export * from './utils/timeout.js';
export * from './version.js';
