/**
 * YouTrack services module.
 *
 * Re-exports all service implementations.
 */

export * from './issues.js';
export * from './comments.js';
export * from './time-tracking.js';
export * from './admin.js';
export * from './agile.js';
export * from './links.js';
export * from './queries.js';
