/**
 * chartshot - Deterministic PNG snapshots of chart documents
 *
 * Serve a report directory on loopback, load the document in a headless
 * browser, wait until its script-drawn charts have rendered, and capture
 * the full page.
 */

// Errors and logging
export * from './lib/errors/index.js';
export * from './lib/logging/index.js';

// Configuration
export * from './lib/config/index.js';

// Ephemeral content server
export * from './lib/documents/index.js';
export * from './lib/server/index.js';

// Browser session
export * from './lib/session/index.js';

// Readiness detection
export * from './lib/readiness/index.js';

// Capture
export * from './lib/capture/index.js';

// Orchestration
export * from './lib/orchestrator/index.js';
export * from './lib/batch/index.js';

// Version
export const VERSION = '0.1.0';
