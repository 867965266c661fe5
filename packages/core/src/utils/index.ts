/**
 * Utility functions for engines and clients
 */

export { defaultLogger, serializeForLog, truncateString, sanitizeHeadersForLog, previewBody, errorToLog } from './logging.js';
export { withEngineTracing, composeEngineWrappers } from './engine-wrapper.js';
