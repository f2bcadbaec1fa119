/**
 * Alert Ticket Bridge – library entry point.
 *
 * Re-exports the dispatch pipeline and its collaborators so the bridge can
 * be embedded in another Express application.
 *
 * @module alert-ticket-bridge
 */

export { type AppDependencies, createApp } from './app.js';

export * from './types/index.js';
export * from './alerts/index.js';
export * from './config/index.js';
export * from './templates/index.js';
export * from './notify/index.js';
export * from './dispatch/index.js';
export * from './metrics/index.js';
export * from './logging/index.js';
export * from './pages/index.js';
export { buildEnvelope, writeEnvelope, STATUS_OK } from './http/responses.js';
export { CORRELATION_HEADER, requestLogger } from './middleware/requestLogger.js';
