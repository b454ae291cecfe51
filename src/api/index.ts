/**
 * API exports
 */
export { createApiRouter } from './routes/index.js';
export { HttpError, errorHandler, notFoundHandler, asyncHandler } from './middleware/index.js';
export type { SyncRunner, DynDnsControllerOptions } from './controllers/index.js';
