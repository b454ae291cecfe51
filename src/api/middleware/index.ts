/**
 * API Middleware exports
 */
export { HttpError, errorHandler, notFoundHandler, asyncHandler } from './errorHandler.js';
