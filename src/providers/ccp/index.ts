/**
 * Control API client exports
 */
export { ApiSession, DEFAULT_REQUEST_TIMEOUT, type ApiSessionOptions, type SessionState } from './ApiSession.js';
export { withApiSession } from './withApiSession.js';
export type { CcpAction, CcpRequest, ResponseEnvelope } from './schemas.js';
