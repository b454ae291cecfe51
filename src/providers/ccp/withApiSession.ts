/**
 * Scoped session acquisition: login, run, and always log out
 */
import type { ApiCredentials } from '../../config/schema.js';
import { ApiSession, type ApiSessionOptions } from './ApiSession.js';

/**
 * Run `fn` inside an authenticated session. Logout is attempted on every
 * exit path; since `logout()` never throws, the error that ended `fn` (if
 * any) is the one the caller sees.
 */
export async function withApiSession<T>(
  credentials: ApiCredentials,
  fn: (session: ApiSession) => Promise<T>,
  options: ApiSessionOptions = {}
): Promise<T> {
  const session = new ApiSession(credentials, options);
  await session.login();

  try {
    return await fn(session);
  } finally {
    await session.logout();
  }
}
