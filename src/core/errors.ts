/**
 * Error taxonomy shared by the session protocol, the sync engine and the loaders
 */

export type ErrorCode =
  | 'TRANSPORT_ERROR'
  | 'API_ERROR'
  | 'INVARIANT_VIOLATION'
  | 'CONFIGURATION_ERROR'
  | 'SESSION_STATE'
  | 'EXTERNAL_IP_ERROR';

export abstract class ZonekeeperError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The endpoint could not be reached or answered with something other than
 * a well-formed 2xx JSON envelope
 */
export class TransportError extends ZonekeeperError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The remote answered with a non-success status. The message is the remote's
 * `longmessage`, unmodified.
 */
export class ApiError extends ZonekeeperError {
  readonly code = 'API_ERROR';

  constructor(
    message: string,
    public readonly action: string,
    public readonly statusCode?: number
  ) {
    super(message);
  }
}

/**
 * A record set broke the one-record-per-hostname rule (A/AAAA pairs excepted)
 */
export class InvariantViolation extends ZonekeeperError {
  readonly code = 'INVARIANT_VIOLATION';
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends ZonekeeperError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    message: string,
    public readonly issues: ConfigurationIssue[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.map(formatIssue).join('; ')}` : message);
  }
}

/**
 * An action was attempted in the wrong session state
 */
export class SessionStateError extends ZonekeeperError {
  readonly code = 'SESSION_STATE';
}

export class ExternalIpError extends ZonekeeperError {
  readonly code = 'EXTERNAL_IP_ERROR';
}

function formatIssue(issue: ConfigurationIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export function isZonekeeperError(error: unknown): error is ZonekeeperError {
  return error instanceof ZonekeeperError;
}
