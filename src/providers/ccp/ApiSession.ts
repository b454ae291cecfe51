/**
 * Session-based client for the DNS control API
 *
 * Every action is one JSON POST of `{ action, param }` to a single endpoint.
 * `login` returns a session id that every other action must carry until
 * `logout`. A non-success answer to an authenticated action ends the session.
 */
import type { Logger } from 'pino';
import type { ZodTypeAny, output } from 'zod';
import { createChildLogger, redact, symbols } from '../../core/Logger.js';
import { ApiError, SessionStateError, TransportError } from '../../core/errors.js';
import type { ApiCredentials } from '../../config/schema.js';
import { DNSRecordSet } from '../../dns/DNSRecordSet.js';
import { DNSZone } from '../../dns/DNSZone.js';
import {
  loginDataSchema,
  recordSetDataSchema,
  responseEnvelopeSchema,
  zoneDataSchema,
  type CcpAction,
  type CcpRequest,
  type ResponseEnvelope,
} from './schemas.js';

export type SessionState = 'unauthenticated' | 'authenticated';

export interface ApiSessionOptions {
  /** Per-request timeout in milliseconds */
  requestTimeout?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

export const DEFAULT_REQUEST_TIMEOUT = 30000;

function isSuccess(envelope: ResponseEnvelope): boolean {
  return envelope.status.toLowerCase() === 'success';
}

function describeFailure(envelope: ResponseEnvelope, action: CcpAction): string {
  return envelope.longmessage ?? envelope.shortmessage ?? `${action} failed with status ${envelope.status}`;
}

export class ApiSession {
  private sessionId: string | null = null;
  private readonly logger: Logger;
  private readonly requestTimeout: number;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly credentials: ApiCredentials,
    options: ApiSessionOptions = {}
  ) {
    this.logger = options.logger ?? createChildLogger({ service: 'ApiSession' });
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get state(): SessionState {
    return this.sessionId === null ? 'unauthenticated' : 'authenticated';
  }

  get isAuthenticated(): boolean {
    return this.sessionId !== null;
  }

  /**
   * Build the request envelope for an action. The session id is attached to
   * everything except `login`.
   */
  buildRequest(action: CcpAction, params: Record<string, unknown> = {}): CcpRequest {
    const param: CcpRequest['param'] = {
      customernumber: this.credentials.customerId,
      apikey: this.credentials.apiKey,
    };
    if (action !== 'login' && this.sessionId !== null) {
      param.apisessionid = this.sessionId;
    }
    return { action, param: { ...param, ...params } };
  }

  async login(): Promise<void> {
    if (this.sessionId !== null) {
      throw new SessionStateError('Session is already authenticated; log out first');
    }

    const envelope = await this.send(this.buildRequest('login', { apipassword: this.credentials.apiPassword }));
    if (!isSuccess(envelope)) {
      throw new ApiError(describeFailure(envelope, 'login'), 'login', envelope.statuscode);
    }

    const data = this.parseData('login', loginDataSchema, envelope.responsedata);
    this.sessionId = data.apisessionid;

    this.logger.info({ sessionId: redact(this.sessionId) }, `${symbols.session} Logged in`);
  }

  /**
   * End the session. Never throws: a failed logout is logged and the
   * session id is dropped regardless.
   */
  async logout(): Promise<void> {
    if (this.sessionId === null) {
      return;
    }

    const request = this.buildRequest('logout');
    try {
      const envelope = await this.send(request);
      if (isSuccess(envelope)) {
        this.logger.info('Logged out');
      } else {
        this.logger.warn({ message: describeFailure(envelope, 'logout') }, 'Logout rejected by remote');
      }
    } catch (error) {
      this.logger.warn({ error }, 'Logout failed');
    } finally {
      this.sessionId = null;
    }
  }

  async infoDnsZone(domainname: string): Promise<DNSZone> {
    const data = this.parseData('infoDnsZone', zoneDataSchema, await this.call('infoDnsZone', { domainname }));
    return DNSZone.fromWire({ ...data, name: domainname });
  }

  async infoDnsRecords(domainname: string): Promise<DNSRecordSet> {
    const data = this.parseData('infoDnsRecords', recordSetDataSchema, await this.call('infoDnsRecords', { domainname }));
    return DNSRecordSet.fromWire(data);
  }

  async updateDnsZone(zone: DNSZone): Promise<void> {
    await this.call('updateDnsZone', { domainname: zone.name, dnszone: zone.toWire() });
  }

  async updateDnsRecords(zone: DNSZone, records: DNSRecordSet): Promise<void> {
    await this.call('updateDnsRecords', { domainname: zone.name, dnsrecordset: records.toWire() });
  }

  /**
   * Dispatch an authenticated action and return its `responsedata`
   */
  private async call(action: Exclude<CcpAction, 'login' | 'logout'>, params: Record<string, unknown>): Promise<unknown> {
    if (this.sessionId === null) {
      throw new SessionStateError(`Cannot run ${action} without an authenticated session; login first`);
    }

    const envelope = await this.send(this.buildRequest(action, params));

    if (!isSuccess(envelope)) {
      const message = describeFailure(envelope, action);
      this.logger.error({ action, statusCode: envelope.statuscode }, `Remote rejected ${action}: ${message}`);
      await this.logout();
      throw new ApiError(message, action, envelope.statuscode);
    }

    return envelope.responsedata;
  }

  /**
   * POST one request and decode the response envelope. Anything short of a
   * 2xx JSON envelope is a transport error.
   */
  private async send(request: CcpRequest): Promise<ResponseEnvelope> {
    const { action } = request;
    this.logger.debug({ action, sessionId: redact(request.param.apisessionid) }, 'Posting request');

    let response: Response;
    try {
      response = await this.fetchFn(this.credentials.endpointUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.requestTimeout),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request for ${action} failed: ${reason}`, undefined, { cause: error });
    }

    if (!response.ok) {
      const statusText = response.statusText ? ` ${response.statusText}` : '';
      throw new TransportError(`HTTP ${response.status}${statusText} for ${action}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(`Response to ${action} is not valid JSON`, response.status, { cause: error });
    }

    const parsed = responseEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Response to ${action} is not a valid envelope`, response.status, { cause: parsed.error });
    }

    this.logger.debug({ action, status: parsed.data.status }, 'Request returned');
    return parsed.data;
  }

  private parseData<S extends ZodTypeAny>(action: CcpAction, schema: S, data: unknown): output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(`Unexpected response data for ${action}`, undefined, { cause: parsed.error });
    }
    return parsed.data;
  }
}
