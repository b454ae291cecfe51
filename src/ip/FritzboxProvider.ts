/**
 * External IP from a FRITZ!Box router over TR-064 (UPnP SOAP)
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ExternalIpError } from '../core/errors.js';
import { DEFAULT_IP_TIMEOUT, requireIPv4, type ExternalIpProvider } from './ExternalIpProvider.js';

const SERVICE = 'urn:schemas-upnp-org:service:WANIPConnection:1';
const CONTROL_PATH = '/igdupnp/control/WANIPConn1';
const UPNP_PORT = 49000;

const REQUEST_BODY =
  '<?xml version="1.0" encoding="utf-8"?>' +
  '<s:Envelope s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/" xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">' +
  `<s:Body><u:GetExternalIPAddress xmlns:u="${SERVICE}" /></s:Body>` +
  '</s:Envelope>';

export interface FritzboxProviderOptions {
  timeout?: number;
  fetch?: typeof fetch;
}

/**
 * Pull `NewExternalIPAddress` out of a GetExternalIPAddress response
 */
export function parseExternalIpResponse(xml: string): string | null {
  const match = /<NewExternalIPAddress>([^<]*)<\/NewExternalIPAddress>/.exec(xml);
  return match?.[1] ?? null;
}

export class FritzboxProvider implements ExternalIpProvider {
  readonly name = 'fritzbox';
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly address: string,
    options: FritzboxProviderOptions = {}
  ) {
    this.timeout = options.timeout ?? DEFAULT_IP_TIMEOUT;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = createChildLogger({ service: 'FritzboxProvider', fritzbox: address });
  }

  get controlUrl(): string {
    return `http://${this.address}:${UPNP_PORT}${CONTROL_PATH}`;
  }

  async currentIp(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.controlUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset="utf-8"',
          SoapAction: `${SERVICE}#GetExternalIPAddress`,
        },
        body: REQUEST_BODY,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalIpError(`Unable to connect to FRITZ!Box ${this.address}: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      throw new ExternalIpError(`FRITZ!Box ${this.address} answered HTTP ${response.status}`);
    }

    const raw = parseExternalIpResponse(await response.text());
    if (raw === null) {
      throw new ExternalIpError(`Unable to get external IP from FRITZ!Box ${this.address}`);
    }

    const ip = requireIPv4(raw, `FRITZ!Box ${this.address}`);
    this.logger.debug({ ip }, 'Found external IP');
    return ip;
  }
}
