/**
 * Public IP lookup through api.ipify.org
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ExternalIpError } from '../core/errors.js';
import { DEFAULT_IP_TIMEOUT, requireIPv4, type ExternalIpProvider } from './ExternalIpProvider.js';

export const IPIFY_URL = 'https://api.ipify.org';

export interface IpifyProviderOptions {
  url?: string;
  timeout?: number;
  fetch?: typeof fetch;
}

export class IpifyProvider implements ExternalIpProvider {
  readonly name = 'ipify';
  private readonly url: string;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: IpifyProviderOptions = {}) {
    this.url = options.url ?? IPIFY_URL;
    this.timeout = options.timeout ?? DEFAULT_IP_TIMEOUT;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = createChildLogger({ service: 'IpifyProvider' });
  }

  async currentIp(): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, { signal: AbortSignal.timeout(this.timeout) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalIpError(`Unable to reach ${this.url}: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      throw new ExternalIpError(`${this.url} answered HTTP ${response.status}`);
    }

    const ip = requireIPv4(await response.text(), this.name);
    this.logger.debug({ ip }, 'Found external IP');
    return ip;
  }
}
