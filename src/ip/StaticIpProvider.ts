import { requireIPv4, type ExternalIpProvider } from './ExternalIpProvider.js';

/**
 * A fixed, configured address (PUBLIC_IP)
 */
export class StaticIpProvider implements ExternalIpProvider {
  readonly name = 'static';
  private readonly ip: string;

  constructor(ip: string) {
    this.ip = requireIPv4(ip, 'PUBLIC_IP');
  }

  async currentIp(): Promise<string> {
    return this.ip;
  }
}
