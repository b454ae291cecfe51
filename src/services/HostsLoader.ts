/**
 * Hosts Loader
 * Turns a hosts file into the desired records of one domain
 *
 * {
 *   "zone": { "domainname": "example.com", "ttl": 300 },
 *   "hosts": [
 *     { "hostname": "@", "type": "A" },
 *     { "hostname": "www", "type": "CNAME", "destination": "@" }
 *   ]
 * }
 *
 * Hosts without a destination point at the current external IP.
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ConfigurationError } from '../core/errors.js';
import { parseConfig, readJsonFile } from '../config/ConfigManager.js';
import { hostsFileSchema, type HostEntry, type HostsFile } from '../config/schema.js';
import { DNSRecord } from '../dns/DNSRecord.js';
import type { ExternalIpProvider } from '../ip/ExternalIpProvider.js';

export interface DesiredState {
  domain: string;
  ttl?: number;
  records: DNSRecord[];
  /** External IP used for hosts without a destination, if it was needed */
  externalIp?: string;
}

export class HostsLoader {
  private readonly logger: Logger;

  constructor(private readonly ipProvider?: ExternalIpProvider) {
    this.logger = createChildLogger({ service: 'HostsLoader' });
  }

  async load(path: string): Promise<DesiredState> {
    const file = parseConfig(hostsFileSchema, readJsonFile(path, 'hosts file'), 'hosts file');
    this.logger.debug({ path, count: file.hosts.length }, 'Hosts file loaded');
    return this.fromHostsFile(file);
  }

  async fromHostsFile(file: HostsFile): Promise<DesiredState> {
    const externalIp = file.hosts.some((h) => h.destination === undefined) ? await this.resolveExternalIp() : undefined;

    const records = file.hosts.map((host) => this.toRecord(host, externalIp));

    return {
      domain: file.zone.domainname,
      ttl: file.zone.ttl,
      records,
      externalIp,
    };
  }

  private toRecord(host: HostEntry, externalIp: string | undefined): DNSRecord {
    const destination = host.destination ?? externalIp;
    if (destination === undefined) {
      throw new ConfigurationError(`Host ${host.hostname} has no destination and no external IP is available`);
    }
    return new DNSRecord({
      hostname: host.hostname,
      type: host.type,
      destination,
      priority: host.priority,
    });
  }

  private async resolveExternalIp(): Promise<string> {
    if (!this.ipProvider) {
      throw new ConfigurationError('Hosts without a destination need an external IP provider');
    }
    const ip = await this.ipProvider.currentIp();
    this.logger.info({ ip, provider: this.ipProvider.name }, 'Using external IP for hosts without destination');
    return ip;
  }
}
