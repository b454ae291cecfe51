/**
 * Webhook keys mapped to the hostnames they may update
 *
 * {
 *   "domainname": "example.com",
 *   "hosts": [{ "key": "secret-key", "hostname": "home" }]
 * }
 */
import { parseConfig, readJsonFile } from '../config/ConfigManager.js';
import { subdomainsFileSchema } from '../config/schema.js';

export interface Subdomains {
  domain: string;
  /** key → hostname */
  hosts: Map<string, string>;
}

/**
 * Read the subdomains file. It is read on every call so edits apply without a restart.
 */
export function loadSubdomains(path: string): Subdomains {
  const file = parseConfig(subdomainsFileSchema, readJsonFile(path, 'subdomains file'), 'subdomains file');
  return {
    domain: file.domainname,
    hosts: new Map(file.hosts.map((h) => [h.key, h.hostname])),
  };
}
