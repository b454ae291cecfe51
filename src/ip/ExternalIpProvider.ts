/**
 * External IP discovery
 */
import { isIPv4 } from 'net';
import { ExternalIpError } from '../core/errors.js';

export interface ExternalIpProvider {
  /** Short name for log lines */
  readonly name: string;
  /** Current public IPv4 address in dotted-quad form */
  currentIp(): Promise<string>;
}

export const DEFAULT_IP_TIMEOUT = 5000;

/**
 * Trim and validate an address reported by a provider
 */
export function requireIPv4(value: string, source: string): string {
  const ip = value.trim();
  if (!isIPv4(ip)) {
    throw new ExternalIpError(`${source} returned an invalid IPv4 address: ${JSON.stringify(ip.slice(0, 64))}`);
  }
  return ip;
}
