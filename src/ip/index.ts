/**
 * External IP provider exports and selection
 */
import type { AppConfig } from '../config/schema.js';
import type { ExternalIpProvider } from './ExternalIpProvider.js';
import { FritzboxProvider } from './FritzboxProvider.js';
import { IpifyProvider } from './IpifyProvider.js';
import { StaticIpProvider } from './StaticIpProvider.js';

export { DEFAULT_IP_TIMEOUT, requireIPv4, type ExternalIpProvider } from './ExternalIpProvider.js';
export { FritzboxProvider, parseExternalIpResponse, type FritzboxProviderOptions } from './FritzboxProvider.js';
export { IpifyProvider, IPIFY_URL, type IpifyProviderOptions } from './IpifyProvider.js';
export { StaticIpProvider } from './StaticIpProvider.js';

/**
 * A configured PUBLIC_IP wins, then a FRITZ!Box, then ipify
 */
export function createIpProvider(
  config: Pick<AppConfig, 'publicIp' | 'fritzboxIp'>,
  options: { fetch?: typeof fetch } = {}
): ExternalIpProvider {
  if (config.publicIp) {
    return new StaticIpProvider(config.publicIp);
  }
  if (config.fritzboxIp) {
    return new FritzboxProvider(config.fritzboxIp, options);
  }
  return new IpifyProvider(options);
}
