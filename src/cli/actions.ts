/**
 * CLI command implementations. Each returns the text to print.
 */
import type { Server } from 'http';
import { z } from 'zod';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigurationError } from '../core/errors.js';
import { ConfigManager, DEFAULT_SETTINGS_FILE, parseConfig } from '../config/index.js';
import { createIpProvider } from '../ip/index.js';
import { DynDnsService, HostsLoader, renderReport } from '../services/index.js';
import { createApp, startServer } from '../app.js';

export interface ActionDeps {
  /** Replaces the global fetch for every outgoing request */
  fetch?: typeof fetch;
  env?: Record<string, string | undefined>;
  secretsDir?: string;
}

export interface SyncOptions {
  update?: boolean;
  ttl?: number | string;
  verbose?: boolean;
}

const ttlOptionSchema = z.coerce.number().int().min(1).optional();

function loadConfig(settingsPath: string, verbose: boolean | undefined, deps: ActionDeps): ConfigManager {
  const config = new ConfigManager(settingsPath, { env: deps.env, secretsDir: deps.secretsDir });
  if (verbose) {
    setLogLevel('debug');
  }
  return config;
}

/**
 * `sync <settings> <hosts>`: reconcile the zone with a hosts file
 */
export async function syncAction(
  settingsPath: string,
  hostsPath: string,
  options: SyncOptions = {},
  deps: ActionDeps = {}
): Promise<string> {
  const config = loadConfig(settingsPath, options.verbose, deps);
  const ttlOption = parseConfig(ttlOptionSchema, options.ttl, '--ttl');

  logger.debug({ settingsPath, hostsPath, update: options.update ?? false, ttl: ttlOption }, 'Running sync');

  const loader = new HostsLoader(createIpProvider(config.app, { fetch: deps.fetch }));
  const desired = await loader.load(hostsPath);

  const service = new DynDnsService(config.credentials, {
    requestTimeout: config.app.requestTimeout,
    fetch: deps.fetch,
  });

  const report = await service.sync({
    domain: desired.domain,
    desired: desired.records,
    ttl: ttlOption ?? desired.ttl,
    update: options.update ?? false,
  });

  const lines: string[] = [];
  if (desired.externalIp !== undefined) {
    lines.push(`found external ip:\t${desired.externalIp}`);
  }
  lines.push(renderReport(report));
  return lines.join('\n');
}

/**
 * `ip [settings]`: print the external IP the sync would use
 */
export async function ipAction(settingsPath: string = DEFAULT_SETTINGS_FILE, deps: ActionDeps = {}): Promise<string> {
  const config = loadConfig(settingsPath, false, deps);
  const provider = createIpProvider(config.app, { fetch: deps.fetch });
  return `found external ip:\t${await provider.currentIp()}`;
}

/**
 * `serve [settings]`: run the update webhook
 */
export async function serveAction(
  settingsPath: string | undefined,
  options: { verbose?: boolean } = {},
  deps: ActionDeps = {}
): Promise<Server> {
  const env = deps.env ?? process.env;
  const config = loadConfig(settingsPath ?? env['DYNDNS_SETTINGS'] ?? DEFAULT_SETTINGS_FILE, options.verbose, deps);

  if (!config.app.subdomainsFile) {
    throw new ConfigurationError('SUBDOMAINS must name the subdomains file to serve the webhook');
  }

  const app = createApp({
    subdomainsFile: config.resolveRelative(config.app.subdomainsFile),
    runner: new DynDnsService(config.credentials, {
      requestTimeout: config.app.requestTimeout,
      fetch: deps.fetch,
    }),
  });

  return startServer(app, config.server);
}
