/**
 * Configuration Manager
 * Loads the settings file, applies environment and Docker secret overrides,
 * and validates everything before any remote call is made
 */
import { readFileSync, existsSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { ZodError, type ZodTypeAny, type output } from 'zod';
import { createChildLogger, setLogLevel, redact } from '../core/Logger.js';
import { ConfigurationError, type ConfigurationIssue } from '../core/errors.js';
import {
  apiCredentialsSchema,
  appConfigSchema,
  serverConfigSchema,
  settingsFileSchema,
  type ApiCredentials,
  type AppConfig,
  type ServerConfig,
  type SettingsFile,
} from './schema.js';

export const DEFAULT_SETTINGS_FILE = 'settings.json';

export type Environment = Record<string, string | undefined>;

export interface ConfigManagerOptions {
  env?: Environment;
  /** Directory holding Docker secrets, `/run/secrets` by default */
  secretsDir?: string;
}

/**
 * Convert zod issues into configuration issues
 */
export function toConfigurationIssues(error: ZodError): ConfigurationIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Parse `input` with `schema`, turning validation failures into a ConfigurationError
 */
export function parseConfig<S extends ZodTypeAny>(schema: S, input: unknown, what: string): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what}`, toConfigurationIssues(result.error));
  }
  return result.data;
}

/**
 * Read and parse a JSON file, reporting missing files and syntax errors as
 * configuration errors
 */
export function readJsonFile(path: string, what: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigurationError(`${what} not found: ${path}`);
  }

  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read ${what} ${path}: ${reason}`);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${what} ${path} is not valid JSON: ${reason}`);
  }
}

export class ConfigManager {
  private readonly _credentials: ApiCredentials;
  private readonly _app: AppConfig;
  private readonly _server: ServerConfig;
  private readonly settingsPath: string;
  private readonly env: Environment;
  private readonly secretsDir: string;

  constructor(settingsPath: string = DEFAULT_SETTINGS_FILE, options: ConfigManagerOptions = {}) {
    this.settingsPath = resolve(settingsPath);
    this.env = options.env ?? process.env;
    this.secretsDir = options.secretsDir ?? '/run/secrets';

    const file = parseConfig(settingsFileSchema, readJsonFile(this.settingsPath, 'settings file'), 'settings file');

    this._credentials = parseConfig(
      apiCredentialsSchema,
      {
        endpointUrl: this.pick('API_URL', file),
        apiKey: this.getSecret('API_KEY') ?? this.pick('API_KEY', file),
        apiPassword: this.getSecret('API_PASSWORD') ?? this.pick('API_PASSWORD', file),
        customerId: this.pick('CUSTOMER_ID', file),
      },
      'API credentials'
    );

    this._app = parseConfig(
      appConfigSchema,
      {
        logLevel: this.pick('LOG_LEVEL', file)?.toLowerCase(),
        requestTimeout: this.pick('REQUEST_TIMEOUT', file),
        fritzboxIp: this.pick('FRITZBOX_IP', file),
        publicIp: this.pick('PUBLIC_IP', file),
        subdomainsFile: this.pick('SUBDOMAINS', file),
      },
      'application settings'
    );

    this._server = parseConfig(
      serverConfigSchema,
      {
        port: this.env['DYNDNS_PORT'],
        host: this.env['DYNDNS_HOST'],
      },
      'server settings'
    );

    setLogLevel(this._app.logLevel);

    createChildLogger({ service: 'Config' }).debug(
      {
        settingsPath: this.settingsPath,
        endpointUrl: this._credentials.endpointUrl,
        customerId: this._credentials.customerId,
        apiKey: redact(this._credentials.apiKey),
      },
      'Configuration loaded'
    );
  }

  get credentials(): Readonly<ApiCredentials> {
    return this._credentials;
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get server(): Readonly<ServerConfig> {
    return this._server;
  }

  /**
   * Resolve a path given in the settings file relative to that file
   */
  resolveRelative(path: string): string {
    return isAbsolute(path) ? path : join(dirname(this.settingsPath), path);
  }

  /**
   * Environment first, then the settings file
   */
  private pick(key: keyof SettingsFile & string, file: SettingsFile): string | undefined {
    const fromEnv = this.env[key];
    if (fromEnv !== undefined && fromEnv !== '') {
      return fromEnv;
    }
    const fromFile = file[key];
    if (fromFile === undefined || fromFile === null) {
      return undefined;
    }
    return String(fromFile);
  }

  /**
   * Read a Docker secret file if present
   */
  private getSecret(key: string): string | undefined {
    const secretPath = join(this.secretsDir, key.toLowerCase());
    if (!existsSync(secretPath)) {
      return undefined;
    }
    try {
      return readFileSync(secretPath, 'utf-8').trim();
    } catch (error) {
      createChildLogger({ service: 'Config' }).warn({ key, error }, 'Failed to read Docker secret');
      return undefined;
    }
  }
}
