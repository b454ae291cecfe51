/**
 * Logger configuration using Pino
 * Structured logging with configurable levels and human-friendly output
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

// Emoji symbols for pretty logging
const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  dns: '🌐',
  session: '🔑',
  sync: '🔄',
  startup: '🚀',
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

const defaultOptions: LoggerOptions = {
  level: levelFromEnv(),
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

/**
 * Format a value for inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return keys.length === 0 ? '{}' : `{${keys.length} fields}`;
  }

  return String(value);
}

/**
 * Render the most useful context fields after the message
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const priorityKeys = ['domain', 'hostname', 'type', 'action', 'count', 'passId'];

  const sortedKeys = Object.keys(log)
    .filter((k) => !excludeKeys.includes(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const parts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key], key === 'passId' ? 8 : 40);
    if (formatted) {
      parts.push(`${key}=${formatted}`);
    }
  }

  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = String(log['level']);
      const service = log['service'];
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = typeof service === 'string' ? `[${service}] ` : '';
      output += String(log[messageKey]);

      // 'hostname' stays visible here: it is the DNS hostname, not the machine's
      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'zonekeeper',
      pid: undefined,
      hostname: undefined,
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

/**
 * Shorten secrets and session ids before they reach a log line
 */
export function redact(value: string | undefined | null): string {
  if (!value) return '';
  return value.length <= 4 ? '****' : `${value.slice(0, 4)}****`;
}

export default logger;
