/**
 * Zod schemas for configuration and desired-state files
 */
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const dnsRecordTypeSchema = z.enum([
  'A',
  'AAAA',
  'CNAME',
  'MX',
  'TXT',
  'SRV',
  'CAA',
  'NS',
  'TLSA',
  'DS',
  'SSHFP',
  'SMIMEA',
  'OPENPGPKEY',
]);

// Settings file (settings.json), upper-case keys
export const settingsFileSchema = z
  .object({
    API_URL: z.string().optional(),
    API_KEY: z.string().optional(),
    API_PASSWORD: z.string().optional(),
    CUSTOMER_ID: z.union([z.string(), z.number()]).optional(),
    FRITZBOX_IP: z.string().optional(),
    PUBLIC_IP: z.string().optional(),
    LOG_LEVEL: z.string().optional(),
    SUBDOMAINS: z.string().optional(),
    REQUEST_TIMEOUT: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export const apiCredentialsSchema = z.object({
  endpointUrl: z.string().url(),
  apiKey: z.string().min(1),
  apiPassword: z.string().min(1),
  customerId: z.string().min(1),
});

export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  requestTimeout: z.coerce.number().int().min(1000).default(30000),
  fritzboxIp: z.string().min(1).optional(),
  publicIp: z.string().ip({ version: 'v4' }).optional(),
  subdomainsFile: z.string().min(1).optional(),
});

export const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8081),
  host: z.string().default('0.0.0.0'),
});

// Hosts file (hosts.json): desired records of one domain
export const hostEntrySchema = z.object({
  hostname: z.string().min(1),
  type: dnsRecordTypeSchema,
  destination: z.string().min(1).optional(),
  priority: z.coerce.number().int().min(0).optional(),
});

export const hostsFileSchema = z.object({
  zone: z.object({
    domainname: z.string().min(1),
    ttl: z.coerce.number().int().min(1).optional(),
  }),
  hosts: z.array(hostEntrySchema),
});

// Subdomains file: webhook keys mapped to hostnames
export const subdomainsFileSchema = z.object({
  domainname: z.string().min(1),
  hosts: z.array(
    z.object({
      key: z.string().min(1),
      hostname: z.string().min(1),
    })
  ),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;
export type ApiCredentials = z.infer<typeof apiCredentialsSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type HostEntry = z.infer<typeof hostEntrySchema>;
export type HostsFile = z.infer<typeof hostsFileSchema>;
export type SubdomainsFile = z.infer<typeof subdomainsFileSchema>;
