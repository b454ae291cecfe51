/**
 * Wire schemas of the control API. Numbers arrive as strings, so they are coerced.
 */
import { z } from 'zod';
import { dnsRecordTypeSchema } from '../../config/schema.js';

export type CcpAction =
  | 'login'
  | 'logout'
  | 'infoDnsZone'
  | 'infoDnsRecords'
  | 'updateDnsZone'
  | 'updateDnsRecords';

export interface CcpRequest {
  action: CcpAction;
  param: {
    customernumber: string;
    apikey: string;
    apisessionid?: string;
    [key: string]: unknown;
  };
}

export const responseEnvelopeSchema = z.object({
  status: z.string(),
  statuscode: z.coerce.number().int().optional(),
  shortmessage: z.string().optional(),
  longmessage: z.string().optional(),
  responsedata: z.unknown().optional(),
});

export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

const flagSchema = z.preprocess(
  (value) => value === true || value === 'true' || value === '1' || value === 1,
  z.boolean()
);

export const loginDataSchema = z.object({
  apisessionid: z.string().min(1),
});

export const zoneDataSchema = z.object({
  name: z.string().optional(),
  ttl: z.coerce.number().int(),
  serial: z.coerce.string(),
  refresh: z.coerce.number().int(),
  retry: z.coerce.number().int(),
  expire: z.coerce.number().int(),
  dnssecstatus: flagSchema,
});

export const recordDataSchema = z.object({
  id: z.coerce.number().int().optional(),
  hostname: z.string(),
  type: z
    .string()
    .transform((t) => t.toUpperCase())
    .pipe(dnsRecordTypeSchema),
  priority: z.coerce.number().int().default(0),
  destination: z.string(),
  deleterecord: flagSchema.default(false),
  state: z.string().optional(),
});

export const recordSetDataSchema = z.object({
  dnsrecords: z.array(recordDataSchema).default([]),
});

export type ZoneData = z.infer<typeof zoneDataSchema>;
export type RecordSetData = z.infer<typeof recordSetDataSchema>;
