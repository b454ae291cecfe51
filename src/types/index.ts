/**
 * Core type definitions for zonekeeper
 */

// DNS Record Types known to the control API
export type DNSRecordType =
  | 'A'
  | 'AAAA'
  | 'CNAME'
  | 'MX'
  | 'TXT'
  | 'SRV'
  | 'CAA'
  | 'NS'
  | 'TLSA'
  | 'DS'
  | 'SSHFP'
  | 'SMIMEA'
  | 'OPENPGPKEY';

export const DNS_RECORD_TYPES: readonly DNSRecordType[] = [
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
];

export interface DNSRecordInit {
  id?: number;
  hostname: string;
  type: DNSRecordType;
  destination: string;
  priority?: number;
  markedForDeletion?: boolean;
  state?: string;
}

export interface DNSZoneInit {
  name: string;
  ttl: number;
  serial: string;
  refresh: number;
  retry: number;
  expire: number;
  dnssecStatus: boolean;
}

// Wire shapes (parameter objects of the control API)

export interface WireDNSRecord {
  id?: number;
  hostname: string;
  type: DNSRecordType;
  priority: number;
  destination: string;
  deleterecord: boolean;
  state?: string;
}

export interface WireDNSRecordSet {
  dnsrecords: WireDNSRecord[];
}

export interface WireDNSZone {
  name: string;
  ttl: number;
  serial: string;
  refresh: number;
  retry: number;
  expire: number;
  dnssecstatus: boolean;
}
