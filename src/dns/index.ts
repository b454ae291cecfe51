/**
 * DNS model exports
 */
export { DNSRecord } from './DNSRecord.js';
export { DNSRecordSet, isDualStackPair } from './DNSRecordSet.js';
export { DNSZone } from './DNSZone.js';
export { renderTable, type Cell } from './table.js';
