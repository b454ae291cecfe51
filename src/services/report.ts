/**
 * Human-readable sync reports
 */
import { renderTable, type DNSRecordSet, type DNSZone } from '../dns/index.js';

export interface SyncReport {
  passId: string;
  domain: string;
  /** Zone as read before any write */
  zone: DNSZone;
  currentRecords: DNSRecordSet;
  /** Records after the merge */
  records: DNSRecordSet;
  requestedTtl?: number;
  recordsChanged: boolean;
  ttlChanged: boolean;
  /** Whether the pass was allowed to write */
  update: boolean;
  confirmedZone?: DNSZone;
  confirmedRecords?: DNSRecordSet;
}

export function renderZone(zone: DNSZone): string {
  return renderTable(
    ['zone info', ''],
    [
      ['domain', zone.name],
      ['ttl', zone.ttl],
      ['serial', zone.serial],
      ['refresh', zone.refresh],
      ['retry', zone.retry],
      ['expire', zone.expire],
      ['dnssec', zone.dnssecStatus],
    ]
  );
}

export function renderRecords(records: DNSRecordSet): string {
  return renderTable(
    ['hostname', 'type', 'destination', 'state'],
    records.all.map((r) => [r.hostname, r.type, r.destination, r.markedForDeletion ? 'delete' : r.state])
  );
}

export function renderReport(report: SyncReport): string {
  const lines: string[] = [
    `working on domain:\t${report.domain}`,
    renderZone(report.zone),
    renderRecords(report.currentRecords),
    '',
    'updated set:',
    renderRecords(report.records),
  ];

  if (report.requestedTtl !== undefined) {
    lines.push('', 'updating ttl ...');
    if (!report.ttlChanged) {
      lines.push('ttl has not changed, leaving it alone!');
    } else if (report.confirmedZone) {
      lines.push(renderZone(report.confirmedZone));
    } else {
      lines.push(`ttl would change from ${report.zone.ttl} to ${report.requestedTtl} (dry run)`);
    }
  }

  lines.push('', 'updating records ...');
  if (!report.recordsChanged) {
    lines.push('records did not change, leaving it alone!');
  } else if (report.confirmedRecords) {
    lines.push(renderRecords(report.confirmedRecords));
  } else {
    lines.push('records would change (dry run)');
  }

  return lines.join('\n');
}
