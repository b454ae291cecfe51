/**
 * Ordered record collection of one zone, with the dual-stack aware merge
 */
import { InvariantViolation } from '../core/errors.js';
import type { DNSRecordType, WireDNSRecordSet } from '../types/index.js';
import { DNSRecord } from './DNSRecord.js';

/**
 * True for the one sanctioned same-hostname pair: one A and one AAAA record
 */
export function isDualStackPair(a: DNSRecordType, b: DNSRecordType): boolean {
  return (a === 'A' && b === 'AAAA') || (a === 'AAAA' && b === 'A');
}

function isAddressType(type: DNSRecordType): boolean {
  return type === 'A' || type === 'AAAA';
}

export class DNSRecordSet implements Iterable<DNSRecord> {
  private readonly records: DNSRecord[];

  constructor(records: Iterable<DNSRecord> = []) {
    this.records = [...records];
  }

  static fromWire(wire: WireDNSRecordSet): DNSRecordSet {
    return new DNSRecordSet(wire.dnsrecords.map((r) => DNSRecord.fromWire(r)));
  }

  [Symbol.iterator](): Iterator<DNSRecord> {
    return this.records[Symbol.iterator]();
  }

  /** Every record, including those marked for deletion */
  get all(): readonly DNSRecord[] {
    return this.records;
  }

  /** Records that are not marked for deletion */
  get liveRecords(): DNSRecord[] {
    return this.records.filter((r) => !r.markedForDeletion);
  }

  get size(): number {
    return this.liveRecords.length;
  }

  findByHostname(hostname: string): DNSRecord[] {
    return this.records.filter((r) => !r.markedForDeletion && r.hostname === hostname);
  }

  has(hostname: string): boolean {
    return this.findByHostname(hostname).length > 0;
  }

  get(hostname: string, type: DNSRecordType): DNSRecord | undefined {
    return this.findByHostname(hostname).find((r) => r.type === type);
  }

  /**
   * Merge one desired record into the set, returning whether the set changed.
   *
   * Every hostname owns at most one live record, except that an A and an
   * AAAA record may coexist.
   */
  merge(desired: DNSRecord): boolean {
    const matches = this.findByHostname(desired.hostname);
    const [first, second] = matches;

    if (matches.length > 2) {
      throw new InvariantViolation(
        `hostname ${desired.hostname} has ${matches.length} records, at most two are allowed`
      );
    }

    if (!first) {
      this.records.push(desired.clone());
      return true;
    }

    if (!second) {
      if (isDualStackPair(first.type, desired.type)) {
        this.records.push(desired.clone());
        return true;
      }
      return first.applyUpdate(desired);
    }

    if (isAddressType(desired.type)) {
      const sameType = matches.find((r) => r.type === desired.type);
      if (!sameType) {
        throw new InvariantViolation(
          `hostname ${desired.hostname} has two records but no ${desired.type} record among them`
        );
      }
      return sameType.applyUpdate(desired);
    }

    // Back to single stack: the first record takes the new value, the second goes
    first.applyUpdate(desired);
    this.remove(second);
    return true;
  }

  /**
   * Merge every desired record in order. All records are processed even
   * after the first change.
   */
  mergeAll(desired: Iterable<DNSRecord>): boolean {
    let changed = false;
    for (const record of desired) {
      changed = this.merge(record) || changed;
    }
    return changed;
  }

  /**
   * Delete a record: remote records are marked so the next write removes
   * them, records the remote never saw are dropped outright.
   */
  remove(record: DNSRecord): void {
    const index = this.records.indexOf(record);
    if (index === -1) {
      return;
    }
    if (record.id === undefined) {
      this.records.splice(index, 1);
    } else {
      record.markedForDeletion = true;
    }
  }

  clone(): DNSRecordSet {
    return new DNSRecordSet(this.records.map((r) => r.clone()));
  }

  toWire(): WireDNSRecordSet {
    return { dnsrecords: this.records.map((r) => r.toWire()) };
  }
}
