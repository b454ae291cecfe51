/**
 * A single DNS resource record
 */
import type { DNSRecordInit, DNSRecordType, WireDNSRecord } from '../types/index.js';

export class DNSRecord {
  /** Assigned by the remote; absent for records that were never written */
  id?: number;
  hostname: string;
  type: DNSRecordType;
  destination: string;
  priority: number;
  markedForDeletion: boolean;
  /** Status reported by the remote, read-only */
  readonly state?: string;

  constructor(init: DNSRecordInit) {
    this.id = init.id;
    this.hostname = init.hostname;
    this.type = init.type;
    this.destination = init.destination;
    this.priority = init.priority ?? 0;
    this.markedForDeletion = init.markedForDeletion ?? false;
    this.state = init.state;
  }

  static fromWire(wire: WireDNSRecord): DNSRecord {
    return new DNSRecord({
      id: wire.id,
      hostname: wire.hostname,
      type: wire.type,
      destination: wire.destination,
      priority: wire.priority,
      markedForDeletion: wire.deleterecord,
      state: wire.state,
    });
  }

  /**
   * Whether `other` differs in a sync-relevant field (destination or type)
   */
  needsUpdate(other: Pick<DNSRecord, 'destination' | 'type'>): boolean {
    return this.destination !== other.destination || this.type !== other.type;
  }

  /**
   * Copy destination and type from `other`, returning whether anything changed
   */
  applyUpdate(other: Pick<DNSRecord, 'destination' | 'type'>): boolean {
    if (!this.needsUpdate(other)) {
      return false;
    }
    this.destination = other.destination;
    this.type = other.type;
    return true;
  }

  clone(): DNSRecord {
    return new DNSRecord({
      id: this.id,
      hostname: this.hostname,
      type: this.type,
      destination: this.destination,
      priority: this.priority,
      markedForDeletion: this.markedForDeletion,
      state: this.state,
    });
  }

  toWire(): WireDNSRecord {
    const wire: WireDNSRecord = {
      hostname: this.hostname,
      type: this.type,
      priority: this.priority,
      destination: this.destination,
      deleterecord: this.markedForDeletion,
    };
    if (this.id !== undefined) wire.id = this.id;
    if (this.state !== undefined) wire.state = this.state;
    return wire;
  }
}
