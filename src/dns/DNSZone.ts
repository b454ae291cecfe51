/**
 * Zone-level settings of one domain. Only the TTL is ever changed locally.
 */
import type { DNSZoneInit, WireDNSZone } from '../types/index.js';

export class DNSZone {
  readonly name: string;
  ttl: number;
  readonly serial: string;
  readonly refresh: number;
  readonly retry: number;
  readonly expire: number;
  readonly dnssecStatus: boolean;

  constructor(init: DNSZoneInit) {
    this.name = init.name;
    this.ttl = init.ttl;
    this.serial = init.serial;
    this.refresh = init.refresh;
    this.retry = init.retry;
    this.expire = init.expire;
    this.dnssecStatus = init.dnssecStatus;
  }

  static fromWire(wire: WireDNSZone): DNSZone {
    return new DNSZone({
      name: wire.name,
      ttl: wire.ttl,
      serial: wire.serial,
      refresh: wire.refresh,
      retry: wire.retry,
      expire: wire.expire,
      dnssecStatus: wire.dnssecstatus,
    });
  }

  /**
   * Copy of this zone with a different TTL
   */
  withTtl(ttl: number): DNSZone {
    return new DNSZone({ ...this.toInit(), ttl });
  }

  toInit(): DNSZoneInit {
    return {
      name: this.name,
      ttl: this.ttl,
      serial: this.serial,
      refresh: this.refresh,
      retry: this.retry,
      expire: this.expire,
      dnssecStatus: this.dnssecStatus,
    };
  }

  toWire(): WireDNSZone {
    return {
      name: this.name,
      ttl: this.ttl,
      serial: this.serial,
      refresh: this.refresh,
      retry: this.retry,
      expire: this.expire,
      dnssecstatus: this.dnssecStatus,
    };
  }
}
