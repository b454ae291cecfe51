/**
 * DNSRecordSet merge tests
 */
import { describe, it, expect } from 'vitest';
import { DNSRecord } from '../../../src/dns/DNSRecord.js';
import { DNSRecordSet, isDualStackPair } from '../../../src/dns/DNSRecordSet.js';
import { InvariantViolation } from '../../../src/core/errors.js';
import type { DNSRecordType } from '../../../src/types/index.js';

function record(hostname: string, type: DNSRecordType, destination: string, id?: number): DNSRecord {
  return new DNSRecord({ id, hostname, type, destination });
}

function summary(set: DNSRecordSet): string[] {
  return set.all.map((r) => `${r.hostname} ${r.type} ${r.destination}${r.markedForDeletion ? ' (delete)' : ''}`);
}

describe('isDualStackPair', () => {
  it('should accept A with AAAA in either order', () => {
    expect(isDualStackPair('A', 'AAAA')).toBe(true);
    expect(isDualStackPair('AAAA', 'A')).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isDualStackPair('A', 'A')).toBe(false);
    expect(isDualStackPair('AAAA', 'AAAA')).toBe(false);
    expect(isDualStackPair('A', 'CNAME')).toBe(false);
    expect(isDualStackPair('MX', 'TXT')).toBe(false);
  });
});

describe('DNSRecordSet', () => {
  describe('merge', () => {
    it('should append a record for an unknown hostname', () => {
      const set = new DNSRecordSet();
      const desired = record('www', 'A', '192.0.2.1');

      expect(set.merge(desired)).toBe(true);
      expect(summary(set)).toEqual(['www A 192.0.2.1']);
    });

    it('should store a copy of the desired record', () => {
      const set = new DNSRecordSet();
      const desired = record('www', 'A', '192.0.2.1');
      set.merge(desired);

      const stored = set.get('www', 'A');
      expect(stored).not.toBe(desired);
      if (stored) stored.destination = '192.0.2.99';
      expect(desired.destination).toBe('192.0.2.1');
    });

    it('should report no change for an identical record', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);

      expect(set.merge(record('www', 'A', '192.0.2.1'))).toBe(false);
      expect(summary(set)).toEqual(['www A 192.0.2.1']);
    });

    it('should update the destination of the existing record in place', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);

      expect(set.merge(record('www', 'A', '192.0.2.2'))).toBe(true);
      expect(set.get('www', 'A')?.id).toBe(1);
      expect(summary(set)).toEqual(['www A 192.0.2.2']);
    });

    it('should replace the type of a single record', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);

      expect(set.merge(record('www', 'CNAME', 'example.com'))).toBe(true);
      expect(summary(set)).toEqual(['www CNAME example.com']);
      expect(set.all[0]?.id).toBe(1);
    });

    it('should add AAAA beside an existing A', () => {
      const set = new DNSRecordSet([record('home', 'A', '192.0.2.1', 1)]);

      expect(set.merge(record('home', 'AAAA', '2001:db8::1'))).toBe(true);
      expect(summary(set)).toEqual(['home A 192.0.2.1', 'home AAAA 2001:db8::1']);
    });

    it('should end with the same pair whichever address is merged first', () => {
      const a = record('home', 'A', '192.0.2.1');
      const aaaa = record('home', 'AAAA', '2001:db8::1');

      const forward = new DNSRecordSet();
      forward.mergeAll([a, aaaa]);
      const backward = new DNSRecordSet();
      backward.mergeAll([aaaa, a]);

      for (const set of [forward, backward]) {
        expect(set.get('home', 'A')?.destination).toBe('192.0.2.1');
        expect(set.get('home', 'AAAA')?.destination).toBe('2001:db8::1');
        expect(set.size).toBe(2);
      }
    });

    it('should update only the matching half of a dual-stack pair', () => {
      const set = new DNSRecordSet([record('home', 'A', '192.0.2.1', 1), record('home', 'AAAA', '2001:db8::1', 2)]);

      expect(set.merge(record('home', 'A', '192.0.2.1'))).toBe(false);
      expect(set.merge(record('home', 'AAAA', '2001:db8::2'))).toBe(true);
      expect(summary(set)).toEqual(['home A 192.0.2.1', 'home AAAA 2001:db8::2']);
    });

    it('should collapse a dual-stack pair and mark the remote second record for deletion', () => {
      const set = new DNSRecordSet([record('home', 'A', '192.0.2.1', 1), record('home', 'AAAA', '2001:db8::1', 2)]);

      expect(set.merge(record('home', 'CNAME', 'example.net'))).toBe(true);
      expect(summary(set)).toEqual(['home CNAME example.net', 'home AAAA 2001:db8::1 (delete)']);
      expect(set.findByHostname('home')).toHaveLength(1);
      expect(set.size).toBe(1);
    });

    it('should drop a collapsed second record the remote never saw', () => {
      const set = new DNSRecordSet([record('home', 'A', '192.0.2.1', 1)]);
      set.merge(record('home', 'AAAA', '2001:db8::1'));

      expect(set.merge(record('home', 'CNAME', 'example.net'))).toBe(true);
      expect(summary(set)).toEqual(['home CNAME example.net']);
    });

    it('should leave the wire set with a deleterecord flag after a collapse', () => {
      const set = new DNSRecordSet([record('home', 'A', '192.0.2.1', 1), record('home', 'AAAA', '2001:db8::1', 2)]);
      set.merge(record('home', 'TXT', 'hello'));

      expect(set.toWire().dnsrecords.map((r) => [r.id, r.type, r.deleterecord])).toEqual([
        [1, 'TXT', false],
        [2, 'AAAA', true],
      ]);
    });

    it('should ignore records already marked for deletion', () => {
      const gone = record('old', 'A', '192.0.2.1', 5);
      gone.markedForDeletion = true;
      const set = new DNSRecordSet([gone]);

      expect(set.has('old')).toBe(false);
      expect(set.merge(record('old', 'CNAME', 'example.com'))).toBe(true);
      expect(summary(set)).toEqual(['old A 192.0.2.1 (delete)', 'old CNAME example.com']);
    });

    it('should match hostnames exactly', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);

      expect(set.merge(record('WWW', 'A', '192.0.2.1'))).toBe(true);
      expect(set.size).toBe(2);
    });

    it('should reject a hostname with more than two records', () => {
      const set = new DNSRecordSet([
        record('www', 'A', '192.0.2.1', 1),
        record('www', 'AAAA', '2001:db8::1', 2),
        record('www', 'TXT', 'extra', 3),
      ]);

      expect(() => set.merge(record('www', 'A', '192.0.2.2'))).toThrow(InvariantViolation);
      expect(() => set.merge(record('www', 'A', '192.0.2.2'))).toThrow(
        'hostname www has 3 records, at most two are allowed'
      );
    });

    it('should reject an address update when the pair holds no record of that type', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1), record('www', 'TXT', 'note', 2)]);

      expect(() => set.merge(record('www', 'AAAA', '2001:db8::1'))).toThrow(
        'hostname www has two records but no AAAA record among them'
      );
    });
  });

  describe('mergeAll', () => {
    it('should merge every record even after the first change', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);

      const changed = set.mergeAll([
        record('www', 'A', '192.0.2.2'),
        new DNSRecord({ hostname: 'mail', type: 'MX', destination: 'mx.example.net', priority: 10 }),
      ]);

      expect(changed).toBe(true);
      expect(summary(set)).toEqual(['www A 192.0.2.2', 'mail MX mx.example.net']);
      expect(set.get('mail', 'MX')?.priority).toBe(10);
    });

    it('should report no change when every record already matches', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1), record('@', 'A', '192.0.2.1', 2)]);

      expect(set.mergeAll([record('@', 'A', '192.0.2.1'), record('www', 'A', '192.0.2.1')])).toBe(false);
    });
  });

  describe('remove', () => {
    it('should ignore records that are not in the set', () => {
      const set = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);
      set.remove(record('www', 'A', '192.0.2.1', 1));

      expect(summary(set)).toEqual(['www A 192.0.2.1']);
    });
  });

  describe('clone', () => {
    it('should copy records so merges leave the original alone', () => {
      const original = new DNSRecordSet([record('www', 'A', '192.0.2.1', 1)]);
      const copy = original.clone();
      copy.merge(record('www', 'A', '192.0.2.2'));

      expect(summary(original)).toEqual(['www A 192.0.2.1']);
      expect(summary(copy)).toEqual(['www A 192.0.2.2']);
    });
  });
});
