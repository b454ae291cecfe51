/**
 * Sync Engine
 * One reconciliation pass: read the zone and its records, merge the desired
 * records in, and write back only what changed
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import type { DNSRecord } from '../dns/DNSRecord.js';
import type { DNSRecordSet } from '../dns/DNSRecordSet.js';
import type { DNSZone } from '../dns/DNSZone.js';
import type { ApiSession } from '../providers/ccp/ApiSession.js';

export interface SyncPlan {
  domain: string;
  /** Zone as read from the remote */
  currentZone: DNSZone;
  /** Records as read from the remote, untouched by the merge */
  currentRecords: DNSRecordSet;
  /** Zone to write; carries the desired TTL when it differs */
  zone: DNSZone;
  /** Records after merging the desired set */
  records: DNSRecordSet;
  recordsChanged: boolean;
  ttlChanged: boolean;
}

export interface CommitResult {
  /** Zone re-read after a TTL write */
  zone?: DNSZone;
  /** Records re-read after a record write */
  records?: DNSRecordSet;
}

export class SyncEngine {
  private readonly logger: Logger;

  constructor(
    private readonly session: ApiSession,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ service: 'SyncEngine' });
  }

  /**
   * Compute the merged zone and record set without writing anything
   */
  async reconcile(domain: string, desired: Iterable<DNSRecord>, desiredTtl?: number): Promise<SyncPlan> {
    const currentZone = await this.session.infoDnsZone(domain);
    const currentRecords = await this.session.infoDnsRecords(domain);

    this.logger.debug({ domain, count: currentRecords.size, ttl: currentZone.ttl }, 'Fetched current zone state');

    const records = currentRecords.clone();
    const recordsChanged = records.mergeAll(desired);
    const ttlChanged = desiredTtl !== undefined && desiredTtl !== currentZone.ttl;
    const zone = desiredTtl !== undefined && ttlChanged ? currentZone.withTtl(desiredTtl) : currentZone;

    this.logger.debug({ domain, recordsChanged, ttlChanged }, 'Reconciled desired state');

    return { domain, currentZone, currentRecords, zone, records, recordsChanged, ttlChanged };
  }

  /**
   * Write the TTL and/or records of a plan, then re-read what was written.
   * Nothing is sent for parts that did not change. The two writes are
   * separate remote calls: a record write can fail after the TTL write went
   * through.
   */
  async commit(plan: SyncPlan): Promise<CommitResult> {
    const result: CommitResult = {};

    if (plan.ttlChanged) {
      this.logger.info({ domain: plan.domain, from: plan.currentZone.ttl, to: plan.zone.ttl }, 'Updating zone TTL');
      await this.session.updateDnsZone(plan.zone);
      result.zone = await this.session.infoDnsZone(plan.domain);
    }

    if (plan.recordsChanged) {
      this.logger.info({ domain: plan.domain, count: plan.records.all.length }, 'Updating DNS records');
      await this.session.updateDnsRecords(plan.zone, plan.records);
      result.records = await this.session.infoDnsRecords(plan.domain);
    }

    if (!plan.ttlChanged && !plan.recordsChanged) {
      this.logger.debug({ domain: plan.domain }, 'Zone already in sync');
    }

    return result;
  }
}
