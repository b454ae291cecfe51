/**
 * DynDNS Service
 * Runs one complete sync pass: login, reconcile, optional commit, logout
 */
import { v4 as uuidv4 } from 'uuid';
import { createChildLogger, symbols } from '../core/Logger.js';
import type { ApiCredentials } from '../config/schema.js';
import type { DNSRecord } from '../dns/DNSRecord.js';
import { withApiSession, type ApiSessionOptions } from '../providers/ccp/index.js';
import { SyncEngine } from './SyncEngine.js';
import type { SyncReport } from './report.js';

export interface SyncRequest {
  domain: string;
  desired: Iterable<DNSRecord>;
  ttl?: number;
  /** Write changes; without it the pass only reports */
  update: boolean;
}

export class DynDnsService {
  constructor(
    private readonly credentials: ApiCredentials,
    private readonly sessionOptions: Omit<ApiSessionOptions, 'logger'> = {}
  ) {}

  async sync(request: SyncRequest): Promise<SyncReport> {
    const passId = uuidv4();
    const logger = createChildLogger({ service: 'DynDns', passId, domain: request.domain });

    logger.debug({ update: request.update, ttl: request.ttl }, `${symbols.sync} Starting sync pass`);

    const report = await withApiSession(
      this.credentials,
      async (session) => {
        const engine = new SyncEngine(session, logger);
        const plan = await engine.reconcile(request.domain, request.desired, request.ttl);

        const base: SyncReport = {
          passId,
          domain: request.domain,
          zone: plan.currentZone,
          currentRecords: plan.currentRecords,
          records: plan.records,
          requestedTtl: request.ttl,
          recordsChanged: plan.recordsChanged,
          ttlChanged: plan.ttlChanged,
          update: request.update,
        };

        if (!request.update) {
          return base;
        }

        const committed = await engine.commit(plan);
        return { ...base, confirmedZone: committed.zone, confirmedRecords: committed.records };
      },
      { ...this.sessionOptions, logger }
    );

    const changed = report.recordsChanged || report.ttlChanged;
    if (changed && report.update) {
      logger.info({ records: report.recordsChanged, ttl: report.ttlChanged }, `${symbols.success} Zone updated`);
    } else if (changed) {
      logger.info({ records: report.recordsChanged, ttl: report.ttlChanged }, 'Changes pending (dry run)');
    } else {
      logger.info('Zone already in sync');
    }

    return report;
  }
}
