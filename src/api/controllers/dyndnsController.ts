/**
 * DynDNS webhook controller
 *
 * GET /:key?ipv4=<address>&ipv6=<address>&ttl=<seconds>
 */
import type { Request, Response } from 'express';
import { createChildLogger } from '../../core/Logger.js';
import { DNSRecord } from '../../dns/DNSRecord.js';
import { loadSubdomains } from '../../services/SubdomainsLoader.js';
import { renderReport } from '../../services/report.js';
import type { DynDnsService } from '../../services/DynDnsService.js';
import { HttpError, asyncHandler } from '../middleware/index.js';
import { webhookQuerySchema } from '../validation.js';

export type SyncRunner = Pick<DynDnsService, 'sync'>;

export interface DynDnsControllerOptions {
  subdomainsFile: string;
  runner: SyncRunner;
}

export function createUpdateHandler(options: DynDnsControllerOptions) {
  const logger = createChildLogger({ service: 'Webhook' });

  return asyncHandler(async (req: Request, res: Response) => {
    const subdomains = loadSubdomains(options.subdomainsFile);
    const hostname = subdomains.hosts.get(String(req.params['key']));
    if (hostname === undefined) {
      throw HttpError.forbidden();
    }

    const query = webhookQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw HttpError.badRequest(query.error.errors[0]?.message ?? 'Invalid query', 'VALIDATION_ERROR');
    }
    const { ipv4, ipv6, ttl } = query.data;

    logger.debug({ hostname, ipv4: ipv4 ?? '-', ipv6: ipv6 ?? '-' }, 'Updating subdomain');

    const desired: DNSRecord[] = [];
    if (ipv4 !== undefined) {
      desired.push(new DNSRecord({ hostname, type: 'A', destination: ipv4 }));
    }
    if (ipv6 !== undefined) {
      desired.push(new DNSRecord({ hostname, type: 'AAAA', destination: ipv6 }));
    }

    const report = await options.runner.sync({ domain: subdomains.domain, desired, ttl, update: true });

    res.type('text/plain').send(renderReport(report));
  });
}
