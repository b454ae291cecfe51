/**
 * Service exports
 */
export { SyncEngine, type SyncPlan, type CommitResult } from './SyncEngine.js';
export { DynDnsService, type SyncRequest } from './DynDnsService.js';
export { HostsLoader, type DesiredState } from './HostsLoader.js';
export { renderReport, renderRecords, renderZone, type SyncReport } from './report.js';
export { loadSubdomains, type Subdomains } from './SubdomainsLoader.js';
