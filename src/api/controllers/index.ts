/**
 * Controller exports
 */
export { healthCheck } from './healthController.js';
export { createUpdateHandler, type DynDnsControllerOptions, type SyncRunner } from './dyndnsController.js';
