/**
 * API Routes
 */
import { Router } from 'express';
import { healthCheck, createUpdateHandler, type DynDnsControllerOptions } from '../controllers/index.js';

export function createApiRouter(options: DynDnsControllerOptions): Router {
  const router = Router();

  router.get('/health', healthCheck);
  router.get('/:key', createUpdateHandler(options));

  return router;
}
