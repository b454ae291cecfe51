/**
 * Express Application Setup
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import { createChildLogger } from './core/Logger.js';
import type { ServerConfig } from './config/schema.js';
import { createApiRouter, errorHandler, notFoundHandler, type SyncRunner } from './api/index.js';

export interface AppOptions {
  subdomainsFile: string;
  runner: SyncRunner;
  trustProxy?: boolean;
}

/**
 * Create and configure the webhook application
 */
export function createApp(options: AppOptions): Express {
  const app = express();
  const logger = createChildLogger({ service: 'HTTP' });

  if (options.trustProxy) {
    app.set('trust proxy', true);
  }

  app.disable('x-powered-by');
  app.use(helmet());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug({ method: req.method, path: req.path, ip: req.ip }, 'Request received');
    next();
  });

  app.use(createApiRouter({ subdomainsFile: options.subdomainsFile, runner: options.runner }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start listening; resolves once the server is bound
 */
export function startServer(app: Express, config: ServerConfig): Promise<Server> {
  const logger = createChildLogger({ service: 'HTTP' });
  const { port, host } = config;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'Webhook server started');
      resolve(server);
    });

    server.on('error', (error) => {
      logger.error({ error }, 'Webhook server error');
      reject(error);
    });
  });
}
