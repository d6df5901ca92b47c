import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import type { Logger } from 'pino';
import type { AppConfig } from './config';
import { createRateLimit } from './middleware/rateLimit';
import { createRequestLogger } from './middleware/requestLogger';
import { createSecurityHeaders } from './middleware/securityHeaders';
import { createStatusRouter } from './routes/status';
import type { StatusQueryService } from './services/status/StatusQueryService';
import { createErrorHandler } from './utils/errors';
import defaultLogger from './utils/logger';

export type AppHttpConfig = Pick<AppConfig, 'corsOrigin' | 'trustProxy' | 'rateLimit'>;

export interface CreateAppOptions {
  config: AppHttpConfig;
  statusService: StatusQueryService;
  logger?: Logger;
}

export function createApp(options: CreateAppOptions): Express {
  const { config, statusService, logger = defaultLogger } = options;
  const app = express();

  // Must be set before any middleware that reads req.ip
  app.set('trust proxy', config.trustProxy);

  app.use(createSecurityHeaders());
  if (config.corsOrigin) {
    app.use(cors({ origin: config.corsOrigin }));
  }
  app.use(express.json({ limit: '100kb' }));
  app.use(createRateLimit(config.rateLimit));
  app.use(createRequestLogger({ logger }));

  app.use(createStatusRouter(statusService));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Catches body-parser errors as well as route errors
  app.use(createErrorHandler(logger));

  return app;
}
