import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import type { AppConfig } from '../../../shared/config/index.js';
import type { Logger } from '../../../shared/utils/index.js';
import { createConversionRouter } from './routes/conversion.routes.js';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware.js';
import type { ConversionGateway } from './services/conversion.service.js';

export interface AppDependencies {
  gateway: ConversionGateway;
  config: Pick<AppConfig, 'env' | 'corsOrigins'>;
  logger?: Logger;
}

export function createApp({ gateway, config, logger }: AppDependencies): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  app.use('/', createConversionRouter(gateway));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ logger, production: config.env === 'production' }));

  return app;
}
