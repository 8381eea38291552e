/// <reference path="./types/express/index.d.ts" />
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import { appConfig } from '@/config/app.config';
import { attachCorrelationId } from '@/middleware/correlation';
import { errorHandler, notFoundHandler } from '@/middleware/errorHandler';
import { createAgentRouter } from '@/routes/agent';
import { getPipelineDeps, type ServiceDeps } from '@/services/pipeline-deps';
import { logger } from '@/services/logger';

export function createApp(deps: ServiceDeps): express.Express {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: appConfig.corsOrigin.split(','),
      credentials: true,
    }),
  );

  if (appConfig.nodeEnv !== 'development') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(express.json({ limit: '1mb' }));
  app.use(attachCorrelationId);

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: appConfig.environment,
    });
  });

  app.use('/api/agent', createAgentRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

if (require.main === module) {
  const app = createApp(getPipelineDeps());
  app.listen(appConfig.port, '0.0.0.0', () => {
    logger.info('server:listening', {
      port: appConfig.port,
      nodeEnv: appConfig.nodeEnv,
      environment: appConfig.environment,
    });
  });
}
