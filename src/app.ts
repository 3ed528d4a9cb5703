import express, { Express } from 'express';
import { createArticlesRouter } from './api/articles';
import { AppContext } from './api/context';
import { healthCheck } from './api/health';
import { createIngestRouter } from './api/ingest';
import { createJobStatusRouter } from './api/job-status';
import { corsMiddleware, errorHandler, requestLogger, securityHeaders, asyncHandler } from './api/middleware';
import { createSettingsRouter } from './api/settings';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Trust only the first proxy in front of us so rate limiting sees real client IPs
  if (ctx.production) {
    app.set('trust proxy', 1);
  }

  app.use(securityHeaders);
  app.use(express.json());
  app.use(corsMiddleware(ctx.frontendUrl, ctx.production ?? false));
  if (ctx.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.get('/health', asyncHandler(healthCheck(ctx)));
  app.use('/api/articles', createArticlesRouter(ctx));
  app.use('/api/settings', createSettingsRouter(ctx));
  app.use('/api/ingest', createIngestRouter(ctx));
  app.use('/api/job-status', createJobStatusRouter(ctx));

  app.use(errorHandler);

  return app;
}
