import { Request, Response } from 'express';
import { ArticleCollectionSchema } from '../schemas';
import { DOCUMENTS } from '../storage/document-store';
import { AppContext } from './context';

export function healthCheck(ctx: AppContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    const reachable = ctx.pingStore ? await ctx.pingStore() : true;

    if (!reachable) {
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString()
      });
      return;
    }

    const articles = await ctx.store.load(DOCUMENTS.articles, ArticleCollectionSchema, []);

    res.json({
      status: 'healthy',
      database: 'connected',
      totalArticles: articles.length,
      latestArticle: articles[0]?.timestamp ?? null,
      timestamp: new Date().toISOString()
    });
  };
}
