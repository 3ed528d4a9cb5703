/**
 * Article collection endpoints
 */

import { Router } from 'express';
import { z } from 'zod';
import { ArticleCollectionSchema } from '../schemas';
import { DOCUMENTS } from '../storage/document-store';
import { AppContext } from './context';
import { adminAuth, asyncHandler } from './middleware';

const DaySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const ListQuerySchema = z.object({
  from: DaySchema.optional(),
  to: DaySchema.optional(),
});

export function createArticlesRouter(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/articles?from=YYYY-MM-DD&to=YYYY-MM-DD
   * Newest first; both bounds inclusive and optional
   */
  router.get('/', asyncHandler(async (req, res) => {
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', issues: query.error.issues.map(i => i.message) });
      return;
    }

    const { from, to } = query.data;
    const articles = await ctx.store.load(DOCUMENTS.articles, ArticleCollectionSchema, []);
    const filtered = articles.filter(article =>
      (!from || article.date >= from) && (!to || article.date <= to)
    );

    res.json({ total: filtered.length, articles: filtered });
  }));

  /**
   * DELETE /api/articles/:id
   * The only way an article leaves the collection
   */
  router.delete('/:id', adminAuth(ctx.adminApiKey), asyncHandler(async (req, res) => {
    const { content, version, valid } = await ctx.store.loadVersioned(DOCUMENTS.articles, ArticleCollectionSchema, []);
    if (!valid) {
      res.status(500).json({ error: 'Failed to delete article', message: `Stored ${DOCUMENTS.articles} could not be read` });
      return;
    }

    const remaining = content.filter(article => article.id !== req.params.id);

    if (remaining.length === content.length) {
      res.status(404).json({ error: 'Article not found' });
      return;
    }

    const result = await ctx.store.save(
      DOCUMENTS.articles,
      remaining,
      `Delete article ${req.params.id}`,
      { expectedVersion: version }
    );

    if (!result.ok) {
      res.status(result.reason === 'conflict' ? 409 : 500).json({ error: 'Failed to delete article', message: result.message });
      return;
    }

    res.json({ deleted: req.params.id, total: remaining.length });
  }));

  return router;
}
