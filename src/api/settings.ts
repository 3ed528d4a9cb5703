/**
 * Run-time settings endpoints
 */

import { Router } from 'express';
import { loadSettings, saveSettings } from '../config/settings';
import { SettingsSchema } from '../schemas';
import { AppContext } from './context';
import { adminAuth, asyncHandler } from './middleware';

const SettingsPatchSchema = SettingsSchema.partial().strict();

export function createSettingsRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(adminAuth(ctx.adminApiKey));

  router.get('/', asyncHandler(async (_req, res) => {
    res.json(await loadSettings(ctx.store));
  }));

  /**
   * PUT /api/settings
   * Fields present in the body replace the stored ones; the scheduler picks them up on its next tick
   */
  router.put('/', asyncHandler(async (req, res) => {
    const patch = SettingsPatchSchema.safeParse(req.body);
    if (!patch.success) {
      res.status(400).json({
        error: 'Invalid settings',
        issues: patch.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
      return;
    }

    const current = await loadSettings(ctx.store);
    const next = {
      ...current,
      ...patch.data,
      rssUrls: patch.data.rssUrls ? Array.from(new Set(patch.data.rssUrls)) : current.rssUrls,
    };

    const result = await saveSettings(ctx.store, next, `Update Config: ${Object.keys(patch.data).join(', ') || 'no changes'}`);
    if (!result.ok) {
      res.status(500).json({ error: 'Failed to save settings', message: result.message });
      return;
    }

    res.json(next);
  }));

  return router;
}
