import { Router } from 'express';
import type { CrudViewService } from '../services/crudViews';
import { route } from './respond';

export function createSettingsRouter(service: CrudViewService): Router {
  const settings = Router();

  // GET /api/settings
  // Returns: { menu: [...menu groups, Unclassified], config: {...} }
  settings.get('/settings', route('SETTINGS', async (_req, res) => {
    res.json(await service.getSettings());
  }));

  settings.get('/widgets', (_req, res) => {
    res.json(service.widgets.list());
  });

  settings.get('/health', (_, res) => res.json({ ok: true }));

  return settings;
}
