import { Router } from 'express';
import {
  groupInputSchema,
  groupPatchSchema,
  renderingInputSchema,
  renderingPatchSchema,
  sanitizeOptionsSchema,
  syncPropertiesSchema,
  viewInputSchema,
  viewPatchSchema,
} from '../schemas';
import type { CrudViewService } from '../services/crudViews';
import { parseBody, route } from './respond';

export function createViewsRouter(service: CrudViewService): Router {
  const views = Router();

  views.get('/views', route('VIEWS', async (_req, res) => {
    res.json(await service.listViews());
  }));

  views.post('/views', route('VIEWS', async (req, res) => {
    res.status(201).json(await service.createView(parseBody(viewInputSchema, req.body)));
  }));

  views.get('/views/:viewId', route('VIEWS', async (req, res) => {
    res.json(await service.getView(req.params.viewId));
  }));

  views.patch('/views/:viewId', route('VIEWS', async (req, res) => {
    res.json(await service.updateView(req.params.viewId, parseBody(viewPatchSchema, req.body)));
  }));

  views.delete('/views/:viewId', route('VIEWS', async (req, res) => {
    await service.deleteView(req.params.viewId);
    res.status(204).end();
  }));

  // Derived documents, recomputed on every request

  views.get('/views/:viewId/schema', route('VIEWS', async (req, res) => {
    res.json(await service.getGroupedSchema(req.params.viewId));
  }));

  views.get('/views/:viewId/ui-schema', route('VIEWS', async (req, res) => {
    res.json(await service.getGroupedUiHints(req.params.viewId));
  }));

  views.get('/views/:viewId/list-properties', route('VIEWS', async (req, res) => {
    res.json({
      available: await service.getListEligibleProperties(req.params.viewId),
      default: await service.getDefaultListProperties(req.params.viewId),
    });
  }));

  // PUT /api/views/:viewId/properties?sanitize=true
  // Body: { properties: PropertyDefinition[] }
  views.put('/views/:viewId/properties', route('VIEWS', async (req, res) => {
    const { properties } = parseBody(syncPropertiesSchema, req.body);
    res.json(await service.syncProperties(req.params.viewId, properties, { sanitize: req.query.sanitize === 'true' }));
  }));

  views.post('/views/:viewId/sanitize', route('SANITIZE', async (req, res) => {
    const options = parseBody(sanitizeOptionsSchema, req.body);
    res.json({ sanitized: await service.sanitize(req.params.viewId, options) });
  }));

  // Property display groups

  views.get('/views/:viewId/groups', route('GROUPS', async (req, res) => {
    res.json(await service.listGroups(req.params.viewId));
  }));

  views.post('/views/:viewId/groups', route('GROUPS', async (req, res) => {
    res.status(201).json(await service.createGroup(req.params.viewId, parseBody(groupInputSchema, req.body)));
  }));

  views.patch('/views/:viewId/groups/:slug', route('GROUPS', async (req, res) => {
    const { viewId, slug } = req.params;
    res.json(await service.updateGroup(viewId, slug, parseBody(groupPatchSchema, req.body)));
  }));

  views.delete('/views/:viewId/groups/:slug', route('GROUPS', async (req, res) => {
    await service.deleteGroup(req.params.viewId, req.params.slug);
    res.status(204).end();
  }));

  // Property rendering rules

  views.get('/views/:viewId/renderings', route('RENDERINGS', async (req, res) => {
    res.json(await service.listRenderings(req.params.viewId));
  }));

  views.post('/views/:viewId/renderings', route('RENDERINGS', async (req, res) => {
    res.status(201).json(await service.createRendering(req.params.viewId, parseBody(renderingInputSchema, req.body)));
  }));

  views.patch('/views/:viewId/renderings/:property', route('RENDERINGS', async (req, res) => {
    const { viewId, property } = req.params;
    res.json(await service.updateRendering(viewId, property, parseBody(renderingPatchSchema, req.body)));
  }));

  views.delete('/views/:viewId/renderings/:property', route('RENDERINGS', async (req, res) => {
    await service.deleteRendering(req.params.viewId, req.params.property);
    res.status(204).end();
  }));

  return views;
}
