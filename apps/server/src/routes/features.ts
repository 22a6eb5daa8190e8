import { Router } from 'express';
import type { CrudViewService } from '../services/crudViews';
import { route } from './respond';

export function createFeaturesRouter(service: CrudViewService): Router {
  const features = Router();

  // GET /api/layers/:layerId/features
  // Returns: [{identifier, title, properties, detailUrl, extent}, ...] with the view's list columns only
  features.get('/layers/:layerId/features', route('FEATURES', async (req, res) => {
    res.json(await service.listFeatures(req.params.layerId));
  }));

  features.get('/layers/:layerId/features/:identifier', route('FEATURES', async (req, res) => {
    res.json(await service.getFeature(req.params.layerId, req.params.identifier));
  }));

  return features;
}
