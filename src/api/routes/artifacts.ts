/**
 * Artifacts API Route
 *
 * GET /artifacts/:handle - Chart configuration behind a handle
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { ArtifactStore } from '../../tools/charts.js';

export function createArtifactsRouter(artifacts: ArtifactStore): Router {
  const router = Router();

  router.get('/:handle', (req: Request, res: Response, next: NextFunction) => {
    try {
      const artifact = artifacts.get(req.params.handle);
      res.json({
        handle: artifact.handle,
        chartType: artifact.chartType,
        title: artifact.title,
        dataPoints: artifact.dataPoints,
        config: artifact.config,
        createdAt: artifact.createdAt,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
