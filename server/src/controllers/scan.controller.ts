/**
 * Scan Controller
 * POST /api/v1/scan-nearby - cached restaurants around a point, plus
 * background discovery when the area is sparsely covered
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ScanService } from '../services/discovery/scan.service.js';
import { ScanNearbySchema, sendValidationError } from './schemas.js';

export function createScanRouter(scan: ScanService, defaultRadiusKm: number): Router {
  const router = Router();

  router.post('/scan-nearby', async (req: Request, res: Response, next: NextFunction) => {
    const validation = ScanNearbySchema.safeParse(req.body);
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    try {
      const { latitude, longitude, radius } = validation.data;
      const result = await scan.scanNearby(
        { latitude, longitude, radiusKm: radius ?? defaultRadiusKm },
        req.traceId
      );
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
