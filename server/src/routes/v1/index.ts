/**
 * API v1 Router Aggregator
 * Centralizes all v1 API routes under /api/v1
 *
 * Route Structure:
 * - /api/v1/health                 GET  (liveness)
 * - /api/v1/scan-nearby            POST (rate limited, may start discovery)
 * - /api/v1/restaurants            GET, GET /:id, GET /:id/menu
 * - /api/v1/menu-items             GET
 * - /api/v1/process-menus          POST (rate limited, runs the menu pipeline)
 */

import { Router } from 'express';
import { createRateLimiter } from '../../middleware/rate-limit.middleware.js';
import { createLivenessHandler } from '../../controllers/health.controller.js';
import { createScanRouter } from '../../controllers/scan.controller.js';
import { createRestaurantsRouter } from '../../controllers/restaurants.controller.js';
import { createMenuRouter } from '../../controllers/menu.controller.js';
import { createProcessingRouter } from '../../controllers/processing.controller.js';
import type { ScanService } from '../../services/discovery/scan.service.js';
import type { CatalogService } from '../../services/catalog/catalog.service.js';
import type { MenuProcessor } from '../../services/menu/menu-processor.js';
import type { BackgroundTasks } from '../../lib/concurrency/background-tasks.js';

export interface V1RouterDeps {
  scan: ScanService;
  catalog: CatalogService;
  processor: MenuProcessor | null;
  background: BackgroundTasks;
  defaultRadiusKm: number;
  placesConfigured: boolean;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();

  // Scans can start paid scraping jobs (30 req/min per IP)
  const scanRateLimiter = createRateLimiter({
    windowMs: 60 * 1000,
    maxRequests: 30,
    keyPrefix: 'scan'
  });

  const processRateLimiter = createRateLimiter({
    windowMs: 60 * 1000,
    maxRequests: 10,
    keyPrefix: 'process'
  });

  router.get('/health', createLivenessHandler({
    llm: deps.processor !== null,
    places: deps.placesConfigured
  }));

  router.use('/scan-nearby', scanRateLimiter);
  router.use(createScanRouter(deps.scan, deps.defaultRadiusKm));

  router.use(createRestaurantsRouter(deps.catalog));
  router.use(createMenuRouter(deps.catalog));

  router.use('/process-menus', processRateLimiter);
  router.use(createProcessingRouter(deps.processor, deps.background));

  return router;
}
