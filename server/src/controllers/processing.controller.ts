/**
 * POST /api/v1/process-menus
 * Runs the menu pipeline over given (or all pending) restaurants, detached by default.
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { BackgroundTasks } from '../lib/concurrency/background-tasks.js';
import type { MenuProcessor } from '../services/menu/menu-processor.js';
import type { RestaurantSummary } from '../services/menu/menu.types.js';
import type { WorkerCounts } from '../config/pipeline.config.js';
import { createUnavailableError } from '../middleware/error.middleware.js';
import { ProcessMenusSchema, sendValidationError } from './schemas.js';

export function summarizeBatch(results: Map<string, RestaurantSummary>) {
  const details: Record<string, {
    total_images: number;
    menu_images_found: number;
    total_menu_items: number;
    processing_time_ms: number;
    error: string | null;
  }> = {};

  let successful = 0;
  let totalItems = 0;
  for (const [placeId, summary] of results) {
    if (summary.error === null) successful++;
    totalItems += summary.totalMenuItems;
    details[placeId] = {
      total_images: summary.totalImages,
      menu_images_found: summary.menuImagesFound,
      total_menu_items: summary.totalMenuItems,
      processing_time_ms: summary.elapsedMs,
      error: summary.error,
    };
  }

  return {
    total_restaurants: results.size,
    successful_restaurants: successful,
    total_menu_items_extracted: totalItems,
    details,
  };
}

export function createProcessingRouter(processor: MenuProcessor | null, background: BackgroundTasks): Router {
  const router = Router();

  router.post('/process-menus', async (req: Request, res: Response, next: NextFunction) => {
    const validation = ProcessMenusSchema.safeParse(req.body ?? {});
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    if (!processor) {
      next(createUnavailableError('Menu processing is unavailable: no LLM provider configured'));
      return;
    }

    const body = validation.data;
    const workers: Partial<WorkerCounts> = {
      restaurants: body.max_workers,
      classification: body.classification_workers,
      analysis: body.analysis_workers,
    };
    const options = { placeIds: body.restaurant_ids, workers, traceId: req.traceId };

    if (body.background) {
      background.run('menu_batch', () => processor.processRestaurants(options), {
        restaurants: body.restaurant_ids?.length ?? 'pending',
        traceId: req.traceId,
      });
      res.status(202).json({
        success: true,
        message: 'Menu processing started in background',
        restaurants_requested: body.restaurant_ids?.length ?? null,
        traceId: req.traceId,
      });
      return;
    }

    try {
      const results = await processor.processRestaurants(options);
      res.json({ success: true, ...summarizeBatch(results) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
