import { Router, type Request, type Response, type NextFunction } from 'express';
import type { CatalogService, GeoPoint } from '../services/catalog/catalog.service.js';
import { createNotFoundError } from '../middleware/error.middleware.js';
import { OptionalOriginQuerySchema, RestaurantListQuerySchema, sendValidationError } from './schemas.js';

/**
 * GET /api/v1/restaurants      restaurants within a radius, paginated
 * GET /api/v1/restaurants/:id  one restaurant by uuid or place id
 */
export function createRestaurantsRouter(catalog: CatalogService): Router {
  const router = Router();

  router.get('/restaurants', async (req: Request, res: Response, next: NextFunction) => {
    const validation = RestaurantListQuerySchema.safeParse(req.query);
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    try {
      const query = validation.data;
      const { data, pagination } = await catalog.listRestaurants({
        latitude: query.latitude,
        longitude: query.longitude,
        radiusKm: query.radius,
        page: query.page,
        limit: query.limit,
        sortBy: query.sort_by,
      });

      res.json({
        success: true,
        data,
        pagination,
        search_params: {
          latitude: query.latitude,
          longitude: query.longitude,
          radius_km: query.radius,
          sort_by: query.sort_by,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/restaurants/:id', async (req: Request, res: Response, next: NextFunction) => {
    const validation = OptionalOriginQuerySchema.safeParse(req.query);
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    try {
      const { latitude, longitude } = validation.data;
      const origin: GeoPoint | undefined =
        latitude !== undefined && longitude !== undefined ? { latitude, longitude } : undefined;

      const restaurant = await catalog.getRestaurant(req.params.id ?? '', origin);
      if (!restaurant) {
        next(createNotFoundError(`Restaurant not found: ${req.params.id}`));
        return;
      }
      res.json({ success: true, data: restaurant });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
