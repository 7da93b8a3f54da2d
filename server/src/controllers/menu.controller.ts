/**
 * Menu Controller
 *
 * Endpoints:
 * - GET /api/v1/menu-items              items around a point, sortable by nutrient ratio
 * - GET /api/v1/restaurants/:id/menu    one restaurant's items
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { CatalogService } from '../services/catalog/catalog.service.js';
import {
  SINGLE_SORT_FIELDS,
  SortSpecError,
  parseSortOrder,
  parseSortSpec,
  type SingleSortField,
  type SortOrder,
  type SortSpec
} from '../services/catalog/menu-sort.js';
import { createNotFoundError } from '../middleware/error.middleware.js';
import { MenuItemListQuerySchema, RestaurantMenuQuerySchema, sendValidationError } from './schemas.js';

/** Distance makes no sense inside a single restaurant */
const RESTAURANT_MENU_SORTS = SINGLE_SORT_FIELDS.filter(field => field !== 'restaurant_distance');

/**
 * Parses sort_by/sort_order or answers 400 with the accepted values
 */
function resolveSort(
  req: Request,
  res: Response,
  sortBy: string,
  sortOrder: string,
  allowed: readonly SingleSortField[]
): { sort: SortSpec; order: SortOrder } | null {
  try {
    return { sort: parseSortSpec(sortBy, allowed), order: parseSortOrder(sortOrder) };
  } catch (error) {
    if (error instanceof SortSpecError) {
      sendValidationError(req, res, { accepted: error.accepted }, error.message);
      return null;
    }
    throw error;
  }
}

export function createMenuRouter(catalog: CatalogService): Router {
  const router = Router();

  router.get('/menu-items', async (req: Request, res: Response, next: NextFunction) => {
    const validation = MenuItemListQuerySchema.safeParse(req.query);
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    const query = validation.data;
    const sorting = resolveSort(req, res, query.sort_by, query.sort_order, SINGLE_SORT_FIELDS);
    if (!sorting) return;

    try {
      const { data, pagination } = await catalog.listMenuItems({
        latitude: query.latitude,
        longitude: query.longitude,
        radiusKm: query.radius,
        page: query.page,
        limit: query.limit,
        sort: sorting.sort,
        order: sorting.order,
        restaurantId: query.restaurant_id,
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
          sort_order: sorting.order,
          restaurant_id: query.restaurant_id ?? null,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/restaurants/:id/menu', async (req: Request, res: Response, next: NextFunction) => {
    const validation = RestaurantMenuQuerySchema.safeParse(req.query);
    if (!validation.success) {
      sendValidationError(req, res, validation.error.issues);
      return;
    }

    const query = validation.data;
    const sorting = resolveSort(req, res, query.sort_by, query.sort_order, RESTAURANT_MENU_SORTS);
    if (!sorting) return;

    try {
      const origin = query.latitude !== undefined && query.longitude !== undefined
        ? { latitude: query.latitude, longitude: query.longitude }
        : null;

      const menu = await catalog.getRestaurantMenu(req.params.id ?? '', {
        origin,
        page: query.page,
        limit: query.limit,
        sort: sorting.sort,
        order: sorting.order,
      });
      if (!menu) {
        next(createNotFoundError(`Restaurant not found: ${req.params.id}`));
        return;
      }

      res.json({
        success: true,
        restaurant: menu.restaurant,
        data: menu.data,
        pagination: menu.pagination,
        search_params: {
          sort_by: query.sort_by,
          sort_order: sorting.order,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
