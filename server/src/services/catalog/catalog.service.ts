/**
 * Catalog Service
 * Read side: restaurants and menu items around a coordinate.
 *
 * Distances are computed in process (haversine) over the stored rows and
 * rounded to 2 decimals before filtering and sorting.
 */

import { haversineKm, roundKm } from '../../lib/geo/distance.js';
import type { MenuItemRow, RestaurantRow, RestaurantStore } from '../store/restaurant-store.types.js';
import { paginate, type Pagination } from './pagination.js';
import {
  describeRatio,
  sortMenuItems,
  type CalculatedRatio,
  type SortOrder,
  type SortSpec
} from './menu-sort.js';

export const RESTAURANT_SORTS = ['distance', 'rating', 'reviews_count', 'name'] as const;
export type RestaurantSort = typeof RESTAURANT_SORTS[number];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface RestaurantListQuery extends GeoPoint {
  radiusKm: number;
  page: number;
  limit: number;
  sortBy: RestaurantSort;
}

export interface MenuItemListQuery extends GeoPoint {
  radiusKm: number;
  page: number;
  limit: number;
  sort: SortSpec;
  order: SortOrder;
  /** When set, only this restaurant and no radius check */
  restaurantId?: string;
}

export interface RestaurantMenuQuery {
  origin: GeoPoint | null;
  page: number;
  limit: number;
  sort: SortSpec;
  order: SortOrder;
}

export type RestaurantView = Omit<RestaurantRow, 'status'> & {
  distance_km: number | null;
  processing_status: RestaurantRow['status'];
};

export type MenuItemView = MenuItemRow & {
  restaurant_name: string;
  restaurant_distance_km: number | null;
  restaurant_place_id: string;
  calculated_ratio?: CalculatedRatio;
};

export interface RestaurantHeader {
  id: string;
  name: string;
  place_id: string;
  distance_km: number | null;
}

export function distanceFrom(origin: GeoPoint, row: RestaurantRow): number | null {
  if (row.latitude === null || row.longitude === null) return null;
  return roundKm(haversineKm(origin.latitude, origin.longitude, row.latitude, row.longitude));
}

function toRestaurantView(row: RestaurantRow, distanceKm: number | null): RestaurantView {
  const { status, ...rest } = row;
  return { ...rest, distance_km: distanceKm, processing_status: status };
}

function compareRestaurants(sortBy: RestaurantSort) {
  return (a: RestaurantView, b: RestaurantView): number => {
    switch (sortBy) {
      case 'distance':
        return (a.distance_km ?? Number.POSITIVE_INFINITY) - (b.distance_km ?? Number.POSITIVE_INFINITY);
      case 'rating':
        return (b.rating ?? 0) - (a.rating ?? 0);
      case 'reviews_count':
        return (b.reviews_count ?? 0) - (a.reviews_count ?? 0);
      case 'name': {
        const left = a.name.toLowerCase();
        const right = b.name.toLowerCase();
        return left === right ? 0 : left < right ? -1 : 1;
      }
    }
  };
}

export class CatalogService {
  constructor(private readonly store: RestaurantStore) {}

  /**
   * Restaurants (any status) within the radius
   */
  async listRestaurants(query: RestaurantListQuery): Promise<{ data: RestaurantView[]; pagination: Pagination }> {
    const rows = await this.store.listRestaurants();
    const inRadius: RestaurantView[] = [];
    for (const row of rows) {
      const distanceKm = distanceFrom(query, row);
      if (distanceKm !== null && distanceKm <= query.radiusKm) {
        inRadius.push(toRestaurantView(row, distanceKm));
      }
    }

    // Array.prototype.sort is stable
    inRadius.sort(compareRestaurants(query.sortBy));
    return paginate(inRadius, query.page, query.limit);
  }

  async getRestaurant(idOrPlaceId: string, origin?: GeoPoint): Promise<RestaurantView | null> {
    const row = await this.store.getRestaurant(idOrPlaceId);
    if (!row) return null;
    return toRestaurantView(row, origin ? distanceFrom(origin, row) : null);
  }

  /**
   * Available menu items of the restaurants within the radius
   */
  async listMenuItems(query: MenuItemListQuery): Promise<{ data: MenuItemView[]; pagination: Pagination }> {
    let restaurants: RestaurantRow[];
    if (query.restaurantId) {
      const row = await this.store.getRestaurant(query.restaurantId);
      restaurants = row ? [row] : [];
    } else {
      restaurants = await this.store.listRestaurants();
    }

    const nearby = new Map<string, { row: RestaurantRow; distanceKm: number | null }>();
    for (const row of restaurants) {
      const distanceKm = distanceFrom(query, row);
      if (query.restaurantId || (distanceKm !== null && distanceKm <= query.radiusKm)) {
        nearby.set(row.id, { row, distanceKm });
      }
    }

    return this.collectMenuItems(nearby, query);
  }

  async getRestaurantMenu(
    idOrPlaceId: string,
    query: RestaurantMenuQuery
  ): Promise<{ restaurant: RestaurantHeader; data: MenuItemView[]; pagination: Pagination } | null> {
    const row = await this.store.getRestaurant(idOrPlaceId);
    if (!row) return null;

    const distanceKm = query.origin ? distanceFrom(query.origin, row) : null;
    const { data, pagination } = await this.collectMenuItems(
      new Map([[row.id, { row, distanceKm }]]),
      query
    );

    return {
      restaurant: { id: row.id, name: row.name, place_id: row.place_id, distance_km: distanceKm },
      data,
      pagination,
    };
  }

  private async collectMenuItems(
    restaurants: Map<string, { row: RestaurantRow; distanceKm: number | null }>,
    query: { page: number; limit: number; sort: SortSpec; order: SortOrder }
  ): Promise<{ data: MenuItemView[]; pagination: Pagination }> {
    const items = await this.store.listMenuItems([...restaurants.keys()], { availableOnly: true });

    const annotated: MenuItemView[] = [];
    for (const item of items) {
      const owner = restaurants.get(item.restaurant_id);
      if (!owner) continue;
      annotated.push({
        ...item,
        restaurant_name: owner.row.name,
        restaurant_distance_km: owner.distanceKm,
        restaurant_place_id: owner.row.place_id,
      });
    }

    const sorted = sortMenuItems(annotated, query.sort, query.order);
    const page = paginate(sorted, query.page, query.limit);
    const spec = query.sort;
    if (spec.kind === 'ratio') {
      page.data = page.data.map(item => ({ ...item, calculated_ratio: describeRatio(item, spec) }));
    }
    return page;
  }
}
