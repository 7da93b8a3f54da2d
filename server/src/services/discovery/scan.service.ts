/**
 * Scan Service
 *
 * Answers "what is around me" from the restaurants that already finished
 * processing, and (when few are cached) starts a background discovery job:
 * places search -> save as pending -> processing trigger.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { BackgroundTasks } from '../../lib/concurrency/background-tasks.js';
import type { PlacesProvider, SearchLocation } from '../places/places.types.js';
import type { MenuItemRow, RestaurantRow, RestaurantStore } from '../store/restaurant-store.types.js';
import type { ProcessingTrigger } from '../menu/processing-trigger.js';
import { distanceFrom } from '../catalog/catalog.service.js';

export interface ScanRequest extends SearchLocation {
  radiusKm: number;
}

export interface ScannedRestaurant {
  id: string;
  name: string;
  address: string;
  rating: number | null;
  reviewsCount: number;
  category: string;
  phone: string;
  website: string;
  priceLevel: string;
  openingHours: NonNullable<RestaurantRow['opening_hours']>;
  location: { lat: number | null; lng: number | null };
  placeId: string;
  url: string;
  distance_km: number;
  imageUrls: string[];
  processing_status: 'finished';
  menuItems: MenuItemRow[];
  has_menu_items: boolean;
}

export interface ScanResponse {
  success: true;
  message: string;
  restaurants: ScannedRestaurant[];
  searchLocation: { latitude: number; longitude: number; radius_km: number };
  processing_summary: {
    total_restaurants: number;
    completed: number;
    restaurants_with_menu: number;
  };
  background_processing: {
    status: 'started' | 'skipped';
    message: string;
  };
  data_source: 'cached' | 'none';
}

export interface ScanServiceDeps {
  store: RestaurantStore;
  places: PlacesProvider | null;
  trigger: ProcessingTrigger;
  background: BackgroundTasks;
  /** Discovery runs while at most this many restaurants are cached */
  backgroundThreshold: number;
}

function toScannedRestaurant(row: RestaurantRow, distanceKm: number, menuItems: MenuItemRow[]): ScannedRestaurant {
  return {
    id: row.id,
    name: row.name,
    address: row.address ?? '',
    rating: row.rating,
    reviewsCount: row.reviews_count ?? 0,
    category: row.category ?? '',
    phone: row.phone ?? '',
    website: row.website ?? '',
    priceLevel: row.price_level ?? '',
    openingHours: row.opening_hours ?? [],
    location: { lat: row.latitude, lng: row.longitude },
    placeId: row.place_id,
    url: row.google_maps_url ?? '',
    distance_km: distanceKm,
    imageUrls: row.image_urls,
    processing_status: 'finished',
    menuItems,
    has_menu_items: menuItems.length > 0,
  };
}

export class ScanService {
  constructor(private readonly deps: ScanServiceDeps) {}

  async scanNearby(request: ScanRequest, traceId?: string): Promise<ScanResponse> {
    const finished = await this.deps.store.listRestaurants({ status: 'finished' });

    const nearby: Array<{ row: RestaurantRow; distanceKm: number }> = [];
    for (const row of finished) {
      const distanceKm = distanceFrom(request, row);
      if (distanceKm !== null && distanceKm <= request.radiusKm) {
        nearby.push({ row, distanceKm });
      }
    }
    nearby.sort((a, b) => a.distanceKm - b.distanceKm);

    const menuItems = await this.deps.store.listMenuItems(nearby.map(entry => entry.row.id));
    const byRestaurant = new Map<string, MenuItemRow[]>();
    for (const item of menuItems) {
      const list = byRestaurant.get(item.restaurant_id) ?? [];
      list.push(item);
      byRestaurant.set(item.restaurant_id, list);
    }

    const restaurants = nearby.map(({ row, distanceKm }) =>
      toScannedRestaurant(row, distanceKm, byRestaurant.get(row.id) ?? [])
    );

    const background = this.maybeStartDiscovery(request, restaurants.length, traceId);

    logger.info({
      traceId,
      cached: restaurants.length,
      radiusKm: request.radiusKm,
      background: background.status,
    }, '[SCAN] Nearby scan served');

    return {
      success: true,
      message: `Found ${restaurants.length} cached restaurants within ${request.radiusKm}km`,
      restaurants,
      searchLocation: {
        latitude: request.latitude,
        longitude: request.longitude,
        radius_km: request.radiusKm,
      },
      processing_summary: {
        total_restaurants: restaurants.length,
        completed: restaurants.length,
        restaurants_with_menu: restaurants.filter(r => r.has_menu_items).length,
      },
      background_processing: background,
      data_source: restaurants.length > 0 ? 'cached' : 'none',
    };
  }

  /**
   * Background job: search, save new places as pending, trigger processing
   */
  async discover(location: SearchLocation, traceId?: string): Promise<void> {
    const places = this.deps.places;
    if (!places) return;

    const found = await places.searchRestaurants(location, { traceId });
    const saved = await this.deps.store.saveDiscoveredRestaurants(found);
    const result = await this.deps.trigger.trigger(found.map(place => place.placeId), traceId);

    logger.info({
      traceId,
      found: found.length,
      saved,
      triggered: result.triggered,
      restaurantsToProcess: result.restaurantsToProcess,
      skippedCount: result.skippedCount,
    }, '[SCAN] Discovery finished');
  }

  private maybeStartDiscovery(
    request: ScanRequest,
    cachedCount: number,
    traceId?: string
  ): ScanResponse['background_processing'] {
    if (cachedCount > this.deps.backgroundThreshold) {
      return {
        status: 'skipped',
        message: `Background processing skipped - ${cachedCount} restaurants already cached`,
      };
    }
    if (!this.deps.places) {
      return {
        status: 'skipped',
        message: 'Background processing skipped - places provider not configured',
      };
    }

    const location = { latitude: request.latitude, longitude: request.longitude };
    this.deps.background.run('discovery', () => this.discover(location, traceId), { traceId });
    return {
      status: 'started',
      message: 'Background discovery and menu processing started',
    };
  }
}
