/**
 * In-Memory Restaurant Store
 * Map-backed implementation for tests and STORE_DRIVER=memory
 */

import { v4 as uuidv4 } from 'uuid';
import type { PlaceRecord } from '../places/places.types.js';
import type { ConsolidatedMenuItem } from '../menu/menu.types.js';
import {
  CLAIMABLE_STATUSES,
  looksLikeUuid,
  menuItemToInsertRow,
  placeToInsertRow,
  StoreError,
  type ListMenuItemsOptions,
  type MenuItemRow,
  type RestaurantRow,
  type RestaurantStatus,
  type RestaurantStore
} from './restaurant-store.types.js';

export class InMemoryRestaurantStore implements RestaurantStore {
  // keyed by place_id, insertion-ordered
  private restaurants = new Map<string, RestaurantRow>();
  private menuItems: MenuItemRow[] = [];

  /** Test helper: insert or overwrite a row directly */
  seedRestaurant(row: Partial<RestaurantRow> & { place_id: string }): RestaurantRow {
    const now = new Date().toISOString();
    const full: RestaurantRow = {
      id: uuidv4(),
      name: row.place_id,
      address: null,
      rating: null,
      reviews_count: null,
      category: null,
      phone: null,
      website: null,
      price_level: null,
      opening_hours: null,
      latitude: null,
      longitude: null,
      google_maps_url: null,
      image_urls: [],
      status: 'pending',
      processing_error: null,
      created_at: now,
      updated_at: now,
      ...row
    };
    this.restaurants.set(full.place_id, full);
    return full;
  }

  /** Test helper: insert a menu row directly */
  seedMenuItem(row: Partial<MenuItemRow> & { restaurant_id: string; name: string }): MenuItemRow {
    const full: MenuItemRow = {
      id: uuidv4(),
      description: null,
      price: null,
      currency: 'USD',
      category: null,
      calories: null,
      protein: null,
      carbs: null,
      fat: null,
      fiber: null,
      sugar: null,
      sodium: null,
      confidence_score: null,
      source_image_url: null,
      is_available: true,
      created_at: new Date().toISOString(),
      ...row
    };
    this.menuItems.push(full);
    return full;
  }

  async getRestaurant(idOrPlaceId: string): Promise<RestaurantRow | null> {
    if (looksLikeUuid(idOrPlaceId)) {
      for (const row of this.restaurants.values()) {
        if (row.id === idOrPlaceId) return { ...row };
      }
    }
    return this.getRestaurantByPlaceId(idOrPlaceId);
  }

  async getRestaurantByPlaceId(placeId: string): Promise<RestaurantRow | null> {
    const row = this.restaurants.get(placeId);
    return row ? { ...row } : null;
  }

  async listRestaurants(filter?: { status?: RestaurantStatus }): Promise<RestaurantRow[]> {
    const rows = [...this.restaurants.values()];
    return rows
      .filter(row => !filter?.status || row.status === filter.status)
      .map(row => ({ ...row }));
  }

  async listPlaceIdsByStatus(status: RestaurantStatus): Promise<string[]> {
    const rows = await this.listRestaurants({ status });
    return rows.map(row => row.place_id);
  }

  async getStatuses(placeIds: readonly string[]): Promise<Map<string, RestaurantStatus>> {
    const statuses = new Map<string, RestaurantStatus>();
    for (const placeId of placeIds) {
      const row = this.restaurants.get(placeId);
      if (row) statuses.set(placeId, row.status);
    }
    return statuses;
  }

  async updateStatus(placeId: string, status: RestaurantStatus, processingError?: string | null): Promise<void> {
    const row = this.restaurants.get(placeId);
    if (!row) {
      throw new StoreError('updateStatus', `no restaurant with place_id ${placeId}`);
    }
    row.status = status;
    row.processing_error = status === 'error' ? processingError ?? null : null;
    row.updated_at = new Date().toISOString();
  }

  async claimForProcessing(placeId: string): Promise<RestaurantRow | null> {
    // check and write happen in one synchronous step
    const row = this.restaurants.get(placeId);
    if (!row || !isClaimable(row.status)) return null;
    row.status = 'processing';
    row.processing_error = null;
    row.updated_at = new Date().toISOString();
    return { ...row };
  }

  async saveDiscoveredRestaurants(places: readonly PlaceRecord[]): Promise<number> {
    for (const place of places) {
      if (!place.placeId || this.restaurants.has(place.placeId)) continue;
      const now = new Date().toISOString();
      this.restaurants.set(place.placeId, {
        id: uuidv4(),
        ...placeToInsertRow(place),
        processing_error: null,
        created_at: now,
        updated_at: now
      });
    }
    return places.length;
  }

  async replaceMenuItems(placeId: string, items: readonly ConsolidatedMenuItem[]): Promise<number> {
    const restaurant = this.restaurants.get(placeId);
    if (!restaurant) {
      throw new StoreError('replaceMenuItems', `no restaurant with place_id ${placeId}`);
    }
    this.menuItems = this.menuItems.filter(item => item.restaurant_id !== restaurant.id);
    const createdAt = new Date().toISOString();
    for (const item of items) {
      this.menuItems.push({
        id: uuidv4(),
        ...menuItemToInsertRow(restaurant.id, item),
        created_at: createdAt
      });
    }
    return items.length;
  }

  async listMenuItems(restaurantIds: readonly string[], opts?: ListMenuItemsOptions): Promise<MenuItemRow[]> {
    const ids = new Set(restaurantIds);
    return this.menuItems
      .filter(item => ids.has(item.restaurant_id))
      .filter(item => !opts?.availableOnly || item.is_available)
      .map(item => ({ ...item }));
  }
}

function isClaimable(status: RestaurantStatus): boolean {
  return CLAIMABLE_STATUSES.some(claimable => claimable === status);
}
