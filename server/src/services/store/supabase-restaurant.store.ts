/**
 * Supabase Restaurant Store
 *
 * Every response is `{ data, error }`; errors become StoreError and rows are
 * validated with zod before they leave this module.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { logger } from '../../lib/logger/structured-logger.js';
import type { PlaceRecord } from '../places/places.types.js';
import type { ConsolidatedMenuItem } from '../menu/menu.types.js';
import {
  CLAIMABLE_STATUSES,
  looksLikeUuid,
  menuItemToInsertRow,
  MenuItemRowSchema,
  placeToInsertRow,
  RESTAURANT_STATUSES,
  RestaurantRowSchema,
  StoreError,
  type ListMenuItemsOptions,
  type MenuItemRow,
  type RestaurantRow,
  type RestaurantStatus,
  type RestaurantStore
} from './restaurant-store.types.js';

const RESTAURANTS = 'restaurants';
const MENU_ITEMS = 'menu_items';

const StatusRowSchema = z.object({
  place_id: z.string(),
  status: z.enum(RESTAURANT_STATUSES)
});

const IdRowSchema = z.object({ id: z.string() });

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function check(operation: string, error: PostgrestErrorLike | null): void {
  if (error) {
    logger.error({ operation, code: error.code, message: error.message }, '[STORE] Supabase error');
    throw new StoreError(operation, error.message);
  }
}

function parseRows<S extends z.ZodTypeAny>(operation: string, schema: S, data: unknown): z.infer<S>[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    throw new StoreError(operation, `unexpected row shape: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

export class SupabaseRestaurantStore implements RestaurantStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async getRestaurant(idOrPlaceId: string): Promise<RestaurantRow | null> {
    if (looksLikeUuid(idOrPlaceId)) {
      const { data, error } = await this.supabase
        .from(RESTAURANTS)
        .select('*')
        .eq('id', idOrPlaceId)
        .limit(1);
      check('getRestaurant', error);
      const [row] = parseRows('getRestaurant', RestaurantRowSchema, data);
      if (row) return row;
    }
    return this.getRestaurantByPlaceId(idOrPlaceId);
  }

  async getRestaurantByPlaceId(placeId: string): Promise<RestaurantRow | null> {
    const { data, error } = await this.supabase
      .from(RESTAURANTS)
      .select('*')
      .eq('place_id', placeId)
      .limit(1);
    check('getRestaurantByPlaceId', error);
    const [row] = parseRows('getRestaurantByPlaceId', RestaurantRowSchema, data);
    return row ?? null;
  }

  async listRestaurants(filter?: { status?: RestaurantStatus }): Promise<RestaurantRow[]> {
    let query = this.supabase.from(RESTAURANTS).select('*');
    if (filter?.status) {
      query = query.eq('status', filter.status);
    }
    const { data, error } = await query;
    check('listRestaurants', error);
    return parseRows('listRestaurants', RestaurantRowSchema, data);
  }

  async listPlaceIdsByStatus(status: RestaurantStatus): Promise<string[]> {
    const { data, error } = await this.supabase
      .from(RESTAURANTS)
      .select('place_id, status')
      .eq('status', status);
    check('listPlaceIdsByStatus', error);
    return parseRows('listPlaceIdsByStatus', StatusRowSchema, data).map(row => row.place_id);
  }

  async getStatuses(placeIds: readonly string[]): Promise<Map<string, RestaurantStatus>> {
    const statuses = new Map<string, RestaurantStatus>();
    if (placeIds.length === 0) return statuses;

    const { data, error } = await this.supabase
      .from(RESTAURANTS)
      .select('place_id, status')
      .in('place_id', [...placeIds]);
    check('getStatuses', error);
    for (const row of parseRows('getStatuses', StatusRowSchema, data)) {
      statuses.set(row.place_id, row.status);
    }
    return statuses;
  }

  async updateStatus(placeId: string, status: RestaurantStatus, processingError?: string | null): Promise<void> {
    const { error } = await this.supabase
      .from(RESTAURANTS)
      .update({
        status,
        processing_error: status === 'error' ? processingError ?? null : null,
        updated_at: new Date().toISOString()
      })
      .eq('place_id', placeId);
    check('updateStatus', error);
  }

  async claimForProcessing(placeId: string): Promise<RestaurantRow | null> {
    // The status filter makes the update conditional; no returned row means
    // someone else holds the restaurant or it is not claimable
    const { data, error } = await this.supabase
      .from(RESTAURANTS)
      .update({
        status: 'processing',
        processing_error: null,
        updated_at: new Date().toISOString()
      })
      .eq('place_id', placeId)
      .in('status', [...CLAIMABLE_STATUSES])
      .select('*');
    check('claimForProcessing', error);
    const [row] = parseRows('claimForProcessing', RestaurantRowSchema, data);
    return row ?? null;
  }

  async saveDiscoveredRestaurants(places: readonly PlaceRecord[]): Promise<number> {
    const rows = places.filter(place => place.placeId).map(placeToInsertRow);
    if (rows.length === 0) return places.length;

    // Existing rows keep their status and menu
    const { error } = await this.supabase
      .from(RESTAURANTS)
      .upsert(rows, { onConflict: 'place_id', ignoreDuplicates: true });
    check('saveDiscoveredRestaurants', error);
    return places.length;
  }

  async replaceMenuItems(placeId: string, items: readonly ConsolidatedMenuItem[]): Promise<number> {
    const { data, error } = await this.supabase
      .from(RESTAURANTS)
      .select('id')
      .eq('place_id', placeId)
      .limit(1);
    check('replaceMenuItems', error);
    const [restaurant] = parseRows('replaceMenuItems', IdRowSchema, data);
    if (!restaurant) {
      throw new StoreError('replaceMenuItems', `no restaurant with place_id ${placeId}`);
    }

    const { error: deleteError } = await this.supabase
      .from(MENU_ITEMS)
      .delete()
      .eq('restaurant_id', restaurant.id);
    check('replaceMenuItems.delete', deleteError);

    if (items.length === 0) return 0;

    const { error: insertError } = await this.supabase
      .from(MENU_ITEMS)
      .insert(items.map(item => menuItemToInsertRow(restaurant.id, item)));
    check('replaceMenuItems.insert', insertError);
    return items.length;
  }

  async listMenuItems(restaurantIds: readonly string[], opts?: ListMenuItemsOptions): Promise<MenuItemRow[]> {
    if (restaurantIds.length === 0) return [];

    let query = this.supabase
      .from(MENU_ITEMS)
      .select('*')
      .in('restaurant_id', [...restaurantIds]);
    if (opts?.availableOnly) {
      query = query.eq('is_available', true);
    }
    const { data, error } = await query;
    check('listMenuItems', error);
    return parseRows('listMenuItems', MenuItemRowSchema, data);
  }
}
