/**
 * Restaurant store contract
 *
 * Rows use the column names of the `restaurants` and `menu_items` tables.
 * Implementations: Supabase (production) and in-memory (tests, local runs).
 */

import { z } from 'zod';
import { OpeningHoursSchema, type PlaceRecord } from '../places/places.types.js';
import type { ConsolidatedMenuItem } from '../menu/menu.types.js';

export const RESTAURANT_STATUSES = ['pending', 'processing', 'finished', 'error'] as const;
export type RestaurantStatus = typeof RESTAURANT_STATUSES[number];

/** Statuses a processing run may take a restaurant from */
export const CLAIMABLE_STATUSES = ['pending', 'error'] as const satisfies readonly RestaurantStatus[];

export const RestaurantRowSchema = z.object({
  id: z.string(),
  place_id: z.string(),
  name: z.string(),
  address: z.string().nullable(),
  rating: z.number().nullable(),
  reviews_count: z.number().nullable(),
  category: z.string().nullable(),
  phone: z.string().nullable(),
  website: z.string().nullable(),
  price_level: z.string().nullable(),
  opening_hours: z.array(OpeningHoursSchema).nullable().catch(null),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  google_maps_url: z.string().nullable(),
  image_urls: z.array(z.string()).nullable().transform(urls => urls ?? []),
  status: z.enum(RESTAURANT_STATUSES),
  processing_error: z.string().nullable(),
  created_at: z.string().nullable(),
  updated_at: z.string().nullable()
});

export const MenuItemRowSchema = z.object({
  id: z.string(),
  restaurant_id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  price: z.number().nullable(),
  currency: z.string().nullable(),
  category: z.string().nullable(),
  calories: z.number().nullable(),
  protein: z.number().nullable(),
  carbs: z.number().nullable(),
  fat: z.number().nullable(),
  fiber: z.number().nullable(),
  sugar: z.number().nullable(),
  sodium: z.number().nullable(),
  confidence_score: z.number().nullable(),
  source_image_url: z.string().nullable(),
  is_available: z.boolean(),
  created_at: z.string().nullable()
});

export type RestaurantRow = z.infer<typeof RestaurantRowSchema>;
export type MenuItemRow = z.infer<typeof MenuItemRowSchema>;

/**
 * Datastore failure (read or write). Carries the operation for logs.
 */
export class StoreError extends Error {
  constructor(
    public readonly operation: string,
    message: string
  ) {
    super(`${operation} failed: ${message}`);
    this.name = 'StoreError';
  }
}

export interface ListMenuItemsOptions {
  availableOnly?: boolean;
}

export interface RestaurantStore {
  /** Looks up by uuid first (when the value looks like one), then by place id */
  getRestaurant(idOrPlaceId: string): Promise<RestaurantRow | null>;
  getRestaurantByPlaceId(placeId: string): Promise<RestaurantRow | null>;
  listRestaurants(filter?: { status?: RestaurantStatus }): Promise<RestaurantRow[]>;
  listPlaceIdsByStatus(status: RestaurantStatus): Promise<string[]>;
  /** Only ids with a stored row appear in the result */
  getStatuses(placeIds: readonly string[]): Promise<Map<string, RestaurantStatus>>;
  updateStatus(placeId: string, status: RestaurantStatus, processingError?: string | null): Promise<void>;
  /**
   * Moves a pending or errored restaurant to processing in one conditional
   * write. Returns the claimed row, or null when the row is missing or its
   * status is not claimable (another run holds it, or it is finished).
   */
  claimForProcessing(placeId: string): Promise<RestaurantRow | null>;
  /** Inserts unseen places as pending; rows that already exist are left untouched */
  saveDiscoveredRestaurants(places: readonly PlaceRecord[]): Promise<number>;
  /** Deletes the restaurant's menu rows, then inserts `items`; returns the inserted count */
  replaceMenuItems(placeId: string, items: readonly ConsolidatedMenuItem[]): Promise<number>;
  listMenuItems(restaurantIds: readonly string[], opts?: ListMenuItemsOptions): Promise<MenuItemRow[]>;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function looksLikeUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/** Insert payload for a newly discovered place */
export function placeToInsertRow(place: PlaceRecord) {
  return {
    place_id: place.placeId,
    name: place.name,
    address: place.address,
    rating: place.rating,
    reviews_count: place.reviewsCount,
    category: place.category,
    phone: place.phone,
    website: place.website,
    price_level: place.priceLevel,
    opening_hours: place.openingHours,
    latitude: place.location.lat,
    longitude: place.location.lng,
    google_maps_url: place.url,
    image_urls: place.imageUrls,
    status: 'pending' as const
  };
}

/** Insert payload for one consolidated item of a stored restaurant */
export function menuItemToInsertRow(restaurantId: string, item: ConsolidatedMenuItem) {
  return {
    restaurant_id: restaurantId,
    name: item.name,
    description: item.description,
    price: item.price,
    currency: 'USD',
    category: item.category,
    calories: item.calories,
    protein: item.protein,
    carbs: item.carbs,
    fat: item.fat,
    fiber: item.fiber,
    sugar: item.sugar,
    sodium: item.sodium,
    confidence_score: item.confidenceScore,
    source_image_url: item.sourceImageUrl,
    is_available: true
  };
}
