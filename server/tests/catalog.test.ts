import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { CatalogService } from '../src/services/catalog/catalog.service.js';
import {
  calculateRatio,
  parseSortOrder,
  parseSortSpec,
  SINGLE_SORT_FIELDS,
  sortMenuItems,
  SortSpecError,
  type SortableMenuItem
} from '../src/services/catalog/menu-sort.js';
import { paginate } from '../src/services/catalog/pagination.js';
import { InMemoryRestaurantStore } from '../src/services/store/in-memory-restaurant.store.js';
import type { RestaurantRow } from '../src/services/store/restaurant-store.types.js';

function sortable(name: string, fields: Partial<SortableMenuItem> = {}): SortableMenuItem {
  return {
    name,
    price: null,
    calories: null,
    protein: null,
    carbs: null,
    fat: null,
    fiber: null,
    sugar: null,
    sodium: null,
    ...fields
  };
}

describe('menu sorting', () => {
  it('parses single fields and ratios, ignoring whitespace around ratio names', () => {
    assert.deepEqual(parseSortSpec('protein / calories'), { kind: 'ratio', numerator: 'protein', denominator: 'calories' });
    assert.deepEqual(parseSortSpec('sodium'), { kind: 'field', field: 'sodium' });
    assert.equal(parseSortOrder('DESC'), 'desc');
  });

  it('rejects unknown sorts with the accepted values', () => {
    assert.throws(() => parseSortSpec('tastiness'), (err: unknown) =>
      err instanceof SortSpecError && err.accepted === SINGLE_SORT_FIELDS);
    assert.throws(() => parseSortSpec('protein/love'), SortSpecError);
    assert.throws(() => parseSortSpec('restaurant_distance', ['name']), SortSpecError);
    assert.throws(() => parseSortOrder('sideways'), SortSpecError);
  });

  it('computes ratios with the zero and missing-value rules', () => {
    assert.equal(calculateRatio(sortable('a', { protein: 30, calories: 600 }), 'protein', 'calories'), 0.05);
    assert.equal(calculateRatio(sortable('b', { calories: 600 }), 'protein', 'calories'), 0);
    assert.equal(calculateRatio(sortable('c', { protein: 5, calories: 0 }), 'protein', 'calories'), Number.POSITIVE_INFINITY);
    assert.equal(calculateRatio(sortable('d', { protein: 0, calories: 0 }), 'protein', 'calories'), 0);
  });

  it('sends unpriced items last in ascending order and keeps ties stable', () => {
    const items = [
      sortable('ten', { price: 10 }),
      sortable('unpriced', { price: null }),
      sortable('free', { price: 0 }),
      sortable('five', { price: 5 })
    ];

    const ascending = sortMenuItems(items, { kind: 'field', field: 'price' }, 'asc');
    assert.deepEqual(ascending.map(i => i.name), ['five', 'ten', 'unpriced', 'free']);

    const descending = sortMenuItems(items, { kind: 'field', field: 'price' }, 'desc');
    assert.deepEqual(descending.map(i => i.name), ['unpriced', 'free', 'ten', 'five']);
  });

  it('sorts names case-insensitively', () => {
    const items = [sortable('banana'), sortable('Apple'), sortable('cherry')];
    assert.deepEqual(
      sortMenuItems(items, { kind: 'field', field: 'name' }, 'asc').map(i => i.name),
      ['Apple', 'banana', 'cherry']
    );
  });
});

describe('paginate', () => {
  it('slices a page and reports neighbours', () => {
    const { data, pagination } = paginate([1, 2, 3, 4, 5], 2, 2);
    assert.deepEqual(data, [3, 4]);
    assert.deepEqual(pagination, { page: 2, limit: 2, total: 5, total_pages: 3, has_next: true, has_prev: true });
    assert.deepEqual(paginate([], 1, 20).pagination, {
      page: 1, limit: 20, total: 0, total_pages: 0, has_next: false, has_prev: false
    });
  });
});

describe('CatalogService', () => {
  const origin = { latitude: 32, longitude: 34.8 };
  let store: InMemoryRestaurantStore;
  let catalog: CatalogService;
  let near: RestaurantRow;
  let outside: RestaurantRow;

  beforeEach(() => {
    store = new InMemoryRestaurantStore();
    catalog = new CatalogService(store);

    near = store.seedRestaurant({
      place_id: 'near', name: 'Bistro', latitude: 32.01, longitude: 34.8,
      rating: 4.0, reviews_count: 50, status: 'finished'
    });
    const mid = store.seedRestaurant({
      place_id: 'mid', name: 'alpha', latitude: 32.02, longitude: 34.8,
      rating: 4.8, reviews_count: 10
    });
    store.seedRestaurant({
      place_id: 'far', name: 'Zed', latitude: 32.05, longitude: 34.8,
      reviews_count: 300, status: 'error'
    });
    outside = store.seedRestaurant({ place_id: 'outside', name: 'Remote', latitude: 32.2, longitude: 34.8 });
    store.seedRestaurant({ place_id: 'nowhere', name: 'No coordinates' });

    store.seedMenuItem({ restaurant_id: near.id, name: 'Salad', protein: 10, calories: 200, price: 8 });
    store.seedMenuItem({ restaurant_id: near.id, name: 'Steak', protein: 50, calories: 500, price: 30 });
    store.seedMenuItem({ restaurant_id: near.id, name: 'Water', protein: 0, calories: 0 });
    store.seedMenuItem({ restaurant_id: mid.id, name: 'Tofu', protein: 20, calories: 100, price: 12 });
    store.seedMenuItem({ restaurant_id: mid.id, name: 'Hidden', is_available: false });
    store.seedMenuItem({ restaurant_id: outside.id, name: 'Pho' });
  });

  it('lists restaurants of every status inside the radius by distance', async () => {
    const { data, pagination } = await catalog.listRestaurants({ ...origin, radiusKm: 10, page: 1, limit: 20, sortBy: 'distance' });

    assert.deepEqual(data.map(r => r.place_id), ['near', 'mid', 'far']);
    assert.deepEqual(data.map(r => r.distance_km), [1.11, 2.22, 5.56]);
    assert.deepEqual(data.map(r => r.processing_status), ['finished', 'pending', 'error']);
    assert.equal(pagination.total, 3);
  });

  it('sorts restaurants by rating, reviews and name', async () => {
    const query = { ...origin, radiusKm: 10, page: 1, limit: 20 };
    const byRating = await catalog.listRestaurants({ ...query, sortBy: 'rating' });
    const byReviews = await catalog.listRestaurants({ ...query, sortBy: 'reviews_count' });
    const byName = await catalog.listRestaurants({ ...query, sortBy: 'name' });

    assert.deepEqual(byRating.data.map(r => r.place_id), ['mid', 'near', 'far']);
    assert.deepEqual(byReviews.data.map(r => r.place_id), ['far', 'near', 'mid']);
    assert.deepEqual(byName.data.map(r => r.name), ['alpha', 'Bistro', 'Zed']);
  });

  it('lists available menu items by ratio with the calculated ratio attached', async () => {
    const { data } = await catalog.listMenuItems({
      ...origin,
      radiusKm: 10,
      page: 1,
      limit: 20,
      sort: parseSortSpec('protein/calories'),
      order: 'desc'
    });

    assert.deepEqual(data.map(i => i.name), ['Tofu', 'Steak', 'Salad', 'Water']);
    assert.deepEqual(data[0]?.calculated_ratio, {
      value: 0.2,
      numerator: 'protein',
      denominator: 'calories',
      display: 'protein/calories'
    });
    assert.equal(data[0]?.restaurant_name, 'alpha');
    assert.equal(data[0]?.restaurant_distance_km, 2.22);
    assert.equal(data[0]?.restaurant_place_id, 'mid');
  });

  it('skips the radius check for a single restaurant', async () => {
    const { data } = await catalog.listMenuItems({
      ...origin,
      radiusKm: 1,
      page: 1,
      limit: 20,
      sort: { kind: 'field', field: 'restaurant_distance' },
      order: 'asc',
      restaurantId: 'outside'
    });

    assert.deepEqual(data.map(i => i.name), ['Pho']);
    assert.equal(data[0]?.restaurant_distance_km, 22.24);
    assert.equal(data[0]?.calculated_ratio, undefined);
  });

  it('returns one restaurant menu with its header, or null', async () => {
    const menu = await catalog.getRestaurantMenu(near.id, {
      origin: null,
      page: 1,
      limit: 50,
      sort: { kind: 'field', field: 'name' },
      order: 'asc'
    });

    assert.ok(menu);
    assert.deepEqual(menu.restaurant, { id: near.id, name: 'Bistro', place_id: 'near', distance_km: null });
    assert.deepEqual(menu.data.map(i => i.name), ['Salad', 'Steak', 'Water']);
    assert.equal(await catalog.getRestaurantMenu('unknown', {
      origin: null, page: 1, limit: 50, sort: { kind: 'field', field: 'name' }, order: 'asc'
    }), null);
  });

  it('finds a restaurant by uuid or place id', async () => {
    assert.equal((await catalog.getRestaurant(near.id))?.place_id, 'near');
    assert.equal((await catalog.getRestaurant('near', origin))?.distance_km, 1.11);
    assert.equal(await catalog.getRestaurant('missing'), null);
  });
});
