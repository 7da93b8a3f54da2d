import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryRestaurantStore } from '../src/services/store/in-memory-restaurant.store.js';
import { StoreError, looksLikeUuid } from '../src/services/store/restaurant-store.types.js';
import type { PlaceRecord } from '../src/services/places/places.types.js';
import type { ConsolidatedMenuItem } from '../src/services/menu/menu.types.js';

function place(placeId: string, name: string): PlaceRecord {
  return {
    name,
    address: '2 Market Sq',
    rating: 4.1,
    reviewsCount: 8,
    category: 'Bakery',
    phone: '',
    website: '',
    priceLevel: '$',
    openingHours: [],
    location: { lat: 51.5, lng: -0.12 },
    placeId,
    url: '',
    imageUrls: ['https://img.example/menu.jpg']
  };
}

function item(name: string): ConsolidatedMenuItem {
  return {
    placeId: 'bakery',
    name,
    description: null,
    price: 3.5,
    category: 'Pastry',
    calories: 300,
    protein: 6,
    carbs: 40,
    fat: 12,
    fiber: null,
    sugar: null,
    sodium: null,
    confidenceScore: 0.8,
    sourceImageUrl: 'https://img.example/menu.jpg'
  };
}

describe('InMemoryRestaurantStore', () => {
  let store: InMemoryRestaurantStore;

  beforeEach(() => {
    store = new InMemoryRestaurantStore();
  });

  it('saves new places as pending and leaves existing rows alone', async () => {
    store.seedRestaurant({ place_id: 'bakery', name: 'Old name', status: 'finished' });

    const submitted = await store.saveDiscoveredRestaurants([place('bakery', 'New name'), place('deli', 'Deli')]);

    assert.equal(submitted, 2);
    assert.equal((await store.getRestaurantByPlaceId('bakery'))?.name, 'Old name');
    const deli = await store.getRestaurantByPlaceId('deli');
    assert.equal(deli?.status, 'pending');
    assert.equal(deli?.latitude, 51.5);
    assert.deepEqual(deli?.image_urls, ['https://img.example/menu.jpg']);
  });

  it('looks restaurants up by uuid or place id', async () => {
    const row = store.seedRestaurant({ place_id: 'bakery' });

    assert.equal(looksLikeUuid(row.id), true);
    assert.equal((await store.getRestaurant(row.id))?.place_id, 'bakery');
    assert.equal((await store.getRestaurant('bakery'))?.id, row.id);
    assert.equal(await store.getRestaurant('nope'), null);
  });

  it('keeps the processing error only on the error status', async () => {
    store.seedRestaurant({ place_id: 'bakery' });

    await store.updateStatus('bakery', 'error', 'aggregation failed');
    assert.equal((await store.getRestaurantByPlaceId('bakery'))?.processing_error, 'aggregation failed');

    await store.updateStatus('bakery', 'finished', 'ignored');
    assert.equal((await store.getRestaurantByPlaceId('bakery'))?.processing_error, null);

    await assert.rejects(store.updateStatus('ghost', 'processing'), StoreError);
  });

  it('replaces menu rows and filters unavailable ones on request', async () => {
    const row = store.seedRestaurant({ place_id: 'bakery' });
    store.seedMenuItem({ restaurant_id: row.id, name: 'Stale bun', is_available: false });

    const inserted = await store.replaceMenuItems('bakery', [item('Croissant'), item('Danish')]);

    assert.equal(inserted, 2);
    const rows = await store.listMenuItems([row.id], { availableOnly: true });
    assert.deepEqual(rows.map(r => r.name), ['Croissant', 'Danish']);
    assert.equal(rows[0]?.currency, 'USD');
    assert.equal(rows[0]?.confidence_score, 0.8);
  });

  it('reports statuses only for stored place ids', async () => {
    store.seedRestaurant({ place_id: 'a', status: 'processing' });

    const statuses = await store.getStatuses(['a', 'b']);

    assert.deepEqual([...statuses.entries()], [['a', 'processing']]);
    assert.deepEqual(await store.listPlaceIdsByStatus('processing'), ['a']);
  });

  it('claims only pending or errored restaurants', async () => {
    store.seedRestaurant({ place_id: 'fresh' });
    store.seedRestaurant({ place_id: 'failed', status: 'error', processing_error: 'timeout' });
    store.seedRestaurant({ place_id: 'done', status: 'finished' });

    const claimed = await store.claimForProcessing('fresh');
    assert.equal(claimed?.status, 'processing');
    assert.equal(await store.claimForProcessing('fresh'), null);

    const retried = await store.claimForProcessing('failed');
    assert.equal(retried?.status, 'processing');
    assert.equal(retried?.processing_error, null);

    assert.equal(await store.claimForProcessing('done'), null);
    assert.equal((await store.getRestaurantByPlaceId('done'))?.status, 'finished');
    assert.equal(await store.claimForProcessing('ghost'), null);
  });
});
