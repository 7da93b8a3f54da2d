import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { ScanService } from '../src/services/discovery/scan.service.js';
import { ProcessingTrigger } from '../src/services/menu/processing-trigger.js';
import { MenuProcessor } from '../src/services/menu/menu-processor.js';
import { BackgroundTasks } from '../src/lib/concurrency/background-tasks.js';
import { InMemoryRestaurantStore } from '../src/services/store/in-memory-restaurant.store.js';
import type { PlaceRecord, PlacesProvider } from '../src/services/places/places.types.js';
import { sleep } from '../src/lib/reliability/timeout-guard.js';
import { analysis, menuItem, ScriptedLLM, testPipelineConfig } from './helpers/scripted-llm.js';

function place(placeId: string, lat: number, lng: number): PlaceRecord {
  return {
    name: `Place ${placeId}`,
    address: 'Somewhere 1',
    rating: 4.2,
    reviewsCount: 12,
    category: 'Restaurant',
    phone: '',
    website: '',
    priceLevel: '',
    openingHours: [],
    location: { lat, lng },
    placeId,
    url: '',
    imageUrls: []
  };
}

class FakePlaces implements PlacesProvider {
  searches = 0;
  constructor(private readonly result: PlaceRecord[] | Error) {}

  async searchRestaurants(): Promise<PlaceRecord[]> {
    this.searches++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

describe('ProcessingTrigger', () => {
  it('skips finished and processing restaurants and submits the rest', async () => {
    const store = new InMemoryRestaurantStore();
    store.seedRestaurant({ place_id: 'p-pending' });
    store.seedRestaurant({ place_id: 'p-error', status: 'error' });
    store.seedRestaurant({ place_id: 'p-busy', status: 'processing' });
    store.seedRestaurant({ place_id: 'p-done', status: 'finished' });
    const background = new BackgroundTasks();
    const processor = new MenuProcessor({ llm: new ScriptedLLM(), store, config: testPipelineConfig() });

    const result = await new ProcessingTrigger(store, processor, background)
      .trigger(['p-pending', 'p-error', 'p-busy', 'p-done', 'p-new', 'p-pending']);
    await background.drain();

    assert.deepEqual(result, {
      triggered: true,
      restaurantsCount: 5,
      restaurantsToProcess: 3,
      skippedCount: 2,
      skippedStatuses: { processing: 1, finished: 1 }
    });
    assert.equal((await store.getRestaurantByPlaceId('p-pending'))?.status, 'finished');
    assert.equal((await store.getRestaurantByPlaceId('p-error'))?.status, 'finished');
    assert.equal((await store.getRestaurantByPlaceId('p-busy'))?.status, 'processing');
  });

  it('never processes a restaurant twice when triggers overlap', async () => {
    const store = new InMemoryRestaurantStore();
    const ids = ['q-1', 'q-2', 'q-3', 'q-4'];
    for (const id of ids) {
      store.seedRestaurant({ place_id: id, image_urls: [`https://img.example/menu-${id}.jpg`] });
    }
    const llm = new ScriptedLLM({ analyze: () => analysis([menuItem('Pita')]) }, 20);
    const config = { ...testPipelineConfig(), workers: { restaurants: 1, classification: 1, analysis: 1 } };
    const background = new BackgroundTasks();
    const trigger = new ProcessingTrigger(store, new MenuProcessor({ llm, store, config }), background);

    await trigger.trigger(ids);
    await sleep(30);
    await trigger.trigger(ids);
    await background.drain();

    assert.equal(llm.callsFor('menu_classification').length, 4);
    assert.equal(llm.callsFor('menu_analysis').length, 4);
    for (const id of ids) {
      const row = await store.getRestaurantByPlaceId(id);
      assert.equal(row?.status, 'finished');
      assert.ok(row);
      assert.deepEqual((await store.listMenuItems([row.id])).map(item => item.name), ['Pita']);
    }
    assert.equal(background.getStats().failed, 0);
  });

  it('does not trigger without a processor', async () => {
    const store = new InMemoryRestaurantStore();
    store.seedRestaurant({ place_id: 'p-1' });
    const background = new BackgroundTasks();

    const result = await new ProcessingTrigger(store, null, background).trigger(['p-1']);

    assert.equal(result.triggered, false);
    assert.equal(result.restaurantsToProcess, 1);
    assert.equal(background.size, 0);
  });
});

describe('ScanService', () => {
  const origin = { latitude: 32, longitude: 34.8 };
  let store: InMemoryRestaurantStore;
  let background: BackgroundTasks;

  beforeEach(() => {
    store = new InMemoryRestaurantStore();
    background = new BackgroundTasks();
  });

  function scanService(places: PlacesProvider | null, backgroundThreshold = 50) {
    const processor = new MenuProcessor({ llm: new ScriptedLLM(), store, config: testPipelineConfig() });
    const trigger = new ProcessingTrigger(store, processor, background);
    return new ScanService({ store, places, trigger, background, backgroundThreshold });
  }

  it('serves finished restaurants in the radius with their menus, nearest first', async () => {
    const far = store.seedRestaurant({ place_id: 'far', name: 'Far', latitude: 32.02, longitude: 34.8, status: 'finished' });
    const near = store.seedRestaurant({ place_id: 'near', name: 'Near', latitude: 32.01, longitude: 34.8, status: 'finished' });
    store.seedRestaurant({ place_id: 'pending', latitude: 32.01, longitude: 34.8 });
    store.seedRestaurant({ place_id: 'outside', latitude: 32.2, longitude: 34.8, status: 'finished' });
    store.seedMenuItem({ restaurant_id: near.id, name: 'Soup' });

    const response = await scanService(null, 0).scanNearby({ ...origin, radiusKm: 5 });

    assert.deepEqual(response.restaurants.map(r => [r.placeId, r.distance_km]), [['near', 1.11], ['far', 2.22]]);
    assert.deepEqual(response.restaurants[0]?.menuItems.map(i => i.name), ['Soup']);
    assert.equal(response.restaurants[0]?.has_menu_items, true);
    assert.equal(response.restaurants[1]?.id, far.id);
    assert.equal(response.restaurants[1]?.has_menu_items, false);
    assert.deepEqual(response.processing_summary, { total_restaurants: 2, completed: 2, restaurants_with_menu: 1 });
    assert.deepEqual(response.searchLocation, { latitude: 32, longitude: 34.8, radius_km: 5 });
    assert.equal(response.background_processing.status, 'skipped');
    assert.equal(response.data_source, 'cached');
  });

  it('starts discovery in a sparse area and processes what it finds', async () => {
    store.seedRestaurant({ place_id: 'known', status: 'finished' });
    const places = new FakePlaces([place('fresh', 32.001, 34.8), place('known', 32.002, 34.8)]);

    const response = await scanService(places).scanNearby({ ...origin, radiusKm: 5 }, 'trace-1');
    assert.equal(response.background_processing.status, 'started');
    assert.equal(response.data_source, 'none');

    await background.drain();

    assert.equal(places.searches, 1);
    const fresh = await store.getRestaurantByPlaceId('fresh');
    assert.equal(fresh?.name, 'Place fresh');
    assert.equal(fresh?.status, 'finished');
    assert.equal(background.getStats().failed, 0);
  });

  it('reports discovery as skipped without a places provider', async () => {
    const response = await scanService(null).scanNearby({ ...origin, radiusKm: 5 });
    assert.equal(response.background_processing.status, 'skipped');
    assert.equal(background.size, 0);
  });

  it('keeps discovery failures out of the response', async () => {
    const response = await scanService(new FakePlaces(new Error('actor run failed'))).scanNearby({ ...origin, radiusKm: 5 });
    await background.drain();

    assert.equal(response.success, true);
    assert.equal(background.getStats().failed, 1);
  });
});
