import { getConfig, type AppConfig } from '../../config/env.js';
import { getSupabaseClient } from '../../lib/supabase/supabase-client.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { InMemoryRestaurantStore } from './in-memory-restaurant.store.js';
import { SupabaseRestaurantStore } from './supabase-restaurant.store.js';
import type { RestaurantStore } from './restaurant-store.types.js';

export function createRestaurantStore(config: AppConfig = getConfig()): RestaurantStore {
  if (config.storeDriver === 'memory') {
    logger.info({ storeDriver: 'memory' }, '[STORE] Using in-memory restaurant store (data is lost on restart)');
    return new InMemoryRestaurantStore();
  }

  logger.info({ storeDriver: 'supabase' }, '[STORE] Using Supabase restaurant store');
  return new SupabaseRestaurantStore(getSupabaseClient(config.supabaseUrl, config.supabaseKey));
}
