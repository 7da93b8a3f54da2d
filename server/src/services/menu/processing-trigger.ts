/**
 * Processing Trigger
 * Decides which discovered restaurants still need menu extraction and
 * hands them to the batch driver in the background.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { BackgroundTasks } from '../../lib/concurrency/background-tasks.js';
import type { RestaurantStatus, RestaurantStore } from '../store/restaurant-store.types.js';
import type { MenuProcessor } from './menu-processor.js';

/** Restaurants in these states are never resubmitted automatically */
const SKIPPED_STATUSES: ReadonlySet<RestaurantStatus> = new Set(['finished', 'processing']);

export interface TriggerResult {
  triggered: boolean;
  restaurantsCount: number;
  restaurantsToProcess: number;
  skippedCount: number;
  skippedStatuses: Partial<Record<RestaurantStatus, number>>;
}

export class ProcessingTrigger {
  constructor(
    private readonly store: RestaurantStore,
    private readonly processor: MenuProcessor | null,
    private readonly background: BackgroundTasks
  ) {}

  async trigger(placeIds: readonly string[], traceId?: string): Promise<TriggerResult> {
    const unique = [...new Set(placeIds.filter(Boolean))];
    const statuses = await this.store.getStatuses(unique);

    const toProcess: string[] = [];
    const skippedStatuses: Partial<Record<RestaurantStatus, number>> = {};
    for (const placeId of unique) {
      const status = statuses.get(placeId);
      if (status && SKIPPED_STATUSES.has(status)) {
        skippedStatuses[status] = (skippedStatuses[status] ?? 0) + 1;
      } else {
        toProcess.push(placeId);
      }
    }

    const result: TriggerResult = {
      triggered: false,
      restaurantsCount: unique.length,
      restaurantsToProcess: toProcess.length,
      skippedCount: unique.length - toProcess.length,
      skippedStatuses,
    };

    if (toProcess.length === 0) {
      logger.info({ ...result, traceId }, '[MENU] Nothing to trigger');
      return result;
    }

    const processor = this.processor;
    if (!processor) {
      logger.warn({ restaurantsToProcess: toProcess.length, traceId }, '[MENU] No LLM provider configured, processing not triggered');
      return result;
    }

    this.background.run(
      'menu_batch',
      () => processor.processRestaurants({ placeIds: toProcess, traceId }),
      { restaurants: toProcess.length, traceId }
    );

    result.triggered = true;
    logger.info({ ...result, traceId }, '[MENU] Background processing triggered');
    return result;
  }
}
