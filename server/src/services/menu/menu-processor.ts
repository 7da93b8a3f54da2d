/**
 * Menu Processor
 *
 * Restaurant-level orchestrator (prioritise -> classify -> analyse ->
 * aggregate -> persist) and the batch driver that runs it over many
 * restaurants on a bounded outer pool.
 *
 * Status writes: an atomic claim to `processing` first (only from `pending`
 * or `error`), then `finished` or `error` as the very last action, after menu
 * rows were written. A run that loses the claim writes nothing.
 */

import { WorkerPool } from '../../lib/concurrency/worker-pool.js';
import { logger, errorContext } from '../../lib/logger/structured-logger.js';
import type { LLMProvider } from '../../llm/types.js';
import type { MenuPipelineConfig, WorkerCounts } from '../../config/pipeline.config.js';
import type { RestaurantStatus, RestaurantStore } from '../store/restaurant-store.types.js';
import type { RestaurantSummary } from './menu.types.js';
import { prioritizeImages } from './image-prioritizer.js';
import { classifyImages } from './stages/classification.stage.js';
import { analyzeMenuImages } from './stages/analysis.stage.js';
import { aggregateMenuItems } from './stages/aggregation.stage.js';
import type { StageContext } from './stages/stage-context.js';

export interface MenuProcessorDeps {
  llm: LLMProvider;
  store: RestaurantStore;
  config: MenuPipelineConfig;
}

export interface ProcessRestaurantsOptions {
  /** Omitted: every restaurant currently `pending` */
  placeIds?: readonly string[];
  workers?: Partial<WorkerCounts>;
  traceId?: string;
}

export function noRestaurantError(placeId: string): string {
  return `No restaurant found with place_id: ${placeId}`;
}

export function notClaimableError(placeId: string, status: RestaurantStatus): string {
  return `Restaurant ${placeId} is already ${status}`;
}

function assertPoolSize(name: keyof WorkerCounts, size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`${name} workers must be a positive integer, got ${size}`);
  }
}

export class MenuProcessor {
  constructor(private readonly deps: MenuProcessorDeps) {}

  resolveWorkers(overrides?: Partial<WorkerCounts>): WorkerCounts {
    const workers: WorkerCounts = {
      restaurants: overrides?.restaurants ?? this.deps.config.workers.restaurants,
      classification: overrides?.classification ?? this.deps.config.workers.classification,
      analysis: overrides?.analysis ?? this.deps.config.workers.analysis,
    };
    assertPoolSize('restaurants', workers.restaurants);
    assertPoolSize('classification', workers.classification);
    assertPoolSize('analysis', workers.analysis);
    return workers;
  }

  /**
   * Process one restaurant end to end. Never rejects: failures end up in
   * the summary's `error` and in the stored `error` status.
   */
  async processRestaurant(
    placeId: string,
    workerOverrides?: Partial<WorkerCounts>,
    traceId?: string
  ): Promise<RestaurantSummary> {
    const startTime = Date.now();
    const log = logger.child({ placeId, traceId });
    const summary: RestaurantSummary = {
      placeId,
      totalImages: 0,
      menuImagesFound: 0,
      totalMenuItems: 0,
      elapsedMs: 0,
      error: null,
    };
    let statusClaimed = false;

    try {
      const workers = this.resolveWorkers(workerOverrides);
      const restaurant = await this.deps.store.claimForProcessing(placeId);
      if (!restaurant) {
        const current = await this.deps.store.getRestaurantByPlaceId(placeId);
        if (current) {
          log.warn({ status: current.status }, '[MENU] Restaurant not claimable, skipping');
          summary.error = notClaimableError(placeId, current.status);
        } else {
          log.warn('[MENU] Restaurant not found, nothing to process');
          summary.error = noRestaurantError(placeId);
        }
        summary.elapsedMs = Date.now() - startTime;
        return summary;
      }
      statusClaimed = true;

      const ctx: StageContext = {
        llm: this.deps.llm,
        config: this.deps.config,
        placeId,
        log,
        traceId,
      };

      const images = prioritizeImages(restaurant.image_urls, this.deps.config.imagePriority);
      summary.totalImages = images.length;

      let itemsWritten = 0;
      if (images.length === 0) {
        log.info('[MENU] Restaurant has no images');
        itemsWritten = await this.deps.store.replaceMenuItems(placeId, []);
      } else {
        const { menuImages } = await classifyImages(ctx, images, workers.classification);
        summary.menuImagesFound = menuImages.length;

        const rawItems = menuImages.length > 0
          ? await analyzeMenuImages(ctx, menuImages, workers.analysis)
          : [];
        if (menuImages.length > 0 && rawItems.length === 0) {
          log.warn({ menuImages: menuImages.length }, '[MENU] Menu images found but no items extracted');
        }

        const consolidated = await aggregateMenuItems(ctx, rawItems);
        itemsWritten = await this.deps.store.replaceMenuItems(placeId, consolidated);
      }

      summary.totalMenuItems = itemsWritten;
      await this.deps.store.updateStatus(placeId, 'finished');
      summary.elapsedMs = Date.now() - startTime;

      log.info({
        totalImages: summary.totalImages,
        menuImagesFound: summary.menuImagesFound,
        totalMenuItems: summary.totalMenuItems,
        elapsedMs: summary.elapsedMs,
      }, '[MENU] Restaurant processed');
      return summary;
    } catch (err) {
      const { message } = errorContext(err);
      summary.totalMenuItems = 0;
      summary.error = message;
      summary.elapsedMs = Date.now() - startTime;

      log.error({ err: errorContext(err), elapsedMs: summary.elapsedMs }, '[MENU] Restaurant processing failed');

      if (statusClaimed) {
        await this.deps.store.updateStatus(placeId, 'error', message).catch((statusErr: unknown) => {
          log.error({ err: errorContext(statusErr) }, '[MENU] Could not record error status');
        });
      }
      return summary;
    }
  }

  /**
   * Batch driver. Results come back in input order once every restaurant
   * finished; one restaurant's failure never affects its siblings.
   */
  async processRestaurants(opts: ProcessRestaurantsOptions = {}): Promise<Map<string, RestaurantSummary>> {
    const workers = this.resolveWorkers(opts.workers);
    const placeIds = opts.placeIds
      ? [...new Set(opts.placeIds)]
      : await this.deps.store.listPlaceIdsByStatus('pending');

    const results = new Map<string, RestaurantSummary>();
    if (placeIds.length === 0) {
      logger.info({ traceId: opts.traceId }, '[MENU] No restaurants to process');
      return results;
    }

    const startTime = Date.now();
    logger.info({
      restaurants: placeIds.length,
      workers,
      traceId: opts.traceId,
    }, '[MENU] Batch started');

    const pool = new WorkerPool(workers.restaurants, 'restaurants');
    const settled = await pool.run(placeIds, placeId =>
      this.processRestaurant(placeId, workers, opts.traceId)
    );

    // Join point: the map is only written here
    settled.forEach((outcome, index) => {
      const placeId = placeIds[index];
      if (placeId === undefined) return;
      results.set(placeId, outcome.status === 'fulfilled'
        ? outcome.value
        : {
            placeId,
            totalImages: 0,
            menuImagesFound: 0,
            totalMenuItems: 0,
            elapsedMs: 0,
            error: errorContext(outcome.reason).message,
          });
    });

    const summaries = [...results.values()];
    logger.info({
      restaurants: summaries.length,
      successful: summaries.filter(s => s.error === null).length,
      totalMenuItems: summaries.reduce((sum, s) => sum + (s.error === null ? s.totalMenuItems : 0), 0),
      maxActive: pool.getStats().maxActive,
      durationMs: Date.now() - startTime,
      traceId: opts.traceId,
    }, '[MENU] Batch complete');

    return results;
  }
}
