/**
 * Apify Places Client
 * Finds restaurants around a coordinate with the Google Maps crawler actor
 *
 * One run-sync call per search: the actor crawls, and the dataset items come
 * back in the same response. Runs take tens of seconds, so the timeout comes
 * from config and is never implicit.
 */

import { logger, errorContext } from '../../lib/logger/structured-logger.js';
import { retryWithBackoff } from '../../lib/reliability/retry-handler.js';
import {
  fetchWithTimeout,
  isRetryableUpstreamError,
  UpstreamFetchError
} from '../../utils/fetch-with-timeout.js';
import type { PlacesConfig } from '../../config/pipeline.config.js';
import { mapApifyDataset } from './place-mapper.js';
import type { PlaceRecord, PlacesProvider, SearchLocation } from './places.types.js';

export class ApifyPlacesClient implements PlacesProvider {
  constructor(private readonly config: PlacesConfig) {}

  get isConfigured(): boolean {
    return Boolean(this.config.apiToken);
  }

  buildRunInput(location: SearchLocation) {
    return {
      searchStringsArray: [this.config.searchTerm],
      locationQuery: `${location.latitude},${location.longitude}`,
      maxCrawledPlacesPerSearch: this.config.maxPlaces,
      language: this.config.language,
      skipClosedPlaces: false,
      exportPlaceUrls: false,
      exportReviews: false,
      exportOpeningHours: true,
      exportPeopleAlsoSearch: false,
      exportImagesFromPlace: true,
      additionalInfo: false,
      personalDataOptions: 'personal-data-to-be-excluded',
      maxImages: this.config.maxImages
    };
  }

  async searchRestaurants(location: SearchLocation, opts?: { traceId?: string }): Promise<PlaceRecord[]> {
    const token = this.config.apiToken;
    if (!token) {
      throw new Error('APIFY_API_TOKEN is not configured');
    }

    const url = `${this.config.baseUrl}/v2/acts/${this.config.actorId}/run-sync-get-dataset-items`;
    const body = JSON.stringify(this.buildRunInput(location));
    const startTime = Date.now();

    logger.info({
      provider: 'apify',
      actorId: this.config.actorId,
      latitude: location.latitude,
      longitude: location.longitude,
      maxPlaces: this.config.maxPlaces,
      timeoutMs: this.config.timeoutMs,
      traceId: opts?.traceId
    }, '[PLACES] Starting actor run');

    const items = await retryWithBackoff({
      fn: async () => {
        return fetchWithTimeout(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${token}`
          },
          body
        }, {
          timeoutMs: this.config.timeoutMs,
          stage: 'places_search',
          provider: 'apify',
          ...(opts?.traceId ? { requestId: opts.traceId } : {})
        }, async (response) => {
          if (!response.ok) {
            const errorText = await response.text();
            logger.error({
              provider: 'apify',
              status: response.status,
              errorBody: errorText.substring(0, 200)
            }, '[PLACES] Actor run HTTP error');
            throw new UpstreamFetchError(
              `Apify actor run failed: HTTP ${response.status}`,
              'HTTP_ERROR',
              'apify',
              new URL(url).host,
              response.status
            );
          }

          const json: unknown = await response.json();
          if (!Array.isArray(json)) {
            throw new UpstreamFetchError('Apify dataset response is not an array', 'HTTP_ERROR', 'apify', new URL(url).host);
          }
          return json;
        });
      },
      isRetryable: isRetryableUpstreamError,
      maxAttempts: this.config.retry.maxAttempts,
      backoffMs: this.config.retry.backoffMs,
      onRetry: (err, attempt, nextDelay) => {
        logger.warn({
          provider: 'apify',
          attempt: attempt + 1,
          nextDelay,
          err: errorContext(err)
        }, '[PLACES] Retrying actor run');
      }
    });

    const { places, dropped } = mapApifyDataset(items);

    logger.info({
      provider: 'apify',
      places: places.length,
      dropped,
      durationMs: Date.now() - startTime,
      traceId: opts?.traceId
    }, '[PLACES] Actor run complete');

    return places;
  }
}
