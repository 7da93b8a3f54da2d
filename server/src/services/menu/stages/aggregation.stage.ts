/**
 * AGGREGATION Stage - Menu Pipeline
 *
 * Single text call that consolidates the raw items of one restaurant,
 * followed by a deterministic merge of items whose names still collide.
 * Failures propagate: the processor marks the restaurant as errored.
 */

import {
  AggregatedMenuSchema,
  NUTRITION_FIELDS,
  toRawMenuItem,
  type ConsolidatedMenuItem,
  type RawMenuItem
} from '../menu.types.js';
import {
  AGGREGATION_PROMPT_VERSION,
  AGGREGATION_SYSTEM_PROMPT,
  buildAggregationUserPrompt
} from '../prompts/menu.prompts.js';
import type { StageContext } from './stage-context.js';

export function normalizeItemName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

function completeness(item: RawMenuItem): number {
  let score = 0;
  if (item.description) score++;
  if (item.price !== null) score++;
  if (item.category) score++;
  for (const field of NUTRITION_FIELDS) {
    if (item[field] !== null) score++;
  }
  return score;
}

function fillMissing<T extends RawMenuItem>(target: T, donor: RawMenuItem): T {
  return {
    ...target,
    description: target.description || donor.description,
    price: target.price ?? donor.price,
    category: target.category || donor.category,
    calories: target.calories ?? donor.calories,
    protein: target.protein ?? donor.protein,
    carbs: target.carbs ?? donor.carbs,
    fat: target.fat ?? donor.fat,
    fiber: target.fiber ?? donor.fiber,
    sugar: target.sugar ?? donor.sugar,
    sodium: target.sodium ?? donor.sodium,
    confidenceScore: target.confidenceScore ?? donor.confidenceScore,
    sourceImageUrl: target.sourceImageUrl ?? donor.sourceImageUrl
  };
}

/**
 * Collapse items with the same normalised name. The most complete entry
 * wins (first one on ties) and borrows missing fields from the rest.
 * Groups keep the position of their first occurrence.
 */
export function mergeByNormalizedName<T extends RawMenuItem>(items: readonly T[]): T[] {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = normalizeItemName(item.name);
    if (!key) continue;
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  const merged: T[] = [];
  for (const group of groups.values()) {
    let best = group[0];
    if (!best) continue;
    for (const candidate of group) {
      if (completeness(candidate) > completeness(best)) best = candidate;
    }
    let result = best;
    for (const donor of group) {
      if (donor !== best) result = fillMissing(result, donor);
    }
    merged.push(result);
  }
  return merged;
}

function toPromptPayload(items: readonly RawMenuItem[]): string {
  return JSON.stringify(items.map(item => ({
    name: item.name,
    description: item.description,
    price: item.price,
    category: item.category,
    calories: item.calories,
    protein: item.protein,
    carbs: item.carbs,
    fat: item.fat,
    fiber: item.fiber,
    sugar: item.sugar,
    sodium: item.sodium,
    confidence_score: item.confidenceScore,
    source_image_url: item.sourceImageUrl
  })), null, 2);
}

export async function aggregateMenuItems(
  ctx: StageContext,
  rawItems: readonly RawMenuItem[]
): Promise<ConsolidatedMenuItem[]> {
  if (rawItems.length === 0) {
    return [];
  }

  const startTime = Date.now();
  const tier = ctx.config.models.aggregation;
  const result = await ctx.llm.completeJSON(
    [
      { role: 'system', content: AGGREGATION_SYSTEM_PROMPT },
      { role: 'user', content: buildAggregationUserPrompt(ctx.placeId, toPromptPayload(rawItems)) }
    ],
    AggregatedMenuSchema,
    {
      model: tier.model,
      maxOutputTokens: tier.maxOutputTokens,
      timeoutMs: tier.timeoutMs,
      schemaName: 'aggregated_menu',
      retry: ctx.config.retry,
      traceId: ctx.traceId
    }
  );

  const consolidated = result.menu_items
    .filter(item => item.name.trim() !== '')
    .map((item): ConsolidatedMenuItem => ({
      ...toRawMenuItem(item, item.source_image_url),
      placeId: ctx.placeId
    }));

  const merged = mergeByNormalizedName(consolidated);

  ctx.log.info({
    stage: 'aggregation',
    promptVersion: AGGREGATION_PROMPT_VERSION,
    rawItems: rawItems.length,
    modelItems: consolidated.length,
    finalItems: merged.length,
    durationMs: Date.now() - startTime
  }, '[MENU] Aggregation complete');

  return merged;
}
