/**
 * ANALYSIS Stage - Menu Pipeline
 *
 * Structured item extraction, one call per menu image, on the analysis
 * model tier. A failed image contributes zero items.
 */

import { WorkerPool } from '../../../lib/concurrency/worker-pool.js';
import { errorContext } from '../../../lib/logger/structured-logger.js';
import { MenuAnalysisSchema, toRawMenuItem, type RawMenuItem } from '../menu.types.js';
import {
  ANALYSIS_PROMPT_VERSION,
  ANALYSIS_SYSTEM_PROMPT,
  ANALYSIS_USER_PROMPT
} from '../prompts/menu.prompts.js';
import type { StageContext } from './stage-context.js';

async function analyzeImage(ctx: StageContext, imageUrl: string): Promise<RawMenuItem[]> {
  const tier = ctx.config.models.analysis;
  const result = await ctx.llm.completeJSON(
    [
      { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
      { role: 'user', content: ANALYSIS_USER_PROMPT, imageUrl }
    ],
    MenuAnalysisSchema,
    {
      model: tier.model,
      maxOutputTokens: tier.maxOutputTokens,
      timeoutMs: tier.timeoutMs,
      schemaName: 'menu_analysis',
      retry: ctx.config.retry,
      traceId: ctx.traceId
    }
  );

  return result.menu_items
    .filter(item => item.name.trim() !== '')
    .map(item => toRawMenuItem(item, imageUrl));
}

/**
 * Items of every successfully analysed image, concatenated in image order
 */
export async function analyzeMenuImages(
  ctx: StageContext,
  menuImageUrls: readonly string[],
  workers: number
): Promise<RawMenuItem[]> {
  const startTime = Date.now();
  const pool = new WorkerPool(workers, 'analysis');

  const settled = await pool.run(menuImageUrls, url => analyzeImage(ctx, url));

  const items: RawMenuItem[] = [];
  let failed = 0;
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      items.push(...outcome.value);
      return;
    }
    failed++;
    ctx.log.warn({
      stage: 'analysis',
      imageUrl: menuImageUrls[index],
      err: errorContext(outcome.reason)
    }, '[MENU] Menu analysis failed, image contributes no items');
  });

  ctx.log.info({
    stage: 'analysis',
    promptVersion: ANALYSIS_PROMPT_VERSION,
    images: menuImageUrls.length,
    failed,
    rawItems: items.length,
    maxActive: pool.getStats().maxActive,
    durationMs: Date.now() - startTime
  }, '[MENU] Analysis complete');

  return items;
}
