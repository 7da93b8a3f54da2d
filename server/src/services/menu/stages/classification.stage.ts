/**
 * CLASSIFICATION Stage - Menu Pipeline
 *
 * One vision call per prioritised image across a bounded pool.
 * A failed call is logged and counted as "not a menu"; it never fails the stage.
 */

import { WorkerPool } from '../../../lib/concurrency/worker-pool.js';
import { errorContext } from '../../../lib/logger/structured-logger.js';
import {
  MenuClassificationSchema,
  type ClassificationOutcome,
  type ImageClassification
} from '../menu.types.js';
import {
  CLASSIFICATION_PROMPT_VERSION,
  CLASSIFICATION_SYSTEM_PROMPT,
  CLASSIFICATION_USER_PROMPT
} from '../prompts/menu.prompts.js';
import type { StageContext } from './stage-context.js';

async function classifyImage(ctx: StageContext, imageUrl: string): Promise<ImageClassification> {
  const tier = ctx.config.models.classification;
  const result = await ctx.llm.completeJSON(
    [
      { role: 'system', content: CLASSIFICATION_SYSTEM_PROMPT },
      { role: 'user', content: CLASSIFICATION_USER_PROMPT, imageUrl }
    ],
    MenuClassificationSchema,
    {
      model: tier.model,
      maxOutputTokens: tier.maxOutputTokens,
      timeoutMs: tier.timeoutMs,
      schemaName: 'menu_classification',
      retry: ctx.config.retry,
      traceId: ctx.traceId
    }
  );

  return {
    imageUrl,
    isMenu: result.is_menu,
    confidence: result.confidence_level,
    reasoning: result.reasoning,
    imageType: result.image_type
  };
}

export async function classifyImages(
  ctx: StageContext,
  imageUrls: readonly string[],
  workers: number
): Promise<ClassificationOutcome> {
  const startTime = Date.now();
  const pool = new WorkerPool(workers, 'classification');

  const settled = await pool.run(imageUrls, url => classifyImage(ctx, url));

  const results = settled.map((outcome, index): ImageClassification => {
    const imageUrl = imageUrls[index] ?? '';
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    const err = errorContext(outcome.reason);
    ctx.log.warn({
      stage: 'classification',
      imageUrl,
      err
    }, '[MENU] Image classification failed, counting as non-menu');
    return {
      imageUrl,
      isMenu: false,
      confidence: 'low',
      reasoning: `Classification failed: ${err.message}`,
      imageType: 'unknown',
      error: err.message
    };
  });

  const menuImages = results.filter(r => r.isMenu).map(r => r.imageUrl);

  ctx.log.info({
    stage: 'classification',
    promptVersion: CLASSIFICATION_PROMPT_VERSION,
    images: imageUrls.length,
    menuImages: menuImages.length,
    failed: results.filter(r => r.error !== undefined).length,
    maxActive: pool.getStats().maxActive,
    durationMs: Date.now() - startTime
  }, '[MENU] Classification complete');

  return { menuImages, results };
}
