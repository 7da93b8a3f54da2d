import type { LLMProvider } from '../../../llm/types.js';
import type { MenuPipelineConfig } from '../../../config/pipeline.config.js';
import type { Logger } from '../../../lib/logger/structured-logger.js';

/**
 * What every stage needs for one restaurant. Built per restaurant by the
 * processor; `log` is already bound to the place id.
 */
export interface StageContext {
  llm: LLMProvider;
  config: MenuPipelineConfig;
  placeId: string;
  log: Logger;
  traceId?: string;
}
