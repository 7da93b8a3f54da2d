import OpenAI from "openai";
import type { LLMProvider } from "./types.js";
import { OpenAiProvider } from "./openai.provider.js";
import type { AppConfig } from "../config/env.js";
import { logger } from "../lib/logger/structured-logger.js";

export type LLMProviderConfig = Pick<AppConfig, "llmProvider" | "openaiApiKey">;

/**
 * null means menu processing is off; /process-menus answers 503 and
 * discovered restaurants stay pending.
 */
export function createLLMProvider(config: LLMProviderConfig): LLMProvider | null {
    switch (config.llmProvider) {
        case "openai":
            return config.openaiApiKey
                ? new OpenAiProvider(new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 }))
                : null;
        case "none":
        case "disabled":
            return null;
        default:
            logger.warn({ llmProvider: config.llmProvider }, "[LLM] Unknown provider, menu processing disabled");
            return null;
    }
}
