import OpenAI from "openai";
import type { ResponseInputItem, ResponseInputMessageContentList } from "openai/resources/responses/responses";
import { zodTextFormat } from "openai/helpers/zod";
import { z } from "zod";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { categorizeLlmError } from "./error-classifier.js";
import { retryWithBackoff } from "../lib/reliability/retry-handler.js";
import { withDeadline } from "../lib/reliability/timeout-guard.js";
import { logger, errorContext } from "../lib/logger/structured-logger.js";

function toInput(messages: Message[]): ResponseInputItem[] {
    return messages.map(m => {
        if (!m.imageUrl) {
            return { role: m.role, content: m.content };
        }
        const content: ResponseInputMessageContentList = [
            { type: "input_text", text: m.content },
            { type: "input_image", image_url: m.imageUrl, detail: "auto" }
        ];
        return { role: m.role, content };
    });
}

export class OpenAiProvider implements LLMProvider {
    constructor(private readonly client: OpenAI) {}

    async completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts: CompletionOptions
    ): Promise<z.infer<T>> {
        const tStart = Date.now();
        const log = logger.child({ model: opts.model, schema: opts.schemaName, traceId: opts.traceId });

        const result = await retryWithBackoff({
            fn: () => this.completeOnce(messages, schema, opts),
            isRetryable: (err) => categorizeLlmError(err).isRetriable,
            maxAttempts: opts.retry.maxAttempts,
            backoffMs: opts.retry.backoffMs,
            onRetry: (err, attempt, nextDelay) => {
                const category = categorizeLlmError(err);
                log.warn({
                    attempt: attempt + 1,
                    maxAttempts: opts.retry.maxAttempts,
                    errorType: category.type,
                    status: category.statusCode,
                    nextDelay
                }, '[LLM] Retriable error, will retry with backoff');
            }
        }).catch((err: unknown) => {
            log.warn({
                errorType: categorizeLlmError(err).type,
                err: errorContext(err),
                durMs: Date.now() - tStart
            }, '[LLM] Call failed');
            throw err;
        });

        log.debug({ durMs: Date.now() - tStart }, '[LLM] ok');
        return result;
    }

    private async completeOnce<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts: CompletionOptions
    ): Promise<z.infer<T>> {
        const resp = await withDeadline(`llm:${opts.schemaName}`, opts.timeoutMs, signal =>
            this.client.responses.create({
                model: opts.model,
                input: toInput(messages),
                temperature: opts.temperature ?? 0,
                max_output_tokens: opts.maxOutputTokens,
                text: { format: zodTextFormat(schema, opts.schemaName) }
            }, { signal, maxRetries: 0 })
        );

        // Structured Outputs: strict parse, no loose recovery
        const parsed: unknown = JSON.parse(resp.output_text || '');
        return schema.parse(parsed);
    }
}
