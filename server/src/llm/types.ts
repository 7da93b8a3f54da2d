import type { z } from "zod";
import type { RetryPolicy } from "../lib/reliability/retry-handler.js";

export type Message = {
    role: "system" | "user";
    content: string;
    /** Attached to the message as a vision input */
    imageUrl?: string;
};

export interface CompletionOptions {
    model: string;
    maxOutputTokens: number;
    /** Per-attempt deadline; always explicit */
    timeoutMs: number;
    /** Name of the structured output format sent to the model */
    schemaName: string;
    retry: RetryPolicy;
    temperature?: number;
    traceId?: string;
}

export interface LLMProvider {
    /**
     * One structured call. Rejects with a TimeoutError, a transport error
     * or a parse error (ZodError / SyntaxError).
     */
    completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts: CompletionOptions
    ): Promise<z.infer<T>>;
}
