/**
 * LLM error categorization
 * Decides which failures the retry policy may repeat
 */

import OpenAI from 'openai';
import { ZodError } from 'zod';
import { isTimeoutError } from '../lib/reliability/timeout-guard.js';

export interface ErrorCategory {
  type: 'abort_timeout' | 'transport_error' | 'parse_error' | 'unknown';
  isRetriable: boolean;
  reason: string;
  statusCode?: number | undefined;
}

export function categorizeLlmError(e: unknown): ErrorCategory {
  if (isTimeoutError(e)) {
    return { type: 'abort_timeout', isRetriable: true, reason: e.message };
  }

  // Connection failures carry no status (includes the client's own timeout)
  if (e instanceof OpenAI.APIConnectionError) {
    return { type: 'transport_error', isRetriable: true, reason: e.message };
  }

  if (e instanceof OpenAI.APIError) {
    const status = e.status;
    const retriable = status === 429 || (typeof status === 'number' && status >= 500);
    return {
      type: retriable ? 'transport_error' : 'unknown',
      isRetriable: retriable,
      reason: status !== undefined ? `HTTP ${status}` : e.message,
      statusCode: status
    };
  }

  // Structured output mismatch: repeating the call will not fix it
  if (e instanceof ZodError || e instanceof SyntaxError) {
    return { type: 'parse_error', isRetriable: false, reason: e.message };
  }

  return {
    type: 'unknown',
    isRetriable: false,
    reason: e instanceof Error ? e.message : String(e)
  };
}
