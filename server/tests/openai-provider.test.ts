import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import OpenAI from 'openai';
import { OpenAiProvider } from '../src/llm/openai.provider.js';
import { categorizeLlmError } from '../src/llm/error-classifier.js';
import { createLLMProvider } from '../src/llm/factory.js';
import { MenuClassificationSchema } from '../src/services/menu/menu.types.js';
import { TimeoutError } from '../src/lib/reliability/timeout-guard.js';
import type { CompletionOptions, Message } from '../src/llm/types.js';

const messages: Message[] = [
  { role: 'system', content: 'Label the photo.' },
  { role: 'user', content: 'Is this a menu?', imageUrl: 'https://img.example/menu.jpg' }
];

const opts: CompletionOptions = {
  model: 'test-model',
  maxOutputTokens: 200,
  timeoutMs: 1000,
  schemaName: 'menu_classification',
  retry: { maxAttempts: 2, backoffMs: [0, 0] }
};

const validOutput = JSON.stringify({
  is_menu: true,
  confidence_level: 'high',
  reasoning: 'dish names with prices',
  image_type: 'menu'
});

interface CapturedBody {
  model: string;
  max_output_tokens: number;
  text: { format: { name: string } };
  input: Array<{ role: string; content: unknown }>;
}

interface CreateOptions {
  signal?: AbortSignal;
  maxRetries?: number;
}

describe('OpenAiProvider', () => {
  it('sends a vision input with a structured output format and parses the reply', async (t) => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const seen: Array<{ body: CapturedBody; options: CreateOptions | undefined }> = [];
    t.mock.method(client.responses, 'create', async (body: CapturedBody, options?: CreateOptions) => {
      seen.push({ body, options });
      return { output_text: validOutput };
    });

    const result = await new OpenAiProvider(client).completeJSON(messages, MenuClassificationSchema, opts);

    assert.equal(result.is_menu, true);
    assert.equal(seen.length, 1);
    const request = seen[0];
    assert.ok(request);
    assert.equal(request.body.model, 'test-model');
    assert.equal(request.body.max_output_tokens, 200);
    assert.equal(request.body.text.format.name, 'menu_classification');
    assert.deepEqual(request.body.input[1]?.content, [
      { type: 'input_text', text: 'Is this a menu?' },
      { type: 'input_image', image_url: 'https://img.example/menu.jpg', detail: 'auto' }
    ]);
    assert.equal(request.options?.maxRetries, 0);
  });

  it('retries a connection error', async (t) => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    let calls = 0;
    t.mock.method(client.responses, 'create', async () => {
      calls++;
      if (calls === 1) throw new OpenAI.APIConnectionError({ message: 'socket hang up' });
      return { output_text: validOutput };
    });

    const result = await new OpenAiProvider(client).completeJSON(messages, MenuClassificationSchema, opts);

    assert.equal(result.image_type, 'menu');
    assert.equal(calls, 2);
  });

  it('does not retry a reply that fails the schema', async (t) => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const create = t.mock.method(client.responses, 'create', async () => ({ output_text: '{"is_menu":"maybe"}' }));

    await assert.rejects(new OpenAiProvider(client).completeJSON(messages, MenuClassificationSchema, opts));
    assert.equal(create.mock.callCount(), 1);
  });

  it('aborts the request when the deadline passes', async (t) => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    let aborted = false;
    t.mock.method(client.responses, 'create', (_body: unknown, options?: CreateOptions) =>
      new Promise((_resolve, reject) => {
        options?.signal?.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('request aborted'));
        });
      })
    );

    await assert.rejects(
      new OpenAiProvider(client).completeJSON(messages, MenuClassificationSchema, {
        ...opts,
        timeoutMs: 10,
        retry: { maxAttempts: 1, backoffMs: [0] }
      }),
      TimeoutError
    );
    assert.equal(aborted, true);
  });
});

describe('categorizeLlmError', () => {
  it('separates retriable transport failures from parse errors', () => {
    assert.equal(categorizeLlmError(new TimeoutError('llm:x', 10)).isRetriable, true);
    assert.equal(categorizeLlmError(new OpenAI.APIConnectionError({ message: 'reset' })).type, 'transport_error');
    assert.equal(categorizeLlmError(new SyntaxError('Unexpected end of JSON input')).type, 'parse_error');
    assert.equal(categorizeLlmError(new Error('other')).isRetriable, false);
  });
});

describe('createLLMProvider', () => {
  it('builds the OpenAI provider only when a key is set', () => {
    assert.ok(createLLMProvider({ llmProvider: 'openai', openaiApiKey: 'test-secret' }) instanceof OpenAiProvider);
    assert.equal(createLLMProvider({ llmProvider: 'openai', openaiApiKey: undefined }), null);
  });

  it('disables processing for none and unknown providers', () => {
    assert.equal(createLLMProvider({ llmProvider: 'none', openaiApiKey: 'test-secret' }), null);
    assert.equal(createLLMProvider({ llmProvider: 'mystery', openaiApiKey: 'test-secret' }), null);
  });
});
