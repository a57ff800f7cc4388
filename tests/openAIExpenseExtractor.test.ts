import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  EXPENSE_RESPONSE_SCHEMA,
  OpenAIExpenseExtractor,
  SYSTEM_INSTRUCTION,
} from '../src/infrastructure/adapters/extraction/OpenAIExpenseExtractor.js';

const completion = (content: string | null): ChatCompletion => ({
  id: 'chatcmpl-test',
  object: 'chat.completion',
  created: 1_792_000_000,
  model: 'test-model',
  choices: [
    {
      index: 0,
      finish_reason: 'stop',
      logprobs: null,
      message: { role: 'assistant', content, refusal: null },
    },
  ],
});

const createClient = (respond: () => Promise<ChatCompletion>) => {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => respond());
  return { client: { chat: { completions: { create } } }, create };
};

const textPart = { type: 'text' as const, text: '220 pizza' };

describe('OpenAIExpenseExtractor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the extracted expense', async () => {
    const { client } = createClient(async () =>
      completion('{"Category":"Food","Description":"Pizza","Amount":"220.00"}'),
    );

    const result = await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([textPart]);

    expect(result).toEqual({ ok: true, category: 'Food', description: 'Pizza', amount: '220.00' });
  });

  it('sends the instruction, the parts in order and the strict schema', async () => {
    const { client, create } = createClient(async () =>
      completion('{"Category":"Shopping","Description":"Groceries","Amount":"455.20"}'),
    );

    await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([
      { type: 'image', data: Buffer.from('img'), mimeType: 'image/png' },
      { type: 'text', text: 'Extract expense details from this bill/receipt image.' },
    ]);

    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: SYSTEM_INSTRUCTION },
        {
          role: 'user',
          content: [
            { type: 'image_url', image_url: { url: 'data:image/png;base64,aW1n' } },
            { type: 'text', text: 'Extract expense details from this bill/receipt image.' },
          ],
        },
      ],
      response_format: {
        type: 'json_schema',
        json_schema: { name: 'expense', strict: true, schema: EXPENSE_RESPONSE_SCHEMA },
      },
      temperature: 0,
    });
  });

  it('lists every category and the ERROR sentinel in the instruction', () => {
    expect(SYSTEM_INSTRUCTION).toContain(
      "Category MUST be one of: 'Food', 'Travel', 'Study', 'Shopping', 'Utility', 'Subscription', 'Other'.",
    );
    expect(SYSTEM_INSTRUCTION).toContain(
      '{"Category": "ERROR", "Description": "Failed to process input.", "Amount": "0.00"}',
    );
  });

  it('turns the ERROR category into a failure carrying its description', async () => {
    const { client } = createClient(async () =>
      completion('{"Category":"ERROR","Description":"Failed to process input.","Amount":"0.00"}'),
    );

    const result = await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([textPart]);

    expect(result).toEqual({ ok: false, reason: 'Failed to process input.' });
  });

  it('maps categories outside the vocabulary to Other', async () => {
    const { client } = createClient(async () =>
      completion('{"Category":"Groceries","Description":" Vegetables ","Amount":"80.00"}'),
    );

    const result = await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([textPart]);

    expect(result).toEqual({ ok: true, category: 'Other', description: 'Vegetables', amount: '80.00' });
  });

  it('fails on content that is not the expected JSON', async () => {
    for (const content of ['not json', '{"Category":"Food"}', null]) {
      const { client } = createClient(async () => completion(content));

      const result = await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([textPart]);

      expect(result).toEqual({ ok: false, reason: 'Failed to process input.' });
    }
  });

  it('fails when the service cannot be reached', async () => {
    const { client } = createClient(async () => {
      throw new Error('Request timed out.');
    });

    const result = await new OpenAIExpenseExtractor(client, { model: 'test-model' }).extract([textPart]);

    expect(result).toEqual({
      ok: false,
      reason: 'The extraction service could not be reached. Please try again later.',
    });
  });
});
