import { describe, it, expect } from 'vitest';
import { CompletionDataSchema, CompletionSchema, MessageSchema } from '../schema.js';

const WIRE_COMPLETION = {
  id: 'cmpl-abc',
  object: 'chat.completion',
  model: 'vendor/model',
  created: 1700000000,
  usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 },
  choices: [
    {
      message: { role: 'assistant', content: 'Hi there' },
      index: 0,
      finish_reason: 'end_turn',
      logprobs: null,
    },
  ],
  system_fingerprint: 'fp_1',
};

describe('MessageSchema', () => {
  it('decodes assistant null content as absent', () => {
    const result = MessageSchema.parse({ role: 'assistant', content: null });
    expect(result).toEqual({ role: 'assistant' });
    expect('content' in result).toBe(false);
  });

  it('decodes existing tool calls with structured arguments', () => {
    const result = MessageSchema.parse({
      role: 'assistant',
      content: null,
      tool_calls: [{ type: 'function', id: 'x', function: { name: 'f', arguments: '{"a":1}' } }],
    });
    expect(result).toEqual({
      role: 'assistant',
      tool_calls: [{ type: 'function', id: 'x', function: { name: 'f', arguments: '{"a":1}' } }],
    });
  });

  it('requires string content for user, system and tool messages', () => {
    expect(MessageSchema.safeParse({ role: 'user', content: null }).success).toBe(false);
    expect(MessageSchema.safeParse({ role: 'system' }).success).toBe(false);
    expect(MessageSchema.safeParse({ role: 'tool', content: 'ok' }).success).toBe(true);
  });

  it('rejects unknown roles', () => {
    expect(MessageSchema.safeParse({ role: 'developer', content: 'x' }).success).toBe(false);
  });
});

describe('CompletionSchema', () => {
  it('decodes the wire shape and drops unknown keys', () => {
    expect(CompletionSchema.parse(WIRE_COMPLETION)).toEqual({
      id: 'cmpl-abc',
      object: 'chat.completion',
      model: 'vendor/model',
      created: 1700000000,
      usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 },
      choices: [
        { message: { role: 'assistant', content: 'Hi there' }, index: 0, finish_reason: 'end_turn' },
      ],
    });
  });

  it('rejects a choice index outside 0..255', () => {
    const bad = {
      ...WIRE_COMPLETION,
      choices: [{ message: { role: 'assistant', content: 'x' }, index: 256, finish_reason: 'stop' }],
    };
    expect(CompletionSchema.safeParse(bad).success).toBe(false);
  });
});

describe('CompletionDataSchema', () => {
  it('decodes completions keyed by label with bookkeeping', () => {
    const data = CompletionDataSchema.parse({
      completions: {
        'vendor/model': {
          completion: WIRE_COMPLETION,
          price: { input: 0.1, output: 0.2, total: 0.3 },
          words: { input: 2, output: 3, total: 5 },
        },
      },
      overall_price: { input: 0.1, output: 0.2, total: 0.3 },
      overall_words: { input: 2, output: 3, total: 5 },
    });

    expect(Object.keys(data.completions)).toEqual(['vendor/model']);
    expect(data.completions['vendor/model']?.words.total).toBe(5);
    expect(data.overall_price.total).toBe(0.3);
  });
});
