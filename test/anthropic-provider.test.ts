import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { AnthropicProvider } from '../src/providers';
import { chatStructured } from '../src/structured-output';

const createMock = vi.hoisted(() => vi.fn());

vi.mock('@anthropic-ai/sdk', () => {
  class Anthropic {
    messages = { create: createMock };
  }
  return { default: Anthropic };
});

function textResponse(text: string, stopReason = 'end_turn') {
  return {
    content: [{ type: 'text', text }],
    stop_reason: stopReason,
    usage: { input_tokens: 12, output_tokens: 3 },
  };
}

function httpError(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe('AnthropicProvider', () => {
  beforeEach(() => {
    createMock.mockReset();
  });

  const provider = () =>
    new AnthropicProvider({ apiKey: 'test-key', primaryModel: 'primary-model', fallbackModel: 'fallback-model' });

  it('should send messages, options and system prompt', async () => {
    createMock.mockResolvedValueOnce(textResponse('Hi!'));

    const result = await provider().chat(
      [{ role: 'user', content: 'Hello' }],
      'Be brief.',
      { maxTokens: 50, temperature: 0.2 }
    );

    expect(createMock).toHaveBeenCalledWith({
      model: 'primary-model',
      max_tokens: 50,
      temperature: 0.2,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hello' }],
    });
    expect(result).toEqual({
      content: 'Hi!',
      provider: 'Anthropic Claude',
      model: 'primary-model',
      usage: { inputTokens: 12, outputTokens: 3 },
    });
  });

  it('should omit an empty system prompt and size JSON replies larger', async () => {
    createMock.mockResolvedValueOnce(textResponse('{}'));

    await provider().chat([{ role: 'user', content: 'Hello' }], '', { jsonMode: true });

    expect(createMock).toHaveBeenCalledWith({
      model: 'primary-model',
      max_tokens: 8192,
      messages: [{ role: 'user', content: 'Hello' }],
    });
  });

  it('should give structured calls the JSON token budget', async () => {
    createMock.mockResolvedValueOnce(textResponse('{"name":"Ada"}'));

    const { value } = await chatStructured(provider(), 'Name a mathematician.', z.object({ name: z.string() }), {
      format: '{ "name": string }',
    });

    expect(value).toEqual({ name: 'Ada' });
    expect(createMock.mock.calls[0][0]).toMatchObject({ max_tokens: 8192 });
  });

  it('should retry once on the fallback model when rate limited', async () => {
    createMock
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValueOnce(textResponse('from fallback'));

    const result = await provider().chat([{ role: 'user', content: 'Hello' }], '');

    expect(result.content).toBe('from fallback');
    expect(result.model).toBe('fallback-model');
    expect(createMock).toHaveBeenCalledTimes(2);
    expect(createMock.mock.calls[1][0]).toMatchObject({ model: 'fallback-model' });
  });

  it('should not retry other errors', async () => {
    const badRequest = httpError(400);
    createMock.mockRejectedValueOnce(badRequest);

    await expect(provider().chat([{ role: 'user', content: 'Hello' }], '')).rejects.toBe(badRequest);
    expect(createMock).toHaveBeenCalledTimes(1);
  });

  it('should warn when the reply hit max_tokens', async () => {
    createMock.mockResolvedValueOnce(textResponse('cut o', 'max_tokens'));

    await provider().chat([{ role: 'user', content: 'Hello' }], '');

    expect(console.warn).toHaveBeenCalledWith('[Anthropic] Response truncated - max_tokens reached');
  });

  it('should stream text deltas only', async () => {
    createMock.mockResolvedValueOnce((async function* () {
      yield { type: 'message_start', message: {} };
      yield { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hel' } };
      yield { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'lo' } };
      yield { type: 'message_delta', delta: { stop_reason: 'end_turn' } };
      yield { type: 'message_stop' };
    })());

    const chunks: string[] = [];
    for await (const chunk of provider().stream([{ role: 'user', content: 'Hello' }], '')) {
      chunks.push(chunk);
    }

    expect(chunks).toEqual(['Hel', 'lo']);
    expect(createMock.mock.calls[0][0]).toMatchObject({ model: 'primary-model', stream: true });
  });
});
