import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAIProvider } from '../src/providers';

const createMock = vi.hoisted(() => vi.fn());

vi.mock('openai', () => {
  class OpenAI {
    chat = { completions: { create: createMock } };
  }
  return { default: OpenAI };
});

function completion(content: string, finishReason = 'stop') {
  return {
    choices: [{ message: { role: 'assistant', content }, finish_reason: finishReason }],
    usage: { prompt_tokens: 7, completion_tokens: 2 },
  };
}

describe('OpenAIProvider', () => {
  beforeEach(() => {
    createMock.mockReset();
  });

  const provider = () =>
    new OpenAIProvider({ apiKey: 'test-key', primaryModel: 'primary-model', fallbackModel: 'fallback-model' });

  it('should send the system prompt as the first message', async () => {
    createMock.mockResolvedValueOnce(completion('Hi!'));

    const result = await provider().chat(
      [{ role: 'user', content: 'Hello' }],
      'Be brief.',
      { maxTokens: 40, temperature: 0.5 }
    );

    expect(createMock).toHaveBeenCalledWith({
      model: 'primary-model',
      max_tokens: 40,
      temperature: 0.5,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ],
    });
    expect(result).toEqual({
      content: 'Hi!',
      provider: 'OpenAI GPT',
      model: 'primary-model',
      usage: { inputTokens: 7, outputTokens: 2 },
    });
  });

  it('should request a JSON object and omit an empty system prompt in JSON mode', async () => {
    createMock.mockResolvedValueOnce(completion('{}'));

    await provider().chat([{ role: 'user', content: 'Hello' }], '', { jsonMode: true });

    expect(createMock).toHaveBeenCalledWith({
      model: 'primary-model',
      max_tokens: 8192,
      messages: [{ role: 'user', content: 'Hello' }],
      response_format: { type: 'json_object' },
    });
  });

  it('should retry once on the fallback model when overloaded', async () => {
    createMock
      .mockRejectedValueOnce(Object.assign(new Error('HTTP 503'), { status: 503 }))
      .mockResolvedValueOnce(completion('from fallback'));

    const result = await provider().chat([{ role: 'user', content: 'Hello' }], '');

    expect(result.model).toBe('fallback-model');
    expect(createMock.mock.calls[1][0]).toMatchObject({ model: 'fallback-model' });
  });

  it('should reject a reply without content', async () => {
    createMock.mockResolvedValueOnce({ choices: [] });

    await expect(provider().chat([{ role: 'user', content: 'Hello' }], ''))
      .rejects.toThrow('Unexpected response format from OpenAI');
  });
});
