/**
 * AI Providers - Unified interface for multiple LLM providers
 *
 * Every workflow talks to a `ChatClient`. The providers here implement it
 * over Claude, GPT and Gemini, and `ProviderManager` chains them with
 * automatic fallback when one fails.
 *
 * @module providers
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  MessageCreateParamsNonStreaming,
  MessageParam,
} from '@anthropic-ai/sdk/resources/messages/messages';
import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import {
  FinishReason,
  GoogleGenerativeAI,
  type ChatSession,
  type Content,
  type GenerationConfig,
  type ModelParams,
} from '@google/generative-ai';
import { getConfig, type ProviderSettings } from './config';
import { WorkflowError, errorMessage } from './errors';
import type { Provider } from './model-registry';

// =============================================================================
// Types
// =============================================================================

export interface Message {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  jsonMode?: boolean;
  maxTokens?: number;
  temperature?: number;
  /** Model ID overriding the provider's primary model for this call */
  model?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResult {
  content: string;
  provider: string;
  model: string;
  usage?: TokenUsage;
}

/**
 * The one capability the workflows need.
 */
export interface ChatClient {
  chat(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): Promise<ChatResult>;
}

export interface AIProvider extends ChatClient {
  name: string;
  stream(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): AsyncIterable<string>;
  isAvailable(): boolean;
}

export interface ProviderOptions {
  apiKey?: string;
  primaryModel?: string;
  fallbackModel?: string;
}

// =============================================================================
// Shared helpers
// =============================================================================

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/** Rate limited or temporarily unavailable: worth one try on the fallback model */
function isRetryable(error: unknown): boolean {
  const status = statusOf(error);
  return status === 429 || status === 503;
}

function resolveSettings(provider: Provider, options?: ProviderOptions) {
  const settings: ProviderSettings = getConfig().providers[provider];
  return {
    apiKey: options?.apiKey ?? settings.apiKey,
    primaryModel: options?.primaryModel ?? settings.model,
    fallbackModel: options?.fallbackModel ?? settings.fallbackModel,
  };
}

function requireMessages(messages: Message[], providerName: string): Message {
  const last = messages[messages.length - 1];
  if (!last) {
    throw new WorkflowError(`${providerName}: at least one message is required`, 'invalid_input');
  }
  return last;
}

/**
 * Run a request on the primary model, retrying once on the fallback model
 * when the primary is rate limited or overloaded.
 */
async function withModelFallback<T>(
  tag: string,
  primaryModel: string,
  fallbackModel: string,
  request: (model: string) => Promise<T>,
  shouldFallback: (error: unknown) => boolean = isRetryable
): Promise<T> {
  try {
    return await request(primaryModel);
  } catch (error) {
    if (shouldFallback(error) && fallbackModel !== primaryModel) {
      console.log(`[${tag}] Primary failed, trying fallback model ${fallbackModel}...`);
      return request(fallbackModel);
    }
    throw error;
  }
}

// =============================================================================
// Anthropic Provider (Claude)
// =============================================================================

export class AnthropicProvider implements AIProvider {
  name = 'Anthropic Claude';
  private client: Anthropic | null = null;
  private primaryModel: string;
  private fallbackModel: string;

  constructor(options?: ProviderOptions) {
    const settings = resolveSettings('anthropic', options);
    if (settings.apiKey) {
      this.client = new Anthropic({ apiKey: settings.apiKey });
    }
    this.primaryModel = settings.primaryModel;
    this.fallbackModel = settings.fallbackModel;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async chat(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): Promise<ChatResult> {
    const client = this.requireClient();

    return withModelFallback('Anthropic', options?.model ?? this.primaryModel, this.fallbackModel, async (model) => {
      const response = await client.messages.create(this.buildParams(model, messages, systemPrompt, options));

      const content = response.content[0];
      if (!content || content.type !== 'text') {
        throw new WorkflowError('Unexpected response format from Anthropic', 'invalid_response');
      }

      if (response.stop_reason === 'max_tokens') {
        console.warn('[Anthropic] Response truncated - max_tokens reached');
      }

      return {
        content: content.text,
        provider: this.name,
        model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    });
  }

  async *stream(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): AsyncGenerator<string> {
    const client = this.requireClient();
    const params = this.buildParams(options?.model ?? this.primaryModel, messages, systemPrompt, options);
    const events = await client.messages.create({ ...params, stream: true });

    for await (const event of events) {
      if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
        yield event.delta.text;
      } else if (event.type === 'message_delta' && event.delta.stop_reason === 'max_tokens') {
        console.warn('[Anthropic] Stream truncated - max_tokens reached');
      }
    }
  }

  private requireClient(): Anthropic {
    if (!this.client) {
      throw new WorkflowError('Anthropic API key not configured', 'provider_unavailable');
    }
    return this.client;
  }

  private buildParams(
    model: string,
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): MessageCreateParamsNonStreaming {
    requireMessages(messages, this.name);

    const params: MessageCreateParamsNonStreaming = {
      model,
      max_tokens: options?.maxTokens || (options?.jsonMode ? 8192 : 1024),
      messages: messages.map((msg): MessageParam => ({
        role: msg.role,
        content: msg.content,
      })),
    };
    if (options?.temperature !== undefined) {
      params.temperature = options.temperature;
    }
    // The API rejects an empty system block
    if (systemPrompt) {
      params.system = systemPrompt;
    }
    return params;
  }
}

// =============================================================================
// OpenAI Provider (GPT)
// =============================================================================

export class OpenAIProvider implements AIProvider {
  name = 'OpenAI GPT';
  private client: OpenAI | null = null;
  private primaryModel: string;
  private fallbackModel: string;

  constructor(options?: ProviderOptions) {
    const settings = resolveSettings('openai', options);
    if (settings.apiKey) {
      this.client = new OpenAI({ apiKey: settings.apiKey });
    }
    this.primaryModel = settings.primaryModel;
    this.fallbackModel = settings.fallbackModel;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async chat(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): Promise<ChatResult> {
    const client = this.requireClient();

    return withModelFallback('OpenAI', options?.model ?? this.primaryModel, this.fallbackModel, async (model) => {
      const response = await client.chat.completions.create(
        this.buildParams(model, messages, systemPrompt, options)
      );
      const choice = response.choices[0];

      if (!choice?.message?.content) {
        throw new WorkflowError('Unexpected response format from OpenAI', 'invalid_response');
      }

      if (choice.finish_reason === 'length') {
        console.warn('[OpenAI] Response truncated - max tokens reached');
      }

      return {
        content: choice.message.content,
        provider: this.name,
        model,
        usage: response.usage ? {
          inputTokens: response.usage.prompt_tokens,
          outputTokens: response.usage.completion_tokens,
        } : undefined,
      };
    });
  }

  async *stream(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): AsyncGenerator<string> {
    const client = this.requireClient();
    const params = this.buildParams(options?.model ?? this.primaryModel, messages, systemPrompt, options);
    const chunks = await client.chat.completions.create({ ...params, stream: true });

    for await (const chunk of chunks) {
      const choice = chunk.choices[0];
      if (choice?.delta?.content) {
        yield choice.delta.content;
      }
      if (choice?.finish_reason === 'length') {
        console.warn('[OpenAI] Stream truncated - max tokens reached');
      }
    }
  }

  private requireClient(): OpenAI {
    if (!this.client) {
      throw new WorkflowError('OpenAI API key not configured', 'provider_unavailable');
    }
    return this.client;
  }

  private buildParams(
    model: string,
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): ChatCompletionCreateParamsNonStreaming {
    requireMessages(messages, this.name);

    const chatMessages: ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      chatMessages.push({ role: 'system', content: systemPrompt });
    }
    for (const msg of messages) {
      chatMessages.push(
        msg.role === 'user'
          ? { role: 'user', content: msg.content }
          : { role: 'assistant', content: msg.content }
      );
    }

    const params: ChatCompletionCreateParamsNonStreaming = {
      model,
      max_tokens: options?.maxTokens || (options?.jsonMode ? 8192 : 1024),
      messages: chatMessages,
    };
    if (options?.temperature !== undefined) {
      params.temperature = options.temperature;
    }
    if (options?.jsonMode) {
      params.response_format = { type: 'json_object' };
    }
    return params;
  }
}

// =============================================================================
// Gemini Provider (Google)
// =============================================================================

export class GeminiProvider implements AIProvider {
  name = 'Google Gemini';
  private client: GoogleGenerativeAI | null = null;
  private primaryModel: string;
  private fallbackModel: string;

  constructor(options?: ProviderOptions) {
    const settings = resolveSettings('google', options);
    if (settings.apiKey) {
      this.client = new GoogleGenerativeAI(settings.apiKey);
    }
    this.primaryModel = settings.primaryModel;
    this.fallbackModel = settings.fallbackModel;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async chat(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): Promise<ChatResult> {
    const client = this.requireClient();

    return withModelFallback(
      'Gemini',
      options?.model ?? this.primaryModel,
      this.fallbackModel,
      async (model) => {
        const { chat, lastMessage } = this.startChat(client, model, messages, systemPrompt, options);
        const result = await chat.sendMessage(lastMessage.content);
        const response = result.response;

        if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
          console.warn('[Gemini] Response truncated - MAX_TOKENS reached');
        }

        return {
          content: response.text(),
          provider: this.name,
          model,
          usage: response.usageMetadata ? {
            inputTokens: response.usageMetadata.promptTokenCount || 0,
            outputTokens: response.usageMetadata.candidatesTokenCount || 0,
          } : undefined,
        };
      },
      (error) => isRetryable(error) || errorMessage(error).includes('quota')
    );
  }

  async *stream(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): AsyncGenerator<string> {
    const client = this.requireClient();
    const model = options?.model ?? this.primaryModel;
    const { chat, lastMessage } = this.startChat(client, model, messages, systemPrompt, options);
    const result = await chat.sendMessageStream(lastMessage.content);

    for await (const chunk of result.stream) {
      const text = chunk.text();
      if (text) {
        yield text;
      }
    }
  }

  private requireClient(): GoogleGenerativeAI {
    if (!this.client) {
      throw new WorkflowError('Google AI API key not configured', 'provider_unavailable');
    }
    return this.client;
  }

  private startChat(
    client: GoogleGenerativeAI,
    model: string,
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): { chat: ChatSession; lastMessage: Message } {
    const lastMessage = requireMessages(messages, this.name);

    const generationConfig: GenerationConfig = {
      maxOutputTokens: options?.maxTokens || (options?.jsonMode ? 16384 : 2048),
      temperature: options?.temperature,
    };
    if (options?.jsonMode) {
      generationConfig.responseMimeType = 'application/json';
    }

    const modelParams: ModelParams = { model, generationConfig };
    if (systemPrompt) {
      modelParams.systemInstruction = systemPrompt;
    }

    // Gemini names the assistant role "model"
    const history: Content[] = messages.slice(0, -1).map(msg => ({
      role: msg.role === 'user' ? 'user' : 'model',
      parts: [{ text: msg.content }],
    }));

    const chat = client.getGenerativeModel(modelParams).startChat({ history });
    return { chat, lastMessage };
  }
}

// =============================================================================
// Provider Manager (Orchestrates all providers)
// =============================================================================

export interface ProviderManagerOptions {
  /** Order of providers to try (default: config order, anthropic → openai → google) */
  providerOrder?: Provider[];
  /** Per-provider key and model overrides */
  providerConfigs?: Partial<Record<Provider, ProviderOptions>>;
  /** Ready-made providers; replaces the built-in ones when given */
  providers?: AIProvider[];
}

export class ProviderManager implements ChatClient {
  private providers: AIProvider[] = [];

  constructor(options?: ProviderManagerOptions) {
    if (options?.providers) {
      this.providers = options.providers.filter(provider => provider.isAvailable());
    } else {
      const order = options?.providerOrder || getConfig().providers.order;
      const configs = options?.providerConfigs || {};

      const providerMap: Record<Provider, () => AIProvider> = {
        anthropic: () => new AnthropicProvider(configs.anthropic),
        openai: () => new OpenAIProvider(configs.openai),
        google: () => new GeminiProvider(configs.google),
      };

      this.providers = order
        .map(name => providerMap[name]())
        .filter(provider => provider.isAvailable());
    }

    if (this.providers.length === 0) {
      console.warn('[ProviderManager] No AI providers available');
    } else {
      console.log(
        `[ProviderManager] Initialized: ${this.providers.map(p => p.name).join(', ')}`
      );
    }
  }

  /**
   * Send a chat request, automatically falling back through providers on failure
   */
  async chat(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): Promise<ChatResult> {
    this.ensureProviders();

    let lastError: unknown;

    for (const provider of this.providers) {
      try {
        console.log(`[ProviderManager] Trying: ${provider.name}`);
        const result = await provider.chat(messages, systemPrompt, options);
        console.log(`[ProviderManager] Success: ${provider.name}`);
        return result;
      } catch (error) {
        console.error(`[ProviderManager] ${provider.name} failed:`, errorMessage(error));
        lastError = error;
      }
    }

    throw new WorkflowError(
      `All AI providers failed: ${errorMessage(lastError)}`,
      'provider_failure',
      lastError
    );
  }

  /**
   * Stream a response as text chunks. Falls back to the next provider only
   * while nothing has been yielded yet.
   */
  async *stream(
    messages: Message[],
    systemPrompt: string,
    options?: ChatOptions
  ): AsyncGenerator<string> {
    this.ensureProviders();

    let lastError: unknown;

    for (const provider of this.providers) {
      let emitted = false;
      try {
        console.log(`[ProviderManager] Streaming from: ${provider.name}`);
        for await (const chunk of provider.stream(messages, systemPrompt, options)) {
          emitted = true;
          yield chunk;
        }
        return;
      } catch (error) {
        if (emitted) {
          throw error;
        }
        console.error(`[ProviderManager] ${provider.name} failed:`, errorMessage(error));
        lastError = error;
      }
    }

    throw new WorkflowError(
      `All AI providers failed: ${errorMessage(lastError)}`,
      'provider_failure',
      lastError
    );
  }

  getAvailableProviders(): string[] {
    return this.providers.map(p => p.name);
  }

  isAvailable(): boolean {
    return this.providers.length > 0;
  }

  private ensureProviders(): void {
    if (this.providers.length === 0) {
      throw new WorkflowError(
        'No AI providers available. Please configure API keys.',
        'provider_unavailable'
      );
    }
  }
}

export function createProviderManager(options?: ProviderManagerOptions): ProviderManager {
  return new ProviderManager(options);
}
