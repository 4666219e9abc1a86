import OpenAI from 'openai';
import { ProviderError } from '../../errors';
import type { ChatMessage, GenerateOptions, GenerationResult, LanguageModelProvider } from '../types';

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

/**
 * Chat completions over the OpenAI SDK. Groq exposes the same API, so the
 * provider id and base URL are what distinguish the two.
 */
export class OpenAiChatProvider implements LanguageModelProvider {
  public readonly id: string;
  public readonly model: string;
  private readonly client: OpenAI;
  private readonly defaults: Required<Pick<GenerateOptions, 'temperature' | 'maxTokens' | 'topP'>>;

  constructor(options: {
    id: string;
    apiKey: string;
    baseUrl: string;
    model: string;
    temperature?: number;
    maxTokens?: number;
    topP?: number;
    client?: OpenAI;
  }) {
    this.id = options.id;
    this.model = options.model;
    // Timeouts and the single fallback are owned by invokeWithFallback; no SDK retries.
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0 });
    this.defaults = {
      temperature: options.temperature ?? 0.7,
      maxTokens: options.maxTokens ?? 150,
      topP: options.topP ?? 1,
    };
  }

  public async generate(messages: ChatMessage[], opts: GenerateOptions = {}): Promise<GenerationResult> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toMessageParam),
        temperature: opts.temperature ?? this.defaults.temperature,
        max_tokens: opts.maxTokens ?? this.defaults.maxTokens,
        top_p: opts.topP ?? this.defaults.topP,
        stream: false,
      },
      { signal: opts.signal },
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new ProviderError(this.id, 'completion returned no choices', { model: this.model });
    }

    return {
      text: (choice.message.content ?? '').trim(),
      finishReason: choice.finish_reason,
      totalTokens: completion.usage?.total_tokens,
    };
  }

  public async healthCheck(): Promise<boolean> {
    try {
      const page = await this.client.models.list();
      return page.data.length > 0;
    } catch {
      return false;
    }
  }
}
