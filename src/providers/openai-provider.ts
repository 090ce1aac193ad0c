/**
 * OpenAI provider. Also serves OpenAI-compatible endpoints through `baseURL`.
 */

import OpenAI from 'openai';
import type {
  ILLMProvider,
  ILLMProviderConfig,
  ILLMCompletionOptions,
  ILLMCompletionResponse,
  ILLMMessage,
  ModelRole,
} from './types.js';
import type { ILogger } from '../infra/logger.js';
import { classifyHttpError } from '../infra/retry-utils.js';

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

export function toOpenAIMessages(messages: ILLMMessage[]): ChatMessage[] {
  return messages.map((message): ChatMessage => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
      case 'user': {
        if (typeof message.content === 'string') {
          return { role: 'user', content: message.content };
        }
        const parts = message.content.map((part): ContentPart =>
          part.type === 'text'
            ? { type: 'text', text: part.text }
            : { type: 'image_url', image_url: { url: part.image_url.url, detail: part.image_url.detail } }
        );
        return { role: 'user', content: parts };
      }
    }
  });
}

/**
 * Tags SDK errors for the oracle's retry: rejected keys and bad requests
 * fail at once, throttling and server errors are retried.
 */
export function toOpenAIRetryError(error: unknown): unknown {
  return error instanceof OpenAI.APIError ? classifyHttpError(error, error.status) : error;
}

export class OpenAIProvider implements ILLMProvider {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(
    private config: ILLMProviderConfig,
    private logger: ILogger
  ) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: config.maxRetries ?? 2,
      timeout: config.timeout ?? 60000,
    });

    this.logger.info('OpenAI provider initialized', {
      defaultModel: this.modelFor('default'),
      visionModel: this.modelFor('vision'),
      customEndpoint: Boolean(config.baseURL),
    });
  }

  async createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse> {
    const response = await this.client.chat.completions
      .create({
        model: options.model,
        messages: toOpenAIMessages(options.messages),
        temperature: options.temperature ?? 0,
        max_tokens: options.max_tokens,
        response_format: options.response_format?.type === 'json_object' ? { type: 'json_object' } : undefined,
      })
      .catch((error: unknown) => {
        throw toOpenAIRetryError(error);
      });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('OpenAI returned empty response');
    }

    return {
      content: choice.message.content,
      role: 'assistant',
      model: response.model,
      usage: response.usage
        ? {
            prompt_tokens: response.usage.prompt_tokens,
            completion_tokens: response.usage.completion_tokens,
            total_tokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  supportsVision(): boolean {
    return true;
  }

  supportsJsonMode(): boolean {
    return true;
  }

  modelFor(role: ModelRole): string {
    switch (role) {
      case 'vision':
        return this.config.visionModel || 'gpt-4o';
      case 'planner':
        return this.config.plannerModel || 'gpt-4o-mini';
      case 'default':
        return this.config.defaultModel || 'gpt-4o';
    }
  }
}
