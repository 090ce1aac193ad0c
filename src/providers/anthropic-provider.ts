/**
 * Anthropic provider.
 *
 * Claude has no JSON response mode, so JSON requests rely on the prompt and
 * the oracle's JSON extraction.
 */

import Anthropic, { type ClientOptions } from '@anthropic-ai/sdk';
import type {
  ILLMProvider,
  ILLMProviderConfig,
  ILLMCompletionOptions,
  ILLMCompletionResponse,
  ILLMMessage,
  ILLMMessageContent,
  ModelRole,
} from './types.js';
import type { ILogger } from '../infra/logger.js';
import { classifyHttpError } from '../infra/retry-utils.js';

type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

const IMAGE_MEDIA_TYPES: readonly string[] = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'];

function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.includes(value);
}

function toContentBlock(part: ILLMMessageContent): Anthropic.TextBlockParam | Anthropic.ImageBlockParam {
  if (part.type === 'text') {
    return { type: 'text', text: part.text };
  }
  const match = /^data:(image\/[a-z]+);base64,(.+)$/s.exec(part.image_url.url);
  if (!match) {
    throw new Error('Anthropic provider requires base64 data URLs for images');
  }
  const [, mediaType, data] = match;
  if (!isImageMediaType(mediaType)) {
    throw new Error(`Unsupported image type for Anthropic: ${mediaType}`);
  }
  return { type: 'image', source: { type: 'base64', media_type: mediaType, data } };
}

export function toAnthropicMessages(messages: ILLMMessage[]): {
  system?: string;
  messages: Anthropic.MessageParam[];
} {
  const system = messages
    .filter((message) => message.role === 'system')
    .map((message) => message.content)
    .join('\n\n');

  const conversation: Anthropic.MessageParam[] = [];
  for (const message of messages) {
    if (message.role === 'assistant') {
      conversation.push({ role: 'assistant', content: message.content });
    } else if (message.role === 'user') {
      conversation.push({
        role: 'user',
        content: typeof message.content === 'string' ? message.content : message.content.map(toContentBlock),
      });
    }
  }

  return { system: system || undefined, messages: conversation };
}

export function toAnthropicRetryError(error: unknown): unknown {
  return error instanceof Anthropic.APIError ? classifyHttpError(error, error.status) : error;
}

export class AnthropicProvider implements ILLMProvider {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(
    private config: ILLMProviderConfig,
    private logger: ILogger
  ) {
    const clientOptions: ClientOptions = {
      apiKey: config.apiKey,
      maxRetries: config.maxRetries ?? 2,
      timeout: config.timeout ?? 60000,
    };
    if (config.baseURL) {
      clientOptions.baseURL = config.baseURL;
    }
    this.client = new Anthropic(clientOptions);

    this.logger.info('Anthropic provider initialized', {
      defaultModel: this.modelFor('default'),
      visionModel: this.modelFor('vision'),
      customEndpoint: Boolean(config.baseURL),
    });
  }

  async createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse> {
    const { system, messages } = toAnthropicMessages(options.messages);

    const response = await this.client.messages
      .create({
        model: options.model,
        max_tokens: options.max_tokens ?? 4096,
        temperature: options.temperature ?? 0,
        system,
        messages,
      })
      .catch((error: unknown) => {
        throw toAnthropicRetryError(error);
      });

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!content) {
      throw new Error('Anthropic returned empty response');
    }

    return {
      content,
      role: 'assistant',
      model: response.model,
      usage: {
        prompt_tokens: response.usage.input_tokens,
        completion_tokens: response.usage.output_tokens,
        total_tokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }

  supportsVision(): boolean {
    return true;
  }

  supportsJsonMode(): boolean {
    return false;
  }

  modelFor(role: ModelRole): string {
    switch (role) {
      case 'vision':
        return this.config.visionModel || 'claude-3-5-sonnet-20241022';
      case 'planner':
        return this.config.plannerModel || 'claude-3-5-haiku-20241022';
      case 'default':
        return this.config.defaultModel || 'claude-3-5-sonnet-20241022';
    }
  }
}
