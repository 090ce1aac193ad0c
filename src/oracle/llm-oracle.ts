import type { IOracle, OracleError, OracleRequest } from './index.js';
import type { ILLMMessage, ILLMMessageContent, ILLMProvider, ModelRole } from '../providers/types.js';
import type { ILogger } from '../infra/logger.js';
import { RetryStrategy } from '../infra/retry-utils.js';
import { err, ok, type Result } from '../types/result.js';

export interface LLMOracleOptions {
  /** Extra attempts on transient transport errors. */
  maxRetries?: number;
  temperature?: number;
}

const DEFAULT_MAX_TOKENS = 1500;

/**
 * Oracle backed by a chat-completion provider.
 */
export class LLMOracle implements IOracle {
  constructor(
    private provider: ILLMProvider,
    private logger: ILogger,
    private options: LLMOracleOptions = {},
    private retry: RetryStrategy = new RetryStrategy(logger)
  ) {}

  async ask(request: OracleRequest): Promise<Result<string, OracleError>> {
    const images = request.images ?? [];
    if (images.length > 0 && !this.provider.supportsVision()) {
      return err({ kind: 'transport', message: `Provider ${this.provider.name} cannot read images` });
    }

    const model = this.provider.modelFor(this.roleFor(request, images.length > 0));
    const messages = this.buildMessages(request);

    this.logger.debug('Oracle request', {
      purpose: request.purpose,
      model,
      images: images.length,
    });

    try {
      const response = await this.retry.execute(
        () =>
          this.provider.createChatCompletion({
            model,
            messages,
            temperature: this.options.temperature ?? 0,
            max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
            response_format:
              request.expectJson && this.provider.supportsJsonMode() ? { type: 'json_object' } : undefined,
          }),
        { maxRetries: this.options.maxRetries ?? 2, initialDelay: 1000, maxDelay: 8000 }
      );

      const content = response.content.trim();
      if (!content) {
        return err({ kind: 'empty', message: 'Oracle returned an empty answer' });
      }
      return ok(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Oracle call failed (${request.purpose})`, error);
      return err({ kind: 'transport', message });
    }
  }

  private roleFor(request: OracleRequest, hasImages: boolean): ModelRole {
    if (hasImages) {
      return 'vision';
    }
    return request.purpose === 'plan' ? 'planner' : 'default';
  }

  private buildMessages(request: OracleRequest): ILLMMessage[] {
    const messages: ILLMMessage[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }

    const images = request.images ?? [];
    if (images.length === 0) {
      messages.push({ role: 'user', content: request.prompt });
      return messages;
    }

    const content: ILLMMessageContent[] = [{ type: 'text', text: request.prompt }];
    for (const image of images) {
      content.push({
        type: 'image_url',
        image_url: { url: `data:${image.mimeType};base64,${image.data}`, detail: 'high' },
      });
    }
    messages.push({ role: 'user', content });
    return messages;
  }
}
