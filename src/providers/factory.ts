/**
 * Creates the configured LLM provider.
 */

import { isLLMProviderType, type ILLMProvider, type LLMProviderType } from './types.js';
import { OpenAIProvider } from './openai-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import type { IConfig } from '../infra/config.js';
import type { ILogger } from '../infra/logger.js';

export class LLMProviderFactory {
  static create(type: LLMProviderType, config: IConfig, logger: ILogger): ILLMProvider {
    switch (type) {
      case 'openai':
        return LLMProviderFactory.createOpenAIProvider(config, logger);
      case 'anthropic':
        return LLMProviderFactory.createAnthropicProvider(config, logger);
    }
  }

  /**
   * Provider named by LLM_PROVIDER, OpenAI when unset.
   */
  static createFromConfig(config: IConfig, logger: ILogger): ILLMProvider {
    const providerType = (config.get('LLM_PROVIDER') || 'openai').toLowerCase();
    if (!isLLMProviderType(providerType)) {
      throw new Error(`Unknown LLM provider type: ${providerType}`);
    }
    logger.info(`Creating LLM provider: ${providerType}`);
    return LLMProviderFactory.create(providerType, config, logger);
  }

  private static createOpenAIProvider(config: IConfig, logger: ILogger): OpenAIProvider {
    const apiKey = config.get('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    return new OpenAIProvider(
      {
        apiKey,
        baseURL: config.get('OPENAI_BASE_URL'),
        defaultModel: config.get('OPENAI_MODEL'),
        visionModel: config.get('OPENAI_VISION_MODEL'),
        plannerModel: config.get('OPENAI_PLANNER_MODEL'),
      },
      logger
    );
  }

  private static createAnthropicProvider(config: IConfig, logger: ILogger): AnthropicProvider {
    const apiKey = config.get('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    return new AnthropicProvider(
      {
        apiKey,
        baseURL: config.get('ANTHROPIC_BASE_URL'),
        defaultModel: config.get('ANTHROPIC_MODEL'),
        visionModel: config.get('ANTHROPIC_VISION_MODEL'),
        plannerModel: config.get('ANTHROPIC_PLANNER_MODEL'),
      },
      logger
    );
  }
}
