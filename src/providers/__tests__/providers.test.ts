/**
 * LLM Provider Tests
 *
 * Message mapping, model selection and factory wiring. Nothing here calls
 * a vendor API.
 */

import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { OpenAIProvider, toOpenAIMessages, toOpenAIRetryError } from '../openai-provider.js';
import { AnthropicProvider, toAnthropicMessages, toAnthropicRetryError } from '../anthropic-provider.js';
import { LLMProviderFactory } from '../factory.js';
import { StaticConfig } from '../../infra/config.js';
import { LoggerStub } from '../../infra/logger.js';
import { FatalError, RetryableError, isTransientError } from '../../infra/retry-utils.js';
import type { ILLMMessage } from '../types.js';

const logger = new LoggerStub();

const conversation: ILLMMessage[] = [
  { role: 'system', content: 'You describe screens.' },
  {
    role: 'user',
    content: [
      { type: 'text', text: 'What is on screen?' },
      { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA', detail: 'high' } },
    ],
  },
  { role: 'assistant', content: '{"app_name": "Notepad"}' },
];

describe('LLM Provider Abstraction', () => {
  describe('OpenAI Provider', () => {
    it('should map messages onto chat completion parts', () => {
      expect(toOpenAIMessages(conversation)).toEqual([
        { role: 'system', content: 'You describe screens.' },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'What is on screen?' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA', detail: 'high' } },
          ],
        },
        { role: 'assistant', content: '{"app_name": "Notepad"}' },
      ]);
    });

    it('should pick configured models per role and fall back to defaults', () => {
      const provider = new OpenAIProvider({ apiKey: 'test-key', plannerModel: 'planner-model' }, logger);

      expect(provider.name).toBe('openai');
      expect(provider.modelFor('planner')).toBe('planner-model');
      expect(provider.modelFor('vision')).toBe('gpt-4o');
      expect(provider.modelFor('default')).toBe('gpt-4o');
      expect(provider.supportsVision()).toBe(true);
      expect(provider.supportsJsonMode()).toBe(true);
    });
  });

  describe('Anthropic Provider', () => {
    it('should lift system messages out and convert data URLs to image blocks', () => {
      const { system, messages } = toAnthropicMessages(conversation);

      expect(system).toBe('You describe screens.');
      expect(messages).toEqual([
        {
          role: 'user',
          content: [
            { type: 'text', text: 'What is on screen?' },
            { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'AAAA' } },
          ],
        },
        { role: 'assistant', content: '{"app_name": "Notepad"}' },
      ]);
    });

    it('should leave out an empty system prompt', () => {
      expect(toAnthropicMessages([{ role: 'user', content: 'hello' }])).toEqual({
        system: undefined,
        messages: [{ role: 'user', content: 'hello' }],
      });
    });

    it('should reject images that are not data URLs', () => {
      expect(() =>
        toAnthropicMessages([
          { role: 'user', content: [{ type: 'image_url', image_url: { url: 'https://example.com/a.png' } }] },
        ])
      ).toThrow('Anthropic provider requires base64 data URLs for images');
    });

    it('should reject unsupported image types', () => {
      expect(() =>
        toAnthropicMessages([
          { role: 'user', content: [{ type: 'image_url', image_url: { url: 'data:image/bmp;base64,AAAA' } }] },
        ])
      ).toThrow('Unsupported image type for Anthropic: image/bmp');
    });

    it('should report no JSON mode', () => {
      const provider = new AnthropicProvider({ apiKey: 'test-key', visionModel: 'vision-model' }, logger);

      expect(provider.name).toBe('anthropic');
      expect(provider.supportsJsonMode()).toBe(false);
      expect(provider.modelFor('vision')).toBe('vision-model');
    });
  });

  describe('LLMProviderFactory', () => {
    it('should create an OpenAI provider by default', () => {
      const provider = LLMProviderFactory.createFromConfig(new StaticConfig({ OPENAI_API_KEY: 'test-key' }), logger);

      expect(provider.name).toBe('openai');
    });

    it('should create the provider named in config', () => {
      const provider = LLMProviderFactory.createFromConfig(
        new StaticConfig({ LLM_PROVIDER: 'Anthropic', ANTHROPIC_API_KEY: 'test-key', ANTHROPIC_MODEL: 'default-model' }),
        logger
      );

      expect(provider.name).toBe('anthropic');
      expect(provider.modelFor('default')).toBe('default-model');
    });

    it('should require an API key', () => {
      expect(() => LLMProviderFactory.createFromConfig(new StaticConfig(), logger)).toThrow(
        'OPENAI_API_KEY is required for OpenAI provider'
      );
      expect(() =>
        LLMProviderFactory.createFromConfig(new StaticConfig({ LLM_PROVIDER: 'anthropic' }), logger)
      ).toThrow('ANTHROPIC_API_KEY is required for Anthropic provider');
    });

    it('should reject unknown providers', () => {
      expect(() => LLMProviderFactory.createFromConfig(new StaticConfig({ LLM_PROVIDER: 'other' }), logger)).toThrow(
        'Unknown LLM provider type: other'
      );
    });
  });

  describe('SDK error classification', () => {
    it('should make rejected OpenAI requests final and throttling retryable', () => {
      expect(toOpenAIRetryError(OpenAI.APIError.generate(401, undefined, 'Incorrect API key', {}))).toBeInstanceOf(
        FatalError
      );
      expect(toOpenAIRetryError(OpenAI.APIError.generate(400, undefined, 'Bad request', {}))).toBeInstanceOf(FatalError);
      expect(toOpenAIRetryError(OpenAI.APIError.generate(429, undefined, 'Slow down', {}))).toBeInstanceOf(
        RetryableError
      );
      expect(toOpenAIRetryError(OpenAI.APIError.generate(503, undefined, 'Unavailable', {}))).toBeInstanceOf(
        RetryableError
      );
    });

    it('should leave OpenAI connection errors to message matching', () => {
      const connection = new OpenAI.APIConnectionError({ message: 'Connection error.' });
      const classified = toOpenAIRetryError(connection);

      expect(classified).toBe(connection);
      expect(classified instanceof Error && isTransientError(classified)).toBe(true);
    });

    it('should classify Anthropic errors the same way', () => {
      expect(toAnthropicRetryError(Anthropic.APIError.generate(403, undefined, 'Forbidden', {}))).toBeInstanceOf(
        FatalError
      );
      expect(toAnthropicRetryError(Anthropic.APIError.generate(529, undefined, 'Overloaded', {}))).toBeInstanceOf(
        RetryableError
      );
    });

    it('should pass through errors that did not come from the SDK', () => {
      const plain = new Error('something else');

      expect(toOpenAIRetryError(plain)).toBe(plain);
      expect(toAnthropicRetryError(plain)).toBe(plain);
    });
  });
});
