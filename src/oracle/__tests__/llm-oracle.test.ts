import { describe, it, expect, vi } from 'vitest';
import { LLMOracle } from '../llm-oracle.js';
import { LoggerStub } from '../../infra/logger.js';
import { RetryStrategy, FatalError } from '../../infra/retry-utils.js';
import type { ILLMProvider, ILLMCompletionOptions, ModelRole } from '../../providers/types.js';
import type { IClock } from '../../infra/clock.js';

const instantClock: IClock = { now: () => 0, sleep: () => Promise.resolve() };

function createProvider(overrides: Partial<ILLMProvider> = {}) {
  const createChatCompletion = vi.fn(async (options: ILLMCompletionOptions) => ({
    content: '{"ok": true}',
    role: 'assistant' as const,
    model: options.model,
  }));
  const provider: ILLMProvider = {
    name: 'openai',
    createChatCompletion,
    supportsVision: () => true,
    supportsJsonMode: () => true,
    modelFor: (role: ModelRole) => `${role}-model`,
    ...overrides,
  };
  return { provider, createChatCompletion };
}

describe('LLMOracle', () => {
  const logger = new LoggerStub();

  it('should send a text prompt to the planner model for plan requests', async () => {
    const { provider, createChatCompletion } = createProvider();
    const oracle = new LLMOracle(provider, logger);

    const result = await oracle.ask({ purpose: 'plan', system: 'sys', prompt: 'make a plan', expectJson: true });

    expect(result).toEqual({ ok: true, value: '{"ok": true}' });
    const options = createChatCompletion.mock.calls[0][0];
    expect(options.model).toBe('planner-model');
    expect(options.messages).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'make a plan' },
    ]);
    expect(options.response_format).toEqual({ type: 'json_object' });
  });

  it('should attach images as data URLs and use the vision model', async () => {
    const { provider, createChatCompletion } = createProvider();
    const oracle = new LLMOracle(provider, logger);

    await oracle.ask({
      purpose: 'goal-check',
      prompt: 'look',
      images: [{ data: 'AAAA', mimeType: 'image/png' }],
    });

    const options = createChatCompletion.mock.calls[0][0];
    expect(options.model).toBe('vision-model');
    expect(options.messages).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'look' },
          { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA', detail: 'high' } },
        ],
      },
    ]);
    expect(options.response_format).toBeUndefined();
  });

  it('should turn a thrown provider error into a transport error', async () => {
    const { provider } = createProvider({
      createChatCompletion: vi.fn().mockRejectedValue(new FatalError('invalid api key')),
    });
    const oracle = new LLMOracle(provider, logger);

    const result = await oracle.ask({ purpose: 'goal-check', prompt: 'x' });

    expect(result).toEqual({ ok: false, error: { kind: 'transport', message: 'invalid api key' } });
  });

  it('should retry transient failures before giving up', async () => {
    const createChatCompletion = vi
      .fn()
      .mockRejectedValueOnce(new Error('ETIMEDOUT'))
      .mockResolvedValueOnce({ content: 'fine', role: 'assistant', model: 'm' });
    const { provider } = createProvider({ createChatCompletion });
    const oracle = new LLMOracle(provider, logger, { maxRetries: 2 }, new RetryStrategy(logger, instantClock));

    const result = await oracle.ask({ purpose: 'change-cause', prompt: 'x' });

    expect(result).toEqual({ ok: true, value: 'fine' });
    expect(createChatCompletion).toHaveBeenCalledTimes(2);
  });

  it('should report a blank answer as empty', async () => {
    const { provider } = createProvider({
      createChatCompletion: vi.fn().mockResolvedValue({ content: '   ', role: 'assistant', model: 'm' }),
    });
    const oracle = new LLMOracle(provider, logger);

    const result = await oracle.ask({ purpose: 'goal-check', prompt: 'x' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('empty');
    }
  });

  it('should refuse images when the provider has no vision', async () => {
    const { provider, createChatCompletion } = createProvider({ supportsVision: () => false });
    const oracle = new LLMOracle(provider, logger);

    const result = await oracle.ask({
      purpose: 'goal-check',
      prompt: 'x',
      images: [{ data: 'AAAA', mimeType: 'image/png' }],
    });

    expect(result.ok).toBe(false);
    expect(createChatCompletion).not.toHaveBeenCalled();
  });
});
