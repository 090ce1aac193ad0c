export * from './types.js';
export * from './factory.js';
export * from './openai-provider.js';
export * from './anthropic-provider.js';
