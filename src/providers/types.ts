/**
 * LLM provider abstraction.
 *
 * The oracle talks to one of these; each provider maps the common message
 * shape onto its vendor SDK.
 */

export type ILLMMessageContent =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'low' | 'high' | 'auto' } };

export type ILLMMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ILLMMessageContent[] }
  | { role: 'assistant'; content: string };

export interface ILLMCompletionOptions {
  model: string;
  messages: ILLMMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' | 'text' };
}

export interface ILLMCompletionResponse {
  content: string;
  role: 'assistant';
  model: string;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export type ModelRole = 'default' | 'vision' | 'planner';

export interface ILLMProvider {
  readonly name: LLMProviderType;

  createChatCompletion(options: ILLMCompletionOptions): Promise<ILLMCompletionResponse>;

  supportsVision(): boolean;

  supportsJsonMode(): boolean;

  /** Model configured for a kind of request. */
  modelFor(role: ModelRole): string;
}

export interface ILLMProviderConfig {
  apiKey: string;
  defaultModel?: string;
  visionModel?: string;
  plannerModel?: string;
  maxRetries?: number;
  timeout?: number;
  /** Custom endpoint, e.g. a gateway speaking the vendor protocol. */
  baseURL?: string;
}

export type LLMProviderType = 'openai' | 'anthropic';

export function isLLMProviderType(value: string): value is LLMProviderType {
  return value === 'openai' || value === 'anthropic';
}
