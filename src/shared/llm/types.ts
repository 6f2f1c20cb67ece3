/**
 * LLM Types
 * 
 * Type definitions for LLM configuration and responses.
 * Supports both OpenAI and Anthropic providers.
 */

/**
 * Supported LLM providers
 */
export type LLMProvider = 'openai' | 'anthropic';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic'];

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  openai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0.1,
    maxTokens: 1000
  },
  anthropic: {
    provider: 'anthropic',
    model: 'claude-3-5-haiku-20241022',
    temperature: 0.1,
    maxTokens: 1000
  }
};

/**
 * Message role for chat-based LLM interactions
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Message structure for LLM interactions
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM request parameters
 */
export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string; // Override the default model for this request
  /** Ask the provider for a JSON object reply where it supports one */
  jsonObject?: boolean;
}

/**
 * LLM response structure
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

/**
 * The external text-generation service: a prompt in, free text out.
 * Components depend on this interface so tests can script the replies.
 */
export interface TextGenerationService {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

/**
 * Outcome of reading structured data out of a service reply
 */
export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };
