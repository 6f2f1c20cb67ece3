/**
 * LLM Client
 *
 * One TextGenerationService over OpenAI or Anthropic. Each request is sent
 * once (SDK retries are off); failures surface to the caller, which owns
 * the fallback.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  LLMConfig,
  LLMMessage,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG,
  TextGenerationService
} from './types';
import { loggers } from '../logging/logger';

const log = loggers.llm;

/**
 * A request with every default filled in
 */
interface ResolvedRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  messages: LLMMessage[];
  systemPrompt?: string;
  jsonObject: boolean;
}

type ProviderCall = (request: ResolvedRequest) => Promise<LLMResponse>;

function toOpenAIMessage({ role, content }: LLMMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (role) {
    case 'system':
      return { role, content };
    case 'assistant':
      return { role, content };
    case 'user':
      return { role, content };
  }
}

function openAICall(apiKey: string): ProviderCall {
  const client = new OpenAI({ apiKey, maxRetries: 0 });

  return async request => {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = request.systemPrompt
      ? [{ role: 'system', content: request.systemPrompt }]
      : [];
    messages.push(...request.messages.map(toOpenAIMessage));

    const response = await client.chat.completions.create({
      model: request.model,
      messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      ...(request.jsonObject ? { response_format: { type: 'json_object' as const } } : {})
    });

    const choice = response.choices[0];
    if (!choice?.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage && {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      },
      finishReason: choice.finish_reason ?? undefined
    };
  };
}

function anthropicCall(apiKey: string): ProviderCall {
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return async request => {
    // System text travels separately; only the conversation goes in messages
    const messages: Anthropic.MessageParam[] = [];
    for (const { role, content } of request.messages) {
      if (role !== 'system') {
        messages.push({ role, content });
      }
    }

    const response = await client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      messages,
      ...(request.systemPrompt ? { system: request.systemPrompt } : {})
    });

    const block = response.content[0];
    if (!block || block.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }

    const { input_tokens: inputTokens, output_tokens: outputTokens } = response.usage;
    return {
      content: block.text,
      model: response.model,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      finishReason: response.stop_reason ?? undefined
    };
  };
}

export class LLMClient implements TextGenerationService {
  private readonly config: LLMConfig;
  private readonly call: ProviderCall;

  constructor(config: Partial<LLMConfig> & { apiKey: string }) {
    const provider = config.provider ?? 'openai';
    this.config = { ...DEFAULT_LLM_CONFIG[provider], ...config, provider };
    this.call = provider === 'anthropic' ? anthropicCall(config.apiKey) : openAICall(config.apiKey);
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const resolved: ResolvedRequest = {
      model: request.model ?? this.config.model,
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      messages: request.messages,
      systemPrompt: request.systemPrompt,
      jsonObject: request.jsonObject ?? false
    };

    const start = Date.now();
    log.debug(
      { provider: this.config.provider, model: resolved.model, temperature: resolved.temperature, maxTokens: resolved.maxTokens },
      'Request start'
    );

    const response = await this.call(resolved);

    log.debug(
      { model: response.model, finishReason: response.finishReason, elapsedMs: Date.now() - start, usage: response.usage },
      'Request end'
    );
    return response;
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}
