/**
 * OpenAI Model Adapter
 *
 * Also covers OpenAI-compatible endpoints (Azure, DashScope, local proxies)
 * through `baseUrl`.
 */

import { capabilityFetch, readJson } from './http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  GenerateOptions,
  OpenAIConfig,
  Message,
} from './types.js';

export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'openai';

  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(config: OpenAIConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? 'https://api.openai.com/v1').replace(/\/$/, '');
    this.name = `openai:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await capabilityFetch('language_model', 'OpenAI', `${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: this.formatMessages(request.messages),
        temperature: request.temperature ?? 0.7,
        max_tokens: request.maxTokens ?? 4096,
        stop: request.stopSequences,
        stream: false,
      }),
      signal: request.signal,
    });

    const data = await readJson<OpenAIChatResponse>(response, 'language_model', 'OpenAI');
    const choice = data.choices[0];

    return {
      content: choice?.message.content ?? '',
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice?.finish_reason ?? 'stop'),
    };
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: Message[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    const response = await this.complete({
      messages,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      signal: options.signal,
    });
    return response.content;
  }

  private formatMessages(messages: Message[]): OpenAIMessage[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mapFinishReason(reason: string): CompletionResponse['finishReason'] {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}

// OpenAI API types
interface OpenAIMessage {
  role: string;
  content: string;
}

interface OpenAIChatResponse {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}
