/**
 * Anthropic Model Adapter
 */

import { capabilityFetch, readJson } from './http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  GenerateOptions,
  AnthropicConfig,
  Message,
} from './types.js';

const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_API_VERSION = '2023-06-01';

type ConversationMessage = Message & { role: 'user' | 'assistant' };

export class AnthropicAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'anthropic';

  private apiKey: string;
  private model: string;

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.name = `anthropic:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);

    const response = await capabilityFetch('language_model', 'Anthropic', ANTHROPIC_API_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: request.maxTokens ?? 4096,
        system: systemPrompt,
        messages: messages.map((msg) => ({ role: msg.role, content: msg.content })),
        temperature: request.temperature ?? 0.7,
        stop_sequences: request.stopSequences,
      }),
      signal: request.signal,
    });

    const data = await readJson<AnthropicResponse>(response, 'language_model', 'Anthropic');

    // Extract text content
    const textContent = data.content
      .filter((c): c is { type: 'text'; text: string } => c.type === 'text')
      .map((c) => c.text)
      .join('');

    return {
      content: textContent,
      usage: {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
        totalTokens: data.usage.input_tokens + data.usage.output_tokens,
      },
      finishReason: data.stop_reason === 'max_tokens' ? 'length' : 'stop',
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

  // Anthropic takes the system prompt as a top-level field, not a message
  private splitSystemPrompt(messages: Message[]): {
    systemPrompt: string | undefined;
    messages: ConversationMessage[];
  } {
    const systemMessages = messages.filter((m) => m.role === 'system');
    const nonSystemMessages = messages.filter(
      (m): m is ConversationMessage => m.role !== 'system'
    );

    return {
      systemPrompt: systemMessages.length > 0
        ? systemMessages.map((m) => m.content).join('\n\n')
        : undefined,
      messages: nonSystemMessages,
    };
  }
}

// Anthropic API types
interface AnthropicResponse {
  id: string;
  content: Array<{ type: 'text'; text: string } | { type: string }>;
  stop_reason: string | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}
