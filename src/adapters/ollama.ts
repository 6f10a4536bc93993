/**
 * Ollama Model Adapter
 *
 * Connects to a local Ollama server; no API key, no network egress.
 */

import { capabilityFetch, readJson } from './http.js';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  GenerateOptions,
  OllamaConfig,
  Message,
} from './types.js';

export class OllamaAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'ollama';

  private baseUrl: string;
  private model: string;

  constructor(config: OllamaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.model = config.model;
    this.name = `ollama:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await capabilityFetch('language_model', 'Ollama', `${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        messages: this.formatMessages(request.messages),
        stream: false,
        options: {
          temperature: request.temperature ?? 0.7,
          num_predict: request.maxTokens ?? 4096,
          stop: request.stopSequences,
        },
      }),
      signal: request.signal,
    });

    const data = await readJson<OllamaChatResponse>(response, 'language_model', 'Ollama');

    return {
      content: data.message?.content ?? '',
      usage: {
        promptTokens: data.prompt_eval_count ?? 0,
        completionTokens: data.eval_count ?? 0,
        totalTokens: (data.prompt_eval_count ?? 0) + (data.eval_count ?? 0),
      },
      finishReason: data.done ? 'stop' : 'length',
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

  private formatMessages(messages: Message[]): OllamaMessage[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }
}

// Ollama API types
interface OllamaMessage {
  role: string;
  content: string;
}

interface OllamaChatResponse {
  model: string;
  message?: OllamaMessage;
  done: boolean;
  prompt_eval_count?: number;
  eval_count?: number;
}
