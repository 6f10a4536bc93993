/**
 * Type definitions for capability adapters (language model, embeddings)
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
  signal?: AbortSignal;
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerateOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * The language-model capability the core consumes: prompt in, text out.
 */
export interface LanguageModel {
  readonly name: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

/**
 * Provider adapter: a chat completion endpoint that also serves as a LanguageModel
 */
export interface ModelAdapter extends LanguageModel {
  readonly provider: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export type CapabilityName = 'language_model' | 'embedding' | 'knowledge';

export type CapabilityErrorKind =
  | 'network'       // connection refused, DNS, 5xx
  | 'auth'          // 401 / 403
  | 'rate_limit'    // 429
  | 'bad_response'  // 4xx or a body we cannot read
  | 'timeout';      // aborted or timed out

export class CapabilityError extends Error {
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly capability: CapabilityName,
    readonly kind: CapabilityErrorKind,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'CapabilityError';
    this.status = options?.status;
  }
}

/**
 * Configuration for different providers
 */
export interface OllamaConfig {
  baseUrl: string;
  model: string;
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export interface AnthropicConfig {
  apiKey: string;
  model: string;
}

export type AdapterConfig =
  | { provider: 'ollama'; config: OllamaConfig }
  | { provider: 'openai'; config: OpenAIConfig }
  | { provider: 'anthropic'; config: AnthropicConfig };
