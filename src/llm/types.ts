export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  content: string;
  /** Model that actually served the request, as reported by the backend */
  model: string;
  usage?: TokenUsage;
}

/**
 * A text-generation backend addressed by model identifier.
 * Failures are raised as BackendError with a structured code.
 */
export interface ChatBackend {
  complete(model: string, messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

export interface OpenRouterClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  logRequests?: boolean;
}

/** Wire shape of an OpenAI-compatible chat completion response */
export interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
  error?: {
    code?: number | string;
    message?: string;
  };
}
