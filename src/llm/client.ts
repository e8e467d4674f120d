import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { BackendAuthenticationError, BackendError, BackendRateLimitError } from './errors';
import type { BackendErrorCode } from './errors';
import { RateLimiter } from './rate-limiter';
import type { ChatBackend, ChatCompletionResponse, ChatMessage, CompletionOptions, CompletionResult, OpenRouterClientOptions } from './types';

const CAPABILITY_PATTERN = /not supported|does not support|unsupported/i;

/**
 * Non-streaming chat-completion client for OpenRouter (or any
 * OpenAI-compatible endpoint). Every failure leaves as a BackendError.
 */
export class OpenRouterClient implements ChatBackend {
  private http: AxiosInstance;
  private temperature: number;
  private maxTokens: number;
  private logEnabled: boolean;

  constructor(options: OpenRouterClientOptions) {
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens ?? 4096;
    this.logEnabled = options.logRequests ?? false;
    this.http = axios.create({
      baseURL: options.baseUrl || 'https://openrouter.ai/api/v1',
      timeout: options.timeoutMs || 120000,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'codemender',
      },
    });

    this.setupInterceptors();
  }

  private setupInterceptors(): void {
    if (this.logEnabled) {
      this.http.interceptors.request.use((config) => {
        console.log(`[backend] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      });
    }

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(toBackendError(error)),
    );
  }

  async complete(model: string, messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
    let data: ChatCompletionResponse;
    try {
      const response = await this.http.post<ChatCompletionResponse>('/chat/completions', {
        model,
        messages,
        temperature: options.temperature ?? this.temperature,
        max_tokens: options.maxTokens ?? this.maxTokens,
        stream: false,
      });
      data = response.data;
    } catch (error) {
      throw toBackendError(error).withBackend(model);
    }

    return parseCompletion(data, model);
  }

  /** One-line request used to check that a model is reachable with the configured key */
  async checkModel(model: string): Promise<CompletionResult> {
    return this.complete(model, [{ role: 'user', content: 'Reply with the single word: ok' }], { maxTokens: 5 });
  }
}

// ── Response handling ───────────────────────────────────────────────────

export function parseCompletion(data: ChatCompletionResponse, model: string): CompletionResult {
  // OpenRouter reports some upstream failures inside a 200 body
  if (data.error) {
    const status = typeof data.error.code === 'number' ? data.error.code : Number.parseInt(String(data.error.code ?? ''), 10);
    const message = data.error.message ?? 'Backend returned an error payload';
    throw errorFromStatus(Number.isFinite(status) ? status : 0, message).withBackend(model);
  }

  const content = data.choices?.[0]?.message?.content ?? '';
  if (content.trim() === '') {
    throw new BackendError('Backend returned an empty completion', 'EMPTY_RESPONSE', { backend: model });
  }

  const usage = data.usage
    ? {
        promptTokens: data.usage.prompt_tokens ?? 0,
        completionTokens: data.usage.completion_tokens ?? 0,
        totalTokens: data.usage.total_tokens ?? 0,
      }
    : undefined;

  return { content, model: data.model ?? model, usage };
}

// ── Error mapping ───────────────────────────────────────────────────────

interface HttpFailure {
  status: number;
  statusText?: string;
  data?: unknown;
  headers?: object;
}

/** Map an HTTP status (plus the backend's message) to a structured BackendError */
export function errorFromStatus(status: number, message: string, headers?: object, cause?: unknown): BackendError {
  switch (status) {
    case 401:
    case 403:
      return new BackendAuthenticationError(message, status);
    case 429:
      return new BackendRateLimitError(message, RateLimiter.getWaitTime(headers) ?? undefined);
    default:
      return new BackendError(message, statusToCode(status, message), { status: status || undefined, cause });
  }
}

function statusToCode(status: number, message: string): BackendErrorCode {
  if (status === 402) return 'QUOTA_EXCEEDED';
  if (status === 404) return 'ENDPOINT_NOT_FOUND';
  if (status === 408) return 'TIMEOUT';
  if (status === 400 || status === 422) {
    return CAPABILITY_PATTERN.test(message) ? 'CAPABILITY_UNSUPPORTED' : 'INVALID_REQUEST';
  }
  if (status >= 500) return 'UNAVAILABLE';
  return 'UNKNOWN';
}

/** Convert whatever axios rejected with into a BackendError */
export function toBackendError(error: unknown): BackendError {
  if (error instanceof BackendError) return error;

  const response = readHttpFailure(error);
  if (!response) {
    const message = error instanceof Error ? error.message : String(error);
    const code = isRecord(error) ? error.code : undefined;
    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new BackendError(`Request timed out: ${message}`, 'TIMEOUT', { cause: error });
    }
    return new BackendError(`Network error: ${message}`, 'UNAVAILABLE', { cause: error });
  }

  const message = extractApiMessage(response.data) ?? (response.statusText || `HTTP ${response.status}`);
  return errorFromStatus(response.status, message, response.headers, error);
}

function readHttpFailure(error: unknown): HttpFailure | undefined {
  if (!isRecord(error) || !isRecord(error.response)) return undefined;
  const { status, statusText, data, headers } = error.response;
  if (typeof status !== 'number') return undefined;
  return {
    status,
    statusText: typeof statusText === 'string' ? statusText : undefined,
    data,
    headers: typeof headers === 'object' && headers !== null ? headers : undefined,
  };
}

function extractApiMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim() !== '') return data;
  if (!isRecord(data)) return undefined;
  if (isRecord(data.error) && typeof data.error.message === 'string') return data.error.message;
  if (typeof data.message === 'string') return data.message;
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
