import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { OpenRouterClient, errorFromStatus, parseCompletion, toBackendError } from '../../../src/llm/client';
import { BackendAuthenticationError, BackendError, BackendRateLimitError } from '../../../src/llm/errors';
import { RateLimiter } from '../../../src/llm/rate-limiter';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('OpenRouterClient Unit Tests', () => {
  let client: OpenRouterClient;
  const mockAxiosInstance = {
    post: jest.fn(),
    interceptors: {
      request: { use: jest.fn() },
      response: { use: jest.fn() },
    },
  };
  const getResponseErrorInterceptor = (): ((error: unknown) => Promise<never>) => {
    const call = mockAxiosInstance.interceptors.response.use.mock.calls[0] as unknown[] | undefined;
    const handler = call?.[1];
    if (typeof handler !== 'function') throw new Error('response interceptor not registered');
    return (error: unknown) => Promise.resolve(handler(error)).then(() => Promise.reject(new Error('interceptor resolved')));
  };

  beforeEach(() => {
    jest.clearAllMocks();
    // Force axios.create to return our mock instance
    mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);
    client = new OpenRouterClient({ apiKey: 'test-secret' });
  });

  it('should configure the axios instance with auth and base URL', () => {
    expect(mockedAxios.create).toHaveBeenCalledWith({
      baseURL: 'https://openrouter.ai/api/v1',
      timeout: 120000,
      headers: {
        Authorization: 'Bearer test-secret',
        'Content-Type': 'application/json',
        'X-Title': 'codemender',
      },
    });
  });

  it('should post a non-streaming chat completion and return its content', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({
      data: {
        model: 'vendor/model-a',
        choices: [{ message: { content: 'refactoring plan' } }],
        usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
      },
    });

    const result = await client.complete('vendor/model-a', [{ role: 'user', content: 'hi' }]);

    expect(mockAxiosInstance.post).toHaveBeenCalledWith('/chat/completions', {
      model: 'vendor/model-a',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0,
      max_tokens: 4096,
      stream: false,
    });
    expect(result).toEqual({ content: 'refactoring plan', model: 'vendor/model-a', usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 } });
  });

  it('should attribute request failures to the model', async () => {
    mockAxiosInstance.post.mockRejectedValueOnce(new BackendRateLimitError('slow down', 3000));

    const error = await client.complete('vendor/model-a', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendRateLimitError);
    expect(error).toMatchObject({ name: 'BackendRateLimitError', code: 'RATE_LIMITED', backend: 'vendor/model-a', retryAfterMs: 3000, status: 429, message: 'slow down' });
  });

  it('should keep an authentication failure recognisable after attribution', async () => {
    mockAxiosInstance.post.mockRejectedValueOnce(new BackendAuthenticationError('bad key', 403));

    const error = await client.complete('vendor/model-a', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendAuthenticationError);
    expect(error).toMatchObject({ name: 'BackendAuthenticationError', code: 'AUTHENTICATION', backend: 'vendor/model-a', status: 403 });
  });

  it('should map an error object inside a 200 body', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ data: { error: { code: 429, message: 'Upstream rate limited' } } });

    await expect(client.complete('vendor/model-a', [])).rejects.toMatchObject({ code: 'RATE_LIMITED', message: 'Upstream rate limited', backend: 'vendor/model-a' });
  });

  it('should reject an empty completion', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ data: { choices: [{ message: { content: '   ' } }] } });

    await expect(client.complete('vendor/model-a', [])).rejects.toMatchObject({ code: 'EMPTY_RESPONSE' });
  });

  it('should check a model with a tiny completion', async () => {
    mockAxiosInstance.post.mockResolvedValueOnce({ data: { choices: [{ message: { content: 'ok' } }] } });

    await client.checkModel('vendor/model-a');

    expect(mockAxiosInstance.post).toHaveBeenCalledWith('/chat/completions', expect.objectContaining({ model: 'vendor/model-a', max_tokens: 5 }));
  });

  // ── Response interceptor ──

  it('should turn a 429 response into a rate-limit error with the retry delay', async () => {
    const interceptor = getResponseErrorInterceptor();

    const error = await interceptor({ response: { status: 429, headers: { 'retry-after': '7' }, data: { error: { message: 'slow down' } } } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendRateLimitError);
    expect(error).toMatchObject({ code: 'RATE_LIMITED', retryAfterMs: 7000, message: 'slow down' });
  });

  it('should turn a connection timeout into TIMEOUT', async () => {
    const interceptor = getResponseErrorInterceptor();
    const timeout = Object.assign(new Error('timeout of 120000ms exceeded'), { code: 'ECONNABORTED' });

    await expect(interceptor(timeout)).rejects.toMatchObject({ code: 'TIMEOUT', message: 'Request timed out: timeout of 120000ms exceeded' });
  });
});

describe('errorFromStatus', () => {
  it.each([
    [401, 'bad key', 'AUTHENTICATION'],
    [403, 'forbidden', 'AUTHENTICATION'],
    [402, 'insufficient credits', 'QUOTA_EXCEEDED'],
    [404, 'No endpoints found for model', 'ENDPOINT_NOT_FOUND'],
    [408, 'request timeout', 'TIMEOUT'],
    [400, 'tools are not supported by this provider', 'CAPABILITY_UNSUPPORTED'],
    [400, 'messages must be an array', 'INVALID_REQUEST'],
    [422, 'streaming unsupported', 'CAPABILITY_UNSUPPORTED'],
    [502, 'bad gateway', 'UNAVAILABLE'],
    [503, 'overloaded', 'UNAVAILABLE'],
    [418, 'teapot', 'UNKNOWN'],
  ])('should map HTTP %i (%s) to %s', (status, message, code) => {
    const error = errorFromStatus(status, message);

    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
    expect(error.status).toBe(status);
  });
});

describe('toBackendError', () => {
  it('should take the message from a plain-text body', () => {
    expect(toBackendError({ response: { status: 503, data: 'Service Unavailable' } })).toMatchObject({ code: 'UNAVAILABLE', message: 'Service Unavailable' });
  });

  it('should fall back to the status text', () => {
    expect(toBackendError({ response: { status: 500, statusText: 'Internal Server Error', data: {} } }).message).toBe('Internal Server Error');
  });

  it('should report a network failure as UNAVAILABLE', () => {
    expect(toBackendError(new Error('socket hang up'))).toMatchObject({ code: 'UNAVAILABLE', message: 'Network error: socket hang up' });
  });

  it('should pass a BackendError through unchanged', () => {
    const original = new BackendError('x', 'TIMEOUT');
    expect(toBackendError(original)).toBe(original);
  });
});

describe('parseCompletion', () => {
  it('should keep the requested model when the body omits it', () => {
    expect(parseCompletion({ choices: [{ message: { content: 'hello' } }] }, 'vendor/model-a')).toEqual({ content: 'hello', model: 'vendor/model-a', usage: undefined });
  });
});

describe('RateLimiter', () => {
  it('should read retry-after in seconds', () => {
    expect(RateLimiter.getWaitTime({ 'retry-after': '2' })).toBe(2000);
  });

  it('should read x-ratelimit-reset as an epoch in seconds', () => {
    expect(RateLimiter.getWaitTime({ 'x-ratelimit-reset': '1005' }, 1_000_000)).toBe(5000);
  });

  it('should read x-ratelimit-reset as an epoch in milliseconds', () => {
    expect(RateLimiter.getWaitTime({ 'x-ratelimit-reset': '1700000004000' }, 1_700_000_000_000)).toBe(4000);
  });

  it('should return null without rate-limit headers', () => {
    expect(RateLimiter.getWaitTime({})).toBeNull();
    expect(RateLimiter.getWaitTime(undefined)).toBeNull();
  });
});
