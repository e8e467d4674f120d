export class RateLimiter {
  /**
   * Milliseconds the backend asked us to wait, from `retry-after` (seconds)
   * or `x-ratelimit-reset` (epoch, seconds or milliseconds). Null when absent.
   */
  static getWaitTime(headers: object | undefined, now: number = Date.now()): number | null {
    if (!headers) return null;

    const retryAfter = RateLimiter.header(headers, 'retry-after');
    if (retryAfter !== undefined) {
      const seconds = Number.parseFloat(retryAfter);
      if (Number.isFinite(seconds)) return Math.max(Math.round(seconds * 1000), 0);
    }

    const reset = RateLimiter.header(headers, 'x-ratelimit-reset');
    if (reset !== undefined) {
      const value = Number.parseInt(reset, 10);
      if (Number.isFinite(value)) {
        const resetMs = value > 1e12 ? value : value * 1000;
        return Math.max(resetMs - now, 0);
      }
    }

    return null;
  }

  static async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private static header(headers: object, name: string): string | undefined {
    const value: unknown = Reflect.get(headers, name);
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  }
}
