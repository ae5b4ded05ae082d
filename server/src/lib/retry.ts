/**
 * Exponential backoff for calls that leave the process (stage service,
 * storage). Transient failures are retried by default; callers that want
 * every failure retried pass their own `retryOn`.
 */

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_MESSAGE_RE =
  /rate.?limit|too many requests|temporarily unavailable|service unavailable|timed? ?out|socket hang up|fetch failed|network error|gateway timeout|bad gateway|\b(408|425|429|500|502|503|504)\b/;

const MAX_RETRY_AFTER_MS = 60_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberField(source: unknown, key: string): number | null {
  if (!isRecord(source)) return null;
  const value = source[key];
  return typeof value === 'number' ? value : null;
}

function statusOf(error: unknown): number | null {
  if (!isRecord(error)) return null;
  return numberField(error, 'status') ?? numberField(error, 'statusCode') ?? numberField(error.response, 'status');
}

function codeOf(error: unknown): string | null {
  if (!isRecord(error)) return null;
  return typeof error.code === 'string' ? error.code.toUpperCase() : null;
}

function headerValue(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  if (!isRecord(headers)) return null;
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name);
  const value = match ? headers[match] : undefined;
  return typeof value === 'string' ? value : null;
}

/** Delay requested by a `Retry-After` header (seconds), capped at 60 s. */
export function retryAfterMs(error: unknown): number {
  if (!isRecord(error)) return 0;
  const raw = headerValue(error.headers, 'retry-after')
    ?? (isRecord(error.response) ? headerValue(error.response.headers, 'retry-after') : null);
  if (!raw) return 0;
  const seconds = Number.parseFloat(raw);
  return Number.isFinite(seconds) && seconds > 0 ? Math.min(seconds * 1000, MAX_RETRY_AFTER_MS) : 0;
}

export function isTransient(error: Error, rawError: unknown = error): boolean {
  if (error.name === 'AbortError') return false;

  const status = statusOf(rawError);
  if (status !== null) return TRANSIENT_STATUSES.has(status);

  const code = codeOf(rawError);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  return TRANSIENT_MESSAGE_RE.test(error.message.toLowerCase());
}

/** Jittered exponential delay before the retry that follows `attempt`. */
export function backoffDelayMs(
  attempt: number,
  baseDelay: number,
  multiplier: number,
  random: () => number = Math.random,
): number {
  return baseDelay * Math.pow(multiplier, attempt - 1) * (0.5 + random());
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  multiplier?: number;
  retryOn?: (error: Error, rawError: unknown) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelay = options.baseDelay ?? 1000;
  const multiplier = options.multiplier ?? 2;
  const retryOn = options.retryOn ?? isTransient;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxAttempts || !retryOn(error, err)) throw error;

      options.onRetry?.(attempt, error);
      const delay = retryAfterMs(err) || backoffDelayMs(attempt, baseDelay, multiplier);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
