/**
 * ShelfPort resilience helpers: catalog request timeouts, retry with
 * backoff, network error classification and shutdown hooks.
 */

// =============================================================================
// Errors
// =============================================================================

/**
 * The catalog answered with a status we cannot use
 */
export class HttpError extends Error {
  readonly status: number;
  /** Wait the server asked for in its Retry-After header */
  readonly retryAfterMs: number | null;

  constructor(status: number, url: string, retryAfterMs: number | null = null) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }

  static fromResponse(resp: Response, url: string): HttpError {
    return new HttpError(resp.status, url, parseRetryAfter(resp.headers.get('retry-after')));
  }
}

/**
 * Retry-After holds either delay-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

const NETWORK_ERROR_MARKERS = [
  'econnrefused',
  'econnreset',
  'etimedout',
  'epipe',
  'enetunreach',
  'enotfound',
  'eai_again',
  'fetch failed',
  'socket hang up',
  'timed out',
];

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

/**
 * The catalog never answered: refused or dropped connections, DNS
 * failures, timeouts. Node's fetch hides the socket code in `cause`.
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const text = `${error.message} ${causeCode(error)}`.toLowerCase();
  return NETWORK_ERROR_MARKERS.some(marker => text.includes(marker));
}

function causeCode(error: Error): string {
  const { cause } = error;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return '';
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) return RETRYABLE_STATUSES.has(error.status);
  return isNetworkError(error);
}

// =============================================================================
// Requests
// =============================================================================

/**
 * fetch() that gives up after `timeout` ms with a "timed out" error
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number } = {}
): Promise<Response> {
  const { timeout = 15000, ...init } = options;
  const signal = AbortSignal.timeout(timeout);

  try {
    return await fetch(url, { ...init, signal });
  } catch (error) {
    if (signal.aborted) {
      throw new Error(`Request to ${url} timed out after ${timeout}ms`, { cause: error });
    }
    throw error;
  }
}

export interface RetryOptions {
  /** Retries after the first attempt (default 3) */
  maxRetries?: number;
  /** Wait before the first retry (default 1000ms) */
  baseDelay?: number;
  /** Longest wait between attempts (default 30000ms) */
  maxDelay?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown, attempt: number) => boolean;
  label?: string;
}

/**
 * Run `fn` until it resolves, retrying errors `retryOn` accepts. The last
 * error is rethrown once retries run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, retryOn = isRetryableError, label = 'Retry' } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !retryOn(error, attempt)) {
        throw error;
      }
      const waitMs = retryDelay(error, attempt, options);
      console.log(`[${label}] Attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${waitMs}ms`);
      await sleep(waitMs);
    }
  }
}

/**
 * Wait after failed attempt `attempt` (0-based): exponential backoff plus up
 * to 10% jitter, at least the server's Retry-After, at most `maxDelay`.
 */
export function retryDelay(
  error: unknown,
  attempt: number,
  options: RetryOptions = {},
  random: () => number = Math.random
): number {
  const { baseDelay = 1000, maxDelay = 30000, backoffMultiplier = 2 } = options;
  const backoff = baseDelay * backoffMultiplier ** attempt;
  const requested = error instanceof HttpError ? error.retryAfterMs ?? 0 : 0;
  const delay = Math.max(backoff, requested) * (1 + 0.1 * random());
  return Math.round(Math.min(delay, maxDelay));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Shutdown
// =============================================================================

const shutdownHooks: Array<() => void> = [];

/**
 * Run `hook` when the process is stopped or crashes, e.g. to close the
 * database so its WAL is checkpointed.
 */
export function registerCleanup(hook: () => void): void {
  if (shutdownHooks.push(hook) > 1) return;

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => shutdown(signal, 0));
  }
  process.once('uncaughtException', error => {
    console.error('[ShelfPort] Uncaught exception:', error);
    shutdown('uncaughtException', 1);
  });
  process.once('unhandledRejection', reason => {
    console.error('[ShelfPort] Unhandled rejection:', reason);
    shutdown('unhandledRejection', 1);
  });
}

function shutdown(reason: string, exitCode: number): never {
  console.log(`[ShelfPort] Shutting down (${reason})`);
  for (const hook of shutdownHooks.splice(0)) {
    try {
      hook();
    } catch (error) {
      console.error('[ShelfPort] Cleanup failed:', error);
    }
  }
  process.exit(exitCode);
}
