/**
 * Request retry for the Entur endpoints
 * Transient failures (408, 429, 5xx, dropped connections, timeouts) are
 * retried with exponential backoff; whatever still fails leaves here as a
 * RemoteError carrying the HTTP status.
 */

import { RemoteError } from '../lib/errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Upper bound for a single delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Called before each retry with the failure and the attempt that failed */
  onRetry?: (failure: RequestFailure, attempt: number) => void;
}

/** What went wrong with one attempt */
export interface RequestFailure {
  status?: number;
  reason: string;
  transient: boolean;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

const TRANSIENT_MESSAGES = ['network', 'timeout', 'fetch failed', 'econnreset', 'socket hang up'];

/**
 * Classify a thrown value; ofetch's FetchError carries `status` when the
 * server answered.
 */
function describeFailure(error: unknown): RequestFailure {
  const status =
    error && typeof error === 'object' && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  const reason = error instanceof Error ? error.message : String(error);

  if (status !== undefined) {
    return { status, reason, transient: TRANSIENT_STATUSES.has(status) };
  }
  const message = reason.toLowerCase();
  return { reason, transient: TRANSIENT_MESSAGES.some((part) => message.includes(part)) };
}

function backoff(attempt: number, policy: RetryPolicy): number {
  if (policy.baseDelayMs === 0) {
    return 0;
  }
  const delay = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  // Up to 10% of the base delay as jitter
  return delay + Math.random() * policy.baseDelayMs * 0.1;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `request`, retrying transient failures.
 * @throws RemoteError "<operation> failed (HTTP <status>)" or
 *   "<operation> failed (<message>)" once attempts run out or the failure
 *   is not transient
 */
export async function withRetry<T>(
  operation: string,
  request: () => Promise<T>,
  policy: Partial<RetryPolicy> = {}
): Promise<T> {
  const full: RetryPolicy = { ...DEFAULT_POLICY, ...policy };

  for (let attempt = 1; ; attempt++) {
    try {
      return await request();
    } catch (error) {
      const failure = describeFailure(error);

      if (!failure.transient || attempt > full.maxRetries) {
        const detail = failure.status !== undefined ? `HTTP ${failure.status}` : failure.reason;
        throw new RemoteError(`${operation} failed (${detail})`, { cause: error, status: failure.status });
      }

      full.onRetry?.(failure, attempt);
      await sleep(backoff(attempt, full));
    }
  }
}
