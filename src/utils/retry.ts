/**
 * Retry Utility
 *
 * Two kinds of waiting live here:
 * - withRetry: exponential backoff with jitter for calls outside the CRM executor
 *   (file uploads to a presigned target)
 * - resolveWaitHint: how long the CRM asked us to back off after a 429
 *
 * All sleeping goes through a Clock so tests can run without real delays.
 */

import { z } from 'zod';
import { HttpStatusError } from './errors.js';
import { tryParseJson } from './json.js';

export interface Clock {
    now(): Date;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts: number;
    /** Initial delay in milliseconds (default: 1000) */
    initialDelay: number;
    /** Maximum delay cap in milliseconds (default: 30000) */
    maxDelay: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier: number;
    /** Function to determine if error is retryable (default: isDefaultRetryable) */
    isRetryable?: (error: Error) => boolean;
    /** Callback on each retry attempt */
    onRetry?: (attempt: number, error: Error, nextDelay: number) => void;
    /** Operation name for logging */
    operationName?: string;
    clock?: Clock;
}

const DEFAULT_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    initialDelay: 1000,
    maxDelay: 30000,
    backoffMultiplier: 2,
};

/**
 * Calculate delay with exponential backoff and jitter
 */
function calculateDelay(
    attempt: number,
    initialDelay: number,
    maxDelay: number,
    backoffMultiplier: number
): number {
    const exponentialDelay = initialDelay * Math.pow(backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, maxDelay);
    // ±25% jitter
    const jitter = cappedDelay * (0.75 + Math.random() * 0.5);
    return Math.floor(jitter);
}

/**
 * Extract HTTP status code from error if available
 */
export function getErrorStatusCode(error: Error): number | null {
    if (error instanceof HttpStatusError) {
        return error.status;
    }

    const statusMatch = error.message.match(/status[:\s]+(\d{3})/i);
    if (statusMatch) {
        return parseInt(statusMatch[1], 10);
    }

    return null;
}

/**
 * Default retryable error detector
 * Retries on: network errors, timeouts, 429, 5xx
 * Does NOT retry on: other 4xx
 */
export function isDefaultRetryable(error: Error): boolean {
    const message = error.message.toLowerCase();

    if (
        message.includes('network') ||
        message.includes('econnreset') ||
        message.includes('econnrefused') ||
        message.includes('etimedout') ||
        message.includes('socket hang up') ||
        message.includes('fetch failed')
    ) {
        return true;
    }

    if (message.includes('timeout') || message.includes('timed out') || error.name === 'TimeoutError') {
        return true;
    }

    const statusCode = getErrorStatusCode(error);
    if (statusCode) {
        if (statusCode === 429) return true;
        if (statusCode >= 500 && statusCode < 600) return true;
        if (statusCode >= 400 && statusCode < 500) return false;
    }

    return false;
}

/**
 * Execute a function with retry logic
 *
 * @example
 * ```typescript
 * const ok = await withRetry(
 *   () => postToUploadTarget(),
 *   { maxAttempts: 3, operationName: 'File upload' }
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: Partial<RetryOptions> = {}
): Promise<T> {
    const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
    const { maxAttempts, initialDelay, maxDelay, backoffMultiplier, isRetryable, onRetry } = opts;
    const clock = opts.clock ?? systemClock;
    const opName = opts.operationName || 'operation';

    let lastError: Error = new Error(`${opName} was not attempted`);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (error) {
            lastError = error instanceof Error ? error : new Error(String(error));

            const shouldRetry = isRetryable ? isRetryable(lastError) : isDefaultRetryable(lastError);
            if (!shouldRetry || attempt >= maxAttempts) {
                throw lastError;
            }

            const delay = calculateDelay(attempt, initialDelay, maxDelay, backoffMultiplier);
            if (onRetry) {
                onRetry(attempt, lastError, delay);
            }

            await clock.sleep(delay);
        }
    }

    throw lastError;
}

// ============================================================================
// Rate-limit wait hints
// ============================================================================

/** Fallback wait when a 429 carries no usable hint. */
export const DEFAULT_WAIT_SECONDS = 5;

export type WaitHintSource = 'retry-after' | 'ratelimit' | 'body' | 'default';

export interface WaitHint {
    seconds: number;
    source: WaitHintSource;
}

const RateResetBodySchema = z.object({
    rate_reset: z.union([z.number(), z.string()]),
});

/** A hint only counts when it is a positive, finite number of seconds. */
function positiveSeconds(value: unknown): number | null {
    let parsed = Number.NaN;
    if (typeof value === 'number') {
        parsed = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
        parsed = Number(value.trim());
    }
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

/**
 * Read the `reset` key from a structured rate-limit header such as
 * `limit=240, remaining=0, reset=2.5`. Text after `;` in a value is ignored.
 */
export function parseRateLimitReset(header: string): number | null {
    for (const segment of header.split(',')) {
        const separator = segment.indexOf('=');
        if (separator === -1) continue;

        const key = segment.slice(0, separator).trim().toLowerCase();
        if (key !== 'reset') continue;

        const value = segment.slice(separator + 1).split(';')[0];
        return positiveSeconds(value);
    }
    return null;
}

function bodyRateReset(bodyText: string): number | null {
    if (!bodyText) return null;
    const parsed = tryParseJson(bodyText);
    if (!parsed.ok) return null;
    const body = RateResetBodySchema.safeParse(parsed.value);
    return body.success ? positiveSeconds(body.data.rate_reset) : null;
}

/**
 * Resolve how long to wait after a 429, checking `retry-after`, then the
 * `ratelimit` header's reset, then a `rate_reset` in the body.
 */
export function resolveWaitHint(headers: Headers, bodyText: string): WaitHint {
    const retryAfter = positiveSeconds(headers.get('retry-after'));
    if (retryAfter !== null) {
        return { seconds: retryAfter, source: 'retry-after' };
    }

    const rateLimit = headers.get('ratelimit');
    if (rateLimit) {
        const reset = parseRateLimitReset(rateLimit);
        if (reset !== null) {
            return { seconds: reset, source: 'ratelimit' };
        }
    }

    const fromBody = bodyRateReset(bodyText);
    if (fromBody !== null) {
        return { seconds: fromBody, source: 'body' };
    }

    return { seconds: DEFAULT_WAIT_SECONDS, source: 'default' };
}
