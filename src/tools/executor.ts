import { logger } from '../utils/logger.js';
import { resolveWaitHint, systemClock, type Clock } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import { tryParseJson } from '../utils/json.js';

/**
 * Rate-aware request executor for the CRM.
 *
 * - 429: wait the hinted time plus a buffer, then send the same request again
 * - network failure or timeout: wait a fixed interval and send it again
 * - any other non-2xx: returned as `rejected`, never thrown
 *
 * Both retry loops are unbounded unless a ceiling is configured. Batch runs
 * prefer finishing late to finishing early with holes.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT';

/** `read` calls surface an unparseable 2xx body; `write` calls treat it as success. */
export type RequestKind = 'read' | 'write';

export interface ApiRequest {
    method: HttpMethod;
    /** Path under the base URL (`/lead/abc/`) or an absolute URL */
    path: string;
    query?: Record<string, string | number | undefined>;
    body?: unknown;
    kind?: RequestKind;
}

export type ExecuteResult =
    | { outcome: 'ok'; status: number; body: unknown }
    | { outcome: 'malformed'; status: number }
    | { outcome: 'rejected'; status: number; message: string };

export type RateSignal =
    | { kind: 'ok' }
    | { kind: 'rate_limited'; waitMs: number }
    | { kind: 'transient'; message: string }
    | { kind: 'permanent'; status: number };

export interface ExecutorOptions {
    baseUrl: string;
    apiKey: string;
    /** Account name used in log lines */
    label?: string;
    clock?: Clock;
    fetchFn?: typeof fetch;
    /** Added to every rate-limit wait so the retry lands after the window resets */
    bufferMs?: number;
    networkRetryMs?: number;
    timeoutMs?: number;
    maxRateLimitRetries?: number;
    maxNetworkRetries?: number;
}

const DEFAULT_BUFFER_MS = 500;
const DEFAULT_NETWORK_RETRY_MS = 5000;
const DEFAULT_TIMEOUT_MS = 60000;

/** Interpret a completed response. */
export function readRateSignal(status: number, headers: Headers, bodyText: string, bufferMs: number = DEFAULT_BUFFER_MS): RateSignal {
    if (status === 429) {
        const hint = resolveWaitHint(headers, bodyText);
        return { kind: 'rate_limited', waitMs: Math.round(hint.seconds * 1000) + bufferMs };
    }
    if (status < 200 || status >= 300) {
        return { kind: 'permanent', status };
    }
    return { kind: 'ok' };
}

export class RequestExecutor {
    private readonly baseUrl: string;
    private readonly authorization: string;
    private readonly label: string;
    private readonly clock: Clock;
    private readonly fetchFn: typeof fetch;
    private readonly bufferMs: number;
    private readonly networkRetryMs: number;
    private readonly timeoutMs: number;
    private readonly maxRateLimitRetries: number;
    private readonly maxNetworkRetries: number;

    constructor(options: ExecutorOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.authorization = `Basic ${Buffer.from(`${options.apiKey}:`).toString('base64')}`;
        this.label = options.label ?? 'crm';
        this.clock = options.clock ?? systemClock;
        this.fetchFn = options.fetchFn ?? fetch;
        this.bufferMs = options.bufferMs ?? DEFAULT_BUFFER_MS;
        this.networkRetryMs = options.networkRetryMs ?? DEFAULT_NETWORK_RETRY_MS;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.maxRateLimitRetries = options.maxRateLimitRetries ?? Number.POSITIVE_INFINITY;
        this.maxNetworkRetries = options.maxNetworkRetries ?? Number.POSITIVE_INFINITY;
    }

    buildUrl(request: Pick<ApiRequest, 'path' | 'query'>): string {
        const url = /^https?:\/\//.test(request.path)
            ? new URL(request.path)
            : new URL(`${this.baseUrl}/${request.path.replace(/^\/+/, '')}`);

        for (const [key, value] of Object.entries(request.query ?? {})) {
            if (value !== undefined) {
                url.searchParams.set(key, String(value));
            }
        }
        return url.toString();
    }

    async execute(request: ApiRequest): Promise<ExecuteResult> {
        const url = this.buildUrl(request);
        const kind: RequestKind = request.kind ?? (request.method === 'GET' ? 'read' : 'write');
        const target = `${this.label} ${request.method} ${request.path}`;

        const headers: Record<string, string> = {
            Authorization: this.authorization,
            Accept: 'application/json',
        };
        let body: string | undefined;
        if (request.body !== undefined) {
            headers['Content-Type'] = 'application/json';
            body = JSON.stringify(request.body);
        }

        let rateLimitedCount = 0;
        let networkFailures = 0;

        for (;;) {
            const sent = await this.send(url, { method: request.method, headers, body });
            if (!sent.ok) {
                networkFailures++;
                if (networkFailures > this.maxNetworkRetries) {
                    logger.error(`${target} failed after ${networkFailures} network errors: ${sent.signal.message}`);
                    return { outcome: 'rejected', status: 0, message: sent.signal.message };
                }
                logger.warn(`${target} request failed: ${sent.signal.message}. Retrying in ${(this.networkRetryMs / 1000).toFixed(1)}s`);
                await this.clock.sleep(this.networkRetryMs);
                continue;
            }

            const { status, headers: responseHeaders, text } = sent;
            const signal = readRateSignal(status, responseHeaders, text, this.bufferMs);

            if (signal.kind === 'rate_limited') {
                rateLimitedCount++;
                if (rateLimitedCount > this.maxRateLimitRetries) {
                    logger.error(`${target} still rate limited after ${this.maxRateLimitRetries} retries`);
                    return { outcome: 'rejected', status, message: 'rate limit retries exhausted' };
                }
                logger.debug(`${target} rate limited, waiting ${(signal.waitMs / 1000).toFixed(1)}s`);
                await this.clock.sleep(signal.waitMs);
                continue;
            }

            if (signal.kind === 'permanent') {
                const excerpt = text.slice(0, 200);
                logger.warn(`API error ${status} on ${target}`, { metadata: { body: excerpt } });
                return { outcome: 'rejected', status, message: excerpt || `HTTP ${status}` };
            }

            if (text.trim() === '') {
                return { outcome: 'ok', status, body: undefined };
            }

            const parsed = tryParseJson(text);
            if (parsed.ok) {
                return { outcome: 'ok', status, body: parsed.value };
            }

            if (kind === 'write') {
                logger.debug(`${target} returned a non-JSON body; treating the write as done`);
                return { outcome: 'ok', status, body: undefined };
            }
            logger.warn(`${target} returned a body that is not JSON`);
            return { outcome: 'malformed', status };
        }
    }

    private async send(
        url: string,
        init: { method: HttpMethod; headers: Record<string, string>; body?: string },
    ): Promise<{ ok: true; status: number; headers: Headers; text: string } | { ok: false; signal: Extract<RateSignal, { kind: 'transient' }> }> {
        try {
            const response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
            const text = await response.text();
            return { ok: true, status: response.status, headers: response.headers, text };
        } catch (error) {
            return { ok: false, signal: { kind: 'transient', message: errorMessage(error) } };
        }
    }
}
