import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/** Request rate per LLM source; Ollama is local */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },
};
const DEFAULT_RATE_LIMIT = { tokensPerSecond: 5, maxBurst: 5 };

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    /** Per-attempt timeout in ms */
    timeout?: number;
    /** Rate-limit bucket: "openai", "ollama" */
    source?: string;
    signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * Failed request. `status` is 0 for network failures, timeouts and aborts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    /** Retries after the first attempt for retryable failures */
    maxRetries?: number;
}

type Attempt<T> =
    | { ok: true; response: HttpResponse<T> }
    | { ok: false; error: HttpError; retry: boolean; retryAfterMs: number | null };

/**
 * fetch wrapper shared by the LLM providers: per-source rate limiting, retries
 * with backoff on 429/5xx and dropped connections, a per-attempt timeout and
 * caller cancellation.
 */
export class HttpClient {
    private readonly buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 3;
        this.userAgent = `citelens/${options?.version ?? '1.0.0'}`;
    }

    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const { method = 'GET', headers = {}, body, timeout = this.defaultTimeout, source = 'default', signal } = options;

        throwIfAborted(signal, url);
        await this.bucketFor(source).acquire();

        const init: RequestInit = { method, headers: { 'User-Agent': this.userAgent, ...headers } };
        if (typeof body === 'object') {
            init.body = JSON.stringify(body);
            init.headers = { 'Content-Type': 'application/json', ...init.headers };
        } else if (body) {
            init.body = body;
        }

        for (let attempt = 0; ; attempt++) {
            const outcome = await this.attempt<T>(url, init, timeout, signal);
            if (outcome.ok) return outcome.response;
            if (!outcome.retry || attempt >= this.maxRetries) throw outcome.error;

            const backoffMs = outcome.retryAfterMs ?? backoffDelay(attempt);
            getLogger().warn(
                { status: outcome.error.status, error: outcome.error.message, attempt: attempt + 1, backoffMs, url },
                'Retryable HTTP failure, backing off'
            );
            await sleep(backoffMs, signal);
            throwIfAborted(signal, url);
        }
    }

    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    async post<T = unknown>(
        url: string,
        body: string | object,
        options?: Omit<HttpRequestOptions, 'method' | 'body'>
    ): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * One fetch with its own timeout. Failures come back as values so the
     * retry loop decides; a caller abort is thrown straight through.
     */
    private async attempt<T>(url: string, init: RequestInit, timeout: number, signal?: AbortSignal): Promise<Attempt<T>> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            const response = await fetch(url, { ...init, signal: controller.signal });
            const data = await readBody<T>(response);

            if (response.ok) {
                return { ok: true, response: { status: response.status, headers: headerRecord(response.headers), data, ok: true } };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            return {
                ok: false,
                error: new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data),
                retry: retryable,
                retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
            };
        } catch (error) {
            throwIfAborted(signal, url);

            if (error instanceof Error && error.name === 'AbortError') {
                return {
                    ok: false,
                    error: new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true),
                    retry: false,
                    retryAfterMs: null,
                };
            }

            const code = networkErrorCode(error);
            const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);
            return {
                ok: false,
                error: new HttpError(`Network error: ${error instanceof Error ? error.message : String(error)}`, 0, retryable),
                retry: retryable,
                retryAfterMs: null,
            };
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    private bucketFor(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const limit = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(limit.tokensPerSecond, limit.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}

// ─── Helpers ─────────────────────────────────────────────

async function readBody<T>(response: Response): Promise<T> {
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
        return (await response.json()) as T;
    }
    return (await response.text()) as T;
}

function headerRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, key) => {
        record[key] = value;
    });
    return record;
}

/**
 * Node socket errors carry `code` themselves; fetch wraps them as `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    let current: unknown = error;
    for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
        if ('code' in current && typeof current.code === 'string') return current.code;
        current = current.cause;
    }
    return undefined;
}

/** Seconds or an HTTP date, in ms from now */
function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

/** Exponential backoff with up to 50% jitter */
function backoffDelay(attempt: number): number {
    const exponential = INITIAL_BACKOFF_MS * Math.pow(2, attempt);
    return Math.min(MAX_BACKOFF_MS, exponential + Math.random() * exponential * 0.5);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });

        function done(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
    });
}

function throwIfAborted(signal: AbortSignal | undefined, url: string): void {
    if (signal?.aborted) {
        throw new HttpError(`Request aborted: ${url}`, 0, false);
    }
}
