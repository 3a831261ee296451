/**
 * CORE: Retry policy
 * Bounded exponential backoff with jitter, the same shape as the lock acquisition loop.
 */

export interface RetryPolicy {
    /** Total attempts, including the first. */
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface RetryOptions extends RetryPolicy {
    /** Return false to stop retrying and rethrow immediately. */
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
    /** Injected for tests. */
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export class RetryExhaustedError extends Error {
    constructor(public attempts: number, public lastError: unknown) {
        super(
            `Gave up after ${attempts} attempt(s): ` +
            (lastError instanceof Error ? lastError.message : String(lastError))
        );
        this.name = 'RetryExhaustedError';
    }
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    attempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 5000,
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
    return Math.min(
        policy.baseDelayMs * Math.pow(2, attempt) + random() * policy.baseDelayMs,
        policy.maxDelayMs
    );
}

/**
 * Runs `fn` until it resolves or the attempts run out.
 * @throws RetryExhaustedError with the last failure attached
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const sleep = options.sleep ?? defaultSleep;
    const attempts = Math.max(1, options.attempts);
    let lastError: unknown;

    for (let i = 0; i < attempts; i++) {
        try {
            return await fn(i + 1);
        } catch (err) {
            lastError = err;
            if (options.isRetryable && !options.isRetryable(err)) {
                throw err;
            }
            if (i === attempts - 1) break;
            const delay = backoffDelay(i, options, options.random);
            options.onRetry?.(err, i + 1, delay);
            await sleep(delay);
        }
    }

    throw new RetryExhaustedError(attempts, lastError);
}
