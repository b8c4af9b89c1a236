/**
 * Retry helpers for the network-facing collaborators. The core pipeline
 * never retries: its steps cannot fail transiently.
 */

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    backoffFactor?: number;
    /** Decides whether an error is worth another attempt. Default: never. */
    retryIf?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, "retryIf" | "onRetry">> = {
    maxRetries: 3,
    initialDelay: 1000,
    maxDelay: 30000,
    backoffFactor: 2,
};

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Call `fn` until it succeeds, `retryIf` says no, or retries run out. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const shouldRetry = opts.retryIf ?? (() => false);

    let delay = opts.initialDelay;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt > opts.maxRetries || !shouldRetry(error)) {
                throw error;
            }

            opts.onRetry?.(error, attempt, delay);
            await sleep(delay);
            delay = Math.min(delay * opts.backoffFactor, opts.maxDelay);
        }
    }
}

export class TimeoutError extends Error {
    public readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = "TimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

export interface TimeoutOptions {
    message?: string;
    /** Aborting this signal aborts the signal handed to `fn` as well. */
    signal?: AbortSignal;
}

/**
 * Race `fn` against a timer. The `AbortSignal` handed to `fn` fires when the
 * timer wins or the caller's signal aborts, so the underlying request is
 * cancelled too.
 */
export async function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    options: TimeoutOptions = {},
): Promise<T> {
    const message = options.message ?? "Operation timed out";
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(options.signal?.reason);
    let timer: NodeJS.Timeout | undefined;

    if (options.signal?.aborted) {
        controller.abort(options.signal.reason);
    } else {
        options.signal?.addEventListener("abort", onParentAbort, { once: true });
    }

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(message, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener("abort", onParentAbort);
    }
}
