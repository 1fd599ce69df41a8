import { classifyError, PermanentError } from '../core/errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelayMs: number
    maxDelayMs: number
    /** Aborting cuts the current backoff short and rejects with the signal's reason. */
    signal?: AbortSignal
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60_000,
}

/** Exponential delay capped at maxDelayMs, plus up to 10% jitter on top. */
export function backoffDelay(
    attempt: number,
    opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>,
    random: () => number = Math.random
): number {
    const capped = Math.min(opts.baseDelayMs * 2 ** attempt, opts.maxDelayMs)
    return Math.round(capped * (1 + 0.1 * random()))
}

function pause(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason)
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            reject(signal?.reason)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    let attempt = 0
    for (;;) {
        try {
            return await fn()
        } catch (error) {
            if (attempt >= opts.maxRetries || classifyError(error) === 'permanent' || opts.signal?.aborted) throw error
            const delayMs = backoffDelay(attempt, opts)
            attempt++
            opts.onRetry?.(attempt, delayMs, error)
            await pause(delayMs, opts.signal)
        }
    }
}

export type CircuitState = 'closed' | 'open' | 'half_open'

/**
 * Call-level breaker for the model endpoint; task-level breaking lives in the protocol engine.
 * Open until the cooldown passes, then one trial call decides between closed and open again.
 */
export class CircuitBreaker {
    private consecutiveFailures = 0
    private openUntil: number | null = null

    constructor(
        private threshold = 5,
        private cooldownMs = 30_000,
        private now: () => number = Date.now
    ) {}

    get state(): CircuitState {
        if (this.openUntil === null) return 'closed'
        return this.now() < this.openUntil ? 'open' : 'half_open'
    }

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        const state = this.state
        if (state === 'open') {
            throw new PermanentError(`LLM circuit breaker is open after ${this.consecutiveFailures} consecutive failures`)
        }

        try {
            const result = await fn()
            this.consecutiveFailures = 0
            this.openUntil = null
            return result
        } catch (error) {
            this.consecutiveFailures++
            if (state === 'half_open' || this.consecutiveFailures >= this.threshold) this.openUntil = this.now() + this.cooldownMs
            throw error
        }
    }
}
