import { describe, expect, it, vi } from 'vitest'
import { PermanentError, TransientError } from '../../../src/core/errors.js'
import { backoffDelay, CircuitBreaker, withRetry } from '../../../src/llm/retry.js'

const FAST = { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 5 }

describe('withRetry', () => {
    it('returns on first success', async () => {
        const fn = vi.fn(() => Promise.resolve('ok'))
        expect(await withRetry(fn, FAST)).toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries on transient error', async () => {
        const fn = vi.fn().mockRejectedValueOnce(new TransientError('timeout')).mockResolvedValueOnce('recovered')
        expect(await withRetry(fn, FAST)).toBe('recovered')
        expect(fn).toHaveBeenCalledTimes(2)
    })

    it('retries on a retryable HTTP status', async () => {
        const fn = vi.fn().mockRejectedValueOnce({ status: 503 }).mockResolvedValueOnce('up')
        expect(await withRetry(fn, FAST)).toBe('up')
    })

    it('throws immediately on permanent error', async () => {
        const fn = vi.fn(() => Promise.reject(new PermanentError('invalid key')))
        await expect(withRetry(fn, FAST)).rejects.toThrow('invalid key')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('throws after max retries', async () => {
        const fn = vi.fn(() => Promise.reject(new TransientError('timeout')))
        await expect(withRetry(fn, { ...FAST, maxRetries: 2 })).rejects.toThrow('timeout')
        expect(fn).toHaveBeenCalledTimes(3)
    })

    it('reports each retry before waiting', async () => {
        const onRetry = vi.fn()
        const fn = vi.fn().mockRejectedValueOnce({ status: 429 }).mockRejectedValueOnce({ status: 502 }).mockResolvedValueOnce('ok')

        expect(await withRetry(fn, { ...FAST, onRetry })).toBe('ok')
        expect(onRetry.mock.calls.map(([attempt, , error]) => [attempt, error])).toEqual([
            [1, { status: 429 }],
            [2, { status: 502 }],
        ])
    })

    it('stops waiting as soon as the signal aborts', async () => {
        const controller = new AbortController()
        const fn = vi.fn(() => Promise.reject(new TransientError('timeout')))

        await expect(
            withRetry(fn, {
                maxRetries: 3,
                baseDelayMs: 60_000,
                maxDelayMs: 60_000,
                signal: controller.signal,
                onRetry: () => controller.abort(new Error('stop')),
            })
        ).rejects.toThrow('stop')
        expect(fn).toHaveBeenCalledTimes(1)
    })
})

describe('backoffDelay', () => {
    it('doubles per attempt', () => {
        expect(backoffDelay(2, { baseDelayMs: 1000, maxDelayMs: 60_000 }, () => 0)).toBe(4000)
    })

    it('adds at most 10% jitter', () => {
        expect(backoffDelay(2, { baseDelayMs: 1000, maxDelayMs: 60_000 }, () => 1)).toBe(4400)
    })

    it('never exceeds the cap before jitter', () => {
        expect(backoffDelay(10, { baseDelayMs: 1000, maxDelayMs: 5000 }, () => 0)).toBe(5000)
    })
})

describe('CircuitBreaker', () => {
    it('starts in closed state', () => {
        expect(new CircuitBreaker().state).toBe('closed')
    })

    it('opens after threshold failures and rejects without calling', async () => {
        const breaker = new CircuitBreaker(2, 100, () => 0)
        const fail = () => Promise.reject(new Error('fail'))

        await expect(breaker.execute(fail)).rejects.toThrow('fail')
        await expect(breaker.execute(fail)).rejects.toThrow('fail')
        expect(breaker.state).toBe('open')

        const fn = vi.fn(() => Promise.resolve('never'))
        await expect(breaker.execute(fn)).rejects.toThrow('LLM circuit breaker is open')
        expect(fn).not.toHaveBeenCalled()
    })

    it('half-opens after the cooldown and closes on success', async () => {
        let now = 1_000
        const breaker = new CircuitBreaker(1, 50, () => now)
        await expect(breaker.execute(() => Promise.reject(new Error('x')))).rejects.toThrow('x')
        expect(breaker.state).toBe('open')

        now += 51
        expect(await breaker.execute(() => Promise.resolve('ok'))).toBe('ok')
        expect(breaker.state).toBe('closed')
    })

    it('reopens when the trial call fails', async () => {
        let now = 0
        const breaker = new CircuitBreaker(3, 50, () => now)
        for (let i = 0; i < 3; i++) await expect(breaker.execute(() => Promise.reject(new Error('x')))).rejects.toThrow('x')
        now = 100
        await expect(breaker.execute(() => Promise.reject(new Error('again')))).rejects.toThrow('again')
        expect(breaker.state).toBe('open')
    })
})
