import { describe, expect, it } from 'vitest'
import { estimateTokens } from '../../../src/llm/token-counter.js'

describe('estimateTokens', () => {
    it('rounds up at 3.5 characters per token', () => {
        expect(estimateTokens('')).toBe(0)
        expect(estimateTokens('Hello world')).toBe(4)
        expect(estimateTokens('x'.repeat(35))).toBe(10)
    })
})
