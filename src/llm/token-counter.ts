// ~4 chars per token for English, ~3 for code. Budget tracking only, not billing.
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / 3.5)
}
