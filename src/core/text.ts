const STOPWORDS = new Set([
    'the', 'and', 'for', 'with', 'from', 'into', 'that', 'this', 'then', 'than', 'are', 'was', 'were', 'has',
    'have', 'not', 'all', 'any', 'can', 'use', 'using', 'via', 'its', 'per', 'each', 'when', 'will', 'should',
])

export function keywords(text: string): Set<string> {
    const words = text
        .toLowerCase()
        .split(/[^a-z0-9]+/)
        .filter((w) => w.length >= 3 && !STOPWORDS.has(w))
    return new Set(words)
}

export function overlap(a: Set<string>, b: Set<string>): number {
    let count = 0
    for (const word of a) {
        if (b.has(word)) count++
    }
    return count
}

export function truncate(text: string, max: number): string {
    return text.length > max ? `${text.slice(0, max)}…` : text
}
