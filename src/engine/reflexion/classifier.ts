import type { FailureCategory } from '../../core/types.js'

export interface Classification {
    /** Set only when exactly one category and at most one failing file were found. */
    category?: FailureCategory
    categories: FailureCategory[]
    files: string[]
    causes: string[]
    ambiguous: boolean
}

const PATTERNS: ReadonlyArray<readonly [FailureCategory, RegExp]> = [
    ['missing-dependency', /command not found|Cannot find (?:module|package)|ModuleNotFoundError|No module named|is not installed/i],
    ['permission-error', /EACCES|EPERM|Permission denied|Operation not permitted/i],
    ['syntax-error', /SyntaxError|syntax error|Unexpected token/i],
    ['timeout', /\btimed out\b|ETIMEDOUT|\btimeout\b/i],
]

const FILE_REFERENCE = /([\w./-]+\.[a-z]{1,4}):\d+/gi

/**
 * Maps failure text to a root-cause category. Text matching several categories, several failing files,
 * or nothing at all is ambiguous.
 */
export function classifyFailure(text: string): Classification {
    const lines = text.split('\n')
    const categories: FailureCategory[] = []
    const causes: string[] = []

    for (const [category, pattern] of PATTERNS) {
        const line = lines.find((l) => pattern.test(l))
        if (line === undefined) continue
        categories.push(category)
        causes.push(line.trim())
    }

    const files = new Set<string>()
    for (const line of lines.filter((l) => /error/i.test(l))) {
        for (const match of line.matchAll(FILE_REFERENCE)) {
            const file = match[1]
            if (file) files.add(file)
        }
    }

    const ambiguous = categories.length !== 1 || files.size > 1
    return {
        category: ambiguous ? undefined : categories[0],
        categories,
        files: [...files],
        causes: [...causes, ...[...files].map((f) => `error in ${f}`)],
        ambiguous,
    }
}
