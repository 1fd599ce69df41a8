import type { ZodType, ZodTypeDef } from 'zod'
import { PermanentError } from '../core/errors.js'

export function extractJSON(raw: unknown): unknown | null {
    if (raw === null || raw === undefined) return null
    const str = typeof raw === 'string' ? raw : JSON.stringify(raw)

    try {
        return JSON.parse(str)
    } catch {
        // Fall through to balanced brace extraction
    }

    // Models sometimes wrap the object in prose or a code fence
    const startIdx = str.indexOf('{')
    if (startIdx === -1) return null

    let depth = 0
    let inString = false
    for (let i = startIdx; i < str.length; i++) {
        const ch = str[i]
        if (inString) {
            if (ch === '\\') i++
            else if (ch === '"') inString = false
            continue
        }
        if (ch === '"') inString = true
        else if (ch === '{') depth++
        else if (ch === '}') depth--
        if (depth === 0) {
            try {
                return JSON.parse(str.slice(startIdx, i + 1))
            } catch {
                return null
            }
        }
    }
    return null
}

export function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: string | null, what: string): T {
    const json = extractJSON(raw)
    if (json === null) throw new PermanentError(`Model returned no JSON for ${what}`)
    const result = schema.safeParse(json)
    if (!result.success) {
        throw new PermanentError(`Model returned invalid ${what}: ${result.error.issues[0]?.message ?? 'unknown'}`)
    }
    return result.data
}
