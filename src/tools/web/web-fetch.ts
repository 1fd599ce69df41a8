import TurndownService from 'turndown'
import { z } from 'zod'
import type { Tool } from '../types.js'

const turndown = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
})
turndown.remove(['script', 'style', 'nav', 'footer', 'header', 'aside', 'iframe', 'noscript'])

const cache = new Map<string, { content: string; timestamp: number }>()
const CACHE_TTL = 15 * 60 * 1000
const MAX_CACHE_SIZE = 100

function getCached(url: string): string | null {
    const entry = cache.get(url)
    if (!entry) return null
    if (Date.now() - entry.timestamp > CACHE_TTL) {
        cache.delete(url)
        return null
    }
    return entry.content
}

function setCache(url: string, content: string): void {
    const now = Date.now()
    if (cache.size >= MAX_CACHE_SIZE) {
        for (const [key, entry] of cache) {
            if (now - entry.timestamp > CACHE_TTL) cache.delete(key)
        }
    }
    if (cache.size >= MAX_CACHE_SIZE) {
        const oldest = cache.keys().next().value
        if (oldest !== undefined) cache.delete(oldest)
    }
    cache.set(url, { content, timestamp: now })
}

const HttpGetInput = z.object({
    url: z.string().url().describe('URL to fetch'),
    maxLength: z.number().int().positive().optional().describe('Max response length in chars (default: 50000)'),
    raw: z.boolean().optional().describe('Return raw HTML without markdown conversion (default: false)'),
})

type HttpGetInput = z.infer<typeof HttpGetInput>

export const httpGetTool: Tool<HttpGetInput> = {
    name: 'http_get',
    description: 'Perform an HTTP GET request and return the body, converting HTML to Markdown',
    parameters: HttpGetInput,
    requiredPermission: 'web',
    async execute(input, ctx) {
        const cached = getCached(input.url)
        if (cached) return cached

        const response = await fetch(input.url, {
            headers: { 'User-Agent': 'Recourse/0.1 (mission runner)' },
            signal: ctx.signal,
        })

        if (!response.ok) {
            return { ok: false, output: `HTTP ${response.status}: ${response.statusText}`, exitCode: response.status }
        }

        const contentType = response.headers.get('content-type') ?? ''
        let text = await response.text()

        if (!input.raw && contentType.includes('text/html')) {
            text = turndown.turndown(text)
        }

        const maxLen = input.maxLength ?? 50000
        if (text.length > maxLen) {
            text = `${text.slice(0, maxLen)}\n\n[Content truncated at ${maxLen} chars]`
        }

        setCache(input.url, text)
        return text
    },
}

/** Exported for testing */
export { cache, CACHE_TTL, MAX_CACHE_SIZE }
