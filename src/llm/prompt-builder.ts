import { estimateTokens } from './token-counter.js'

interface PromptSection {
    label: string
    content: string
    priority: number // higher = more important
    fallback?: string
    pinned: boolean
}

interface SectionOptions {
    /** Shorter rendering used when the full content does not fit. */
    fallback?: string
    /** Always included, even past the budget. */
    pinned?: boolean
}

export interface PromptManifest {
    sections: { label: string; tokens: number; included: boolean; compacted: boolean }[]
    totalTokens: number
    budget: number
}

export class PromptBuilder {
    private sections: PromptSection[] = []

    add(label: string, content: string, priority = 50, options: SectionOptions = {}): this {
        this.sections.push({ label, content, priority, fallback: options.fallback, pinned: options.pinned ?? false })
        return this
    }

    build(hardCap: number): string {
        const { prompt } = this.buildWithManifest(hardCap)
        return prompt
    }

    buildWithManifest(hardCap: number): { prompt: string; manifest: PromptManifest } {
        const sorted = [...this.sections].sort((a, b) => Number(b.pinned) - Number(a.pinned) || b.priority - a.priority)

        let totalTokens = 0
        const chosen = new Map<PromptSection, { text: string; tokens: number; compacted: boolean }>()

        for (const section of sorted) {
            const tokens = estimateTokens(section.content)
            if (section.pinned || totalTokens + tokens <= hardCap) {
                chosen.set(section, { text: section.content, tokens, compacted: false })
                totalTokens += tokens
                continue
            }
            if (section.fallback !== undefined) {
                const fallbackTokens = estimateTokens(section.fallback)
                if (totalTokens + fallbackTokens <= hardCap) {
                    chosen.set(section, { text: section.fallback, tokens: fallbackTokens, compacted: true })
                    totalTokens += fallbackTokens
                }
            }
        }

        // Original order for readability
        const prompt = this.sections
            .filter((s) => chosen.has(s))
            .map((s) => `## ${s.label}\n\n${chosen.get(s)?.text ?? ''}`)
            .join('\n\n')

        const manifest: PromptManifest = {
            sections: this.sections.map((s) => {
                const pick = chosen.get(s)
                return {
                    label: s.label,
                    tokens: pick?.tokens ?? estimateTokens(s.content),
                    included: pick !== undefined,
                    compacted: pick?.compacted ?? false,
                }
            }),
            totalTokens,
            budget: hardCap,
        }

        return { prompt, manifest }
    }
}
