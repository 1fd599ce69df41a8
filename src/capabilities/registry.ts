import type { CapabilityManifestEntry } from '../core/types.js'
import { keywords, overlap } from '../core/text.js'
import type { Logger } from '../logger/index.js'

export type HealthCheck = () => Promise<boolean>

export interface CapabilityResolution {
    entries: CapabilityManifestEntry[]
    /** True when nothing at or above the minimum confidence answers the hint. */
    gap: boolean
    bestConfidence: number
}

function clamp(value: number): number {
    return Math.min(1, Math.max(0, value))
}

function entryKeywords(entry: CapabilityManifestEntry): Set<string> {
    return keywords(`${entry.toolName.replace(/_/g, ' ')} ${entry.description}`)
}

/**
 * The agent's self-model of what it can do. Dispatch through the ToolGateway is refused for any tool
 * without an entry here, so nothing the reasoning model invents can run.
 */
export class CapabilityRegistry {
    private entries = new Map<string, CapabilityManifestEntry>()
    private healthChecks = new Map<string, HealthCheck>()

    constructor(
        private logger: Logger,
        private now: () => Date = () => new Date()
    ) {}

    register(entry: CapabilityManifestEntry, healthCheck?: HealthCheck): void {
        this.entries.set(entry.toolName, { ...entry, confidenceScore: clamp(entry.confidenceScore) })
        if (healthCheck) this.healthChecks.set(entry.toolName, healthCheck)
        else this.healthChecks.delete(entry.toolName)
        this.logger.debug({ tool: entry.toolName, confidence: entry.confidenceScore }, 'capability:registered')
    }

    get(toolName: string): CapabilityManifestEntry | undefined {
        const entry = this.entries.get(toolName)
        return entry ? { ...entry } : undefined
    }

    has(toolName: string): boolean {
        return this.entries.has(toolName)
    }

    list(): CapabilityManifestEntry[] {
        return [...this.entries.values()].map((e) => ({ ...e }))
    }

    lookup(capabilityHint: string): CapabilityManifestEntry[] {
        const exact = this.entries.get(capabilityHint)
        if (exact) return [{ ...exact }]

        const wanted = keywords(capabilityHint)
        return [...this.entries.values()]
            .map((entry) => ({ entry, score: overlap(wanted, entryKeywords(entry)) }))
            .filter((m) => m.score > 0)
            .sort((a, b) => b.score - a.score || b.entry.confidenceScore - a.entry.confidenceScore)
            .map((m) => ({ ...m.entry }))
    }

    resolve(capabilityHint: string, minConfidence: number): CapabilityResolution {
        const entries = this.lookup(capabilityHint)
        const bestConfidence = entries.reduce((best, e) => Math.max(best, e.confidenceScore), 0)
        return {
            entries,
            gap: entries.every((e) => e.confidenceScore < minConfidence),
            bestConfidence,
        }
    }

    relevantTo(description: string): CapabilityManifestEntry[] {
        const wanted = keywords(description)
        const scored = [...this.entries.values()].map((entry) => ({ entry, score: overlap(wanted, entryKeywords(entry)) }))
        const relevant = scored.filter((m) => m.score > 0)
        const pool = relevant.length > 0 ? relevant : scored
        return pool
            .sort((a, b) => b.score - a.score || b.entry.confidenceScore - a.entry.confidenceScore)
            .map((m) => ({ ...m.entry }))
    }

    adjustConfidence(toolName: string, delta: number): number | undefined {
        const entry = this.entries.get(toolName)
        if (!entry) return undefined
        entry.confidenceScore = clamp(entry.confidenceScore + delta)
        this.logger.debug({ tool: toolName, delta, confidence: entry.confidenceScore }, 'capability:confidence')
        return entry.confidenceScore
    }

    async verify(toolName: string): Promise<boolean> {
        const entry = this.entries.get(toolName)
        if (!entry) return false

        const healthCheck = this.healthChecks.get(toolName)
        let healthy = true
        if (healthCheck) {
            try {
                healthy = await healthCheck()
            } catch (error) {
                this.logger.warn({ tool: toolName, error }, 'capability:health-check-failed')
                healthy = false
            }
        }

        if (healthy) entry.verifiedAt = this.now().toISOString()
        return healthy
    }
}
