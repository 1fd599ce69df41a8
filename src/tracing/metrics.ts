import type { EventMap, ProtocolState, TypedEventEmitter } from '../core/events.js'

interface ToolMetrics {
    invocations: number
    failures: number
    totalDuration: number
}

export class MetricsCollector {
    private tools = new Map<string, ToolMetrics>()
    private transitions = new Map<ProtocolState, number>()
    private sessionTokens = { prompt: 0, completion: 0 }
    private tasks = { succeeded: 0, blocked: 0, cancelled: 0 }
    private escalations = 0
    private kbCommits = 0
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        this.listen(eventBus, 'tool:after', ({ toolName, duration, success }) => {
            const m = this.tool(toolName)
            m.invocations++
            m.totalDuration += duration
            if (!success) m.failures++
        })

        this.listen(eventBus, 'protocol:transition', ({ state }) => {
            this.transitions.set(state, (this.transitions.get(state) ?? 0) + 1)
        })

        this.listen(eventBus, 'token:usage', ({ prompt, completion }) => {
            this.sessionTokens.prompt += prompt
            this.sessionTokens.completion += completion
        })

        this.listen(eventBus, 'task:end', ({ state }) => {
            if (state === 'Succeeded') this.tasks.succeeded++
            else if (state === 'Blocked') this.tasks.blocked++
            else if (state === 'Cancelled') this.tasks.cancelled++
        })

        this.listen(eventBus, 'escalation:raised', () => {
            this.escalations++
        })

        this.listen(eventBus, 'kb:commit', () => {
            this.kbCommits++
        })
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private listen<K extends keyof EventMap>(eventBus: TypedEventEmitter, event: K, handler: (data: EventMap[K]) => void): void {
        eventBus.on(event, handler)
        this.cleanups.push(() => eventBus.off(event, handler))
    }

    private tool(name: string): ToolMetrics {
        let m = this.tools.get(name)
        if (!m) {
            m = { invocations: 0, failures: 0, totalDuration: 0 }
            this.tools.set(name, m)
        }
        return m
    }

    getSessionTokens(): { prompt: number; completion: number; total: number } {
        return {
            ...this.sessionTokens,
            total: this.sessionTokens.prompt + this.sessionTokens.completion,
        }
    }

    getToolMetrics(): Map<string, ToolMetrics> {
        return new Map(this.tools)
    }

    transitionCount(state: ProtocolState): number {
        return this.transitions.get(state) ?? 0
    }

    formatStatus(): string {
        const tokens = this.getSessionTokens()
        const lines: string[] = []
        lines.push(`Session tokens: ${tokens.total} (${tokens.prompt}p + ${tokens.completion}c)`)
        lines.push(
            `Tasks: ${this.tasks.succeeded} succeeded, ${this.tasks.blocked} blocked, ${this.tasks.cancelled} cancelled; ${this.escalations} escalations, ${this.kbCommits} persona updates`
        )

        if (this.tools.size > 0) {
            lines.push('Tool metrics:')
            for (const [name, m] of this.tools) {
                const avg = m.invocations > 0 ? Math.round(m.totalDuration / m.invocations) : 0
                lines.push(`  ${name}: ${m.invocations} calls, ${m.failures} failures, ${avg}ms avg`)
            }
        }

        if (this.transitions.size > 0) {
            lines.push('Protocol transitions:')
            for (const [state, count] of this.transitions) {
                lines.push(`  ${state}: ${count}`)
            }
        }

        return lines.join('\n')
    }
}
