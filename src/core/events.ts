import type { EscalationReason, MissionStatus, TaskId, TaskState } from './types.js'

export type ProtocolState =
    | 'Detected'
    | 'Categorized'
    | 'HypothesisFormed'
    | 'CorrectiveTaskInjected'
    | 'Retrying'
    | 'Resolved'
    | 'CircuitBreakerTripped'
    | 'GapIdentified'
    | 'MetaTaskEscalated'
    | 'Researching'
    | 'HeuristicSynthesized'
    | 'KnowledgeBaseUpdated'
    | 'Requeued'

export interface ProtocolTransition {
    missionId: string
    taskId: TaskId
    tier: 'reflexion' | 'meta-cognition'
    state: ProtocolState
    at: string
    detail?: string
}

export type EventMap = {
    'mission:start': { missionId: string; primeDirective: string }
    'mission:end': { missionId: string; status: MissionStatus }
    'task:start': { missionId: string; taskId: TaskId; description: string }
    'task:end': { missionId: string; taskId: TaskId; state: TaskState; duration: number }
    'tool:before': { missionId: string; taskId: TaskId; toolName: string; args: unknown }
    'tool:after': { missionId: string; taskId: TaskId; toolName: string; duration: number; success: boolean }
    'protocol:transition': ProtocolTransition
    'tot:explored': { missionId: string; taskId: TaskId; depth: number; explored: number; executed: number }
    'kb:commit': { name: string; version: number }
    'escalation:raised': { missionId: string; taskId: TaskId; reason: EscalationReason }
    'token:usage': { prompt: number; completion: number }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        const existing = handlers[event]
        const set = existing ?? new Set<EventHandler<EventMap[K]>>()
        set.add(handler)
        handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: HandlerSets[K] = this.handlers[event]
        set?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: HandlerSets[K] = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
