export type TaskId = number

export type MissionStatus = 'active' | 'succeeded' | 'failed' | 'blocked' | 'cancelled'

export interface Mission {
    id: string
    primeDirective: string
    createdAt: string
    status: MissionStatus
}

export type TaskState = 'Pending' | 'Running' | 'Succeeded' | 'Failed' | 'Blocked' | 'Cancelled'

export type TaskKind = 'planned' | 'corrective'

export type EscalationTier = 'none' | 'reflexion' | 'meta-cognition'

export type ComplexityTag = 'architecture-selection' | 'technology-choice' | 'large-refactor'

export const COMPLEXITY_TAGS: readonly ComplexityTag[] = ['architecture-selection', 'technology-choice', 'large-refactor']

export type TerminalBlockReason = 'CircuitBreakerTripped' | 'ResearchExhausted' | 'KnowledgeBaseConflict' | 'ToolUnauthorized' | 'SearchExhausted'

/** Why an operator hears about a task: it is terminally blocked, or an attempt stopped on an unexpected error. */
export type EscalationReason = TerminalBlockReason | 'AttemptCrashed'

export type BlockedReason = 'pending-research' | TerminalBlockReason

export interface Artifact {
    path: string
    content?: string
}

export interface Task {
    id: TaskId
    missionId: string
    description: string
    dependencies: TaskId[]
    state: TaskState
    retryCount: number
    escalationTier: EscalationTier
    result?: string
    kind: TaskKind
    tags: string[]
    requiredCapabilities: string[]
    parentTaskId?: TaskId
    awaitingCorrection?: TaskId
    blockedReason?: BlockedReason
    researchAttempts: number
    /** Capabilities whose gap a committed heuristic has answered; not re-raised for this task. */
    resolvedGaps: string[]
    attempts: number
    artifacts: Artifact[]
}

export type Permission = 'read' | 'write' | 'execute' | 'web'

export type ToolPermissions = Record<Permission, boolean>

export type ToolErrorKind = 'NotFound' | 'Unauthorized' | 'Timeout' | 'RuntimeError'

export interface ToolError {
    kind: ToolErrorKind
    message: string
}

export interface Observation {
    ok: boolean
    output: string
    exitCode?: number
    stderr?: string
}

export interface ToolAction {
    tool: string
    args: Record<string, unknown>
}

/** A candidate reasoning step in a Tree-of-Thoughts search. Lives only for the duration of one search. */
export interface ThoughtNode {
    id: number
    parentId: number | null
    text: string
    /** 0 to 10, assigned by the scoring function. */
    score: number
    depth: number
    action?: ToolAction
}

export type FailureCategory = 'missing-dependency' | 'permission-error' | 'syntax-error' | 'timeout'

export type RecordCategory = 'action' | 'corrective' | 'research' | 'escalation' | 'resolution'

export interface ReflexionRecord {
    readonly missionId: string
    readonly taskId: TaskId
    readonly action: string
    readonly observation: string
    readonly evaluationScore: number
    readonly reflectionText: string
    readonly timestamp: string
    readonly category: RecordCategory
}

export interface CapabilityManifestEntry {
    toolName: string
    description: string
    invocationSchema: Record<string, unknown>
    confidenceScore: number
    verifiedAt: string | null
}

export interface ChecklistItem {
    item: string
    done: boolean
}

export interface GoalState {
    missionId: string
    primeDirective: string
    checklist: ChecklistItem[]
}

export interface KnowledgeBaseDocument {
    name: string
    version: number
    content: string
    updatedAt: string
}

export type Resolution = { kind: 'observation'; output: string } | { kind: 'cancel' }
