import type { AgentContext } from '../memory/context-curator.js'
import type {
    CapabilityManifestEntry,
    FailureCategory,
    Observation,
    Task,
    TaskId,
    ThoughtNode,
    ToolAction,
} from '../core/types.js'
import type { CorrectionDraft, CritiqueResult, PlanDraft, ThinkDecision, ThoughtProposal } from './schemas.js'

export type { CorrectionDraft, CritiqueResult, PlanDraft, ThinkDecision, ThoughtProposal } from './schemas.js'

export interface FailureSummary {
    action: string
    observation: string
    category?: FailureCategory
    causes: string[]
}

/** A capability the task needs that no registered tool answers with enough confidence. */
export interface KnowledgeGap {
    capability: string
    /** Best matching capability confidence, 0 when nothing matched. */
    confidence: number
    taskDescription: string
    detail: string
}

export interface Finding {
    source: string
    summary: string
}

export interface ResearchScope {
    missionId: string
    taskId: TaskId
    signal?: AbortSignal
}

/**
 * Everything the engine asks of a language model. The engine never parses model text itself; each call
 * returns a validated value or throws.
 */
export interface ReasoningModel {
    decompose(directive: string, capabilities: CapabilityManifestEntry[], signal?: AbortSignal): Promise<PlanDraft>
    think(task: Task, context: AgentContext, signal?: AbortSignal): Promise<ThinkDecision>
    proposeThoughts(
        task: Task,
        context: AgentContext,
        path: ThoughtNode[],
        count: number,
        signal?: AbortSignal
    ): Promise<ThoughtProposal[]>
    /** Returns a value on the 0 to 10 scale. */
    scoreThought(task: Task, path: ThoughtNode[], candidate: ThoughtProposal, signal?: AbortSignal): Promise<number>
    critique(task: Task, action: ToolAction, observation: Observation, signal?: AbortSignal): Promise<CritiqueResult>
    hypothesize(task: Task, failure: FailureSummary, signal?: AbortSignal): Promise<string>
    synthesizeCorrection(
        task: Task,
        failure: FailureSummary,
        hypothesis: string,
        signal?: AbortSignal
    ): Promise<CorrectionDraft>
    /** Null when the findings do not support a usable heuristic. */
    synthesizeHeuristic(gap: KnowledgeGap, findings: Finding[], signal?: AbortSignal): Promise<string | null>
}

export interface ResearchCollaborator {
    research(query: string, scope: ResearchScope): Promise<Finding[]>
}
