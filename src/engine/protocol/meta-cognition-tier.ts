import type { ProtocolConfig } from '../../config/schema.js'
import { DEFAULT_PERSONA } from '../../config/defaults.js'
import { errorMessage, isAbortError, KnowledgeBaseConflict } from '../../core/errors.js'
import type { Task } from '../../core/types.js'
import type { Logger } from '../../logger/index.js'
import type { EpisodicMemory } from '../../memory/episodic-memory.js'
import type { KnowledgeBaseStore } from '../../memory/knowledge-base.js'
import type { Finding, KnowledgeGap, ReasoningModel, ResearchCollaborator } from '../../reasoning/types.js'
import type { TaskManager } from '../plan/task-manager.js'
import type { TaskOutcome } from '../types.js'
import type { TransitionRecorder } from './transitions.js'

interface MetaCognitionDeps {
    model: ReasoningModel
    research: ResearchCollaborator
    knowledgeBase: KnowledgeBaseStore
    memory: EpisodicMemory
    transitions: TransitionRecorder
    config: Pick<ProtocolConfig, 'maxResearchAttempts' | 'kbMaxWriteAttempts'>
    logger: Logger
    /** Persona the heuristics are written to. */
    persona?: string
    now?: () => Date
}

const HEURISTICS_HEADING = '# Operating heuristics'

export function appendHeuristic(content: string, heuristic: string): string {
    const body = content.trim() ? content.trimEnd() : HEURISTICS_HEADING
    return `${body}\n- ${heuristic}\n`
}

function researchQuery(gap: KnowledgeGap): string {
    return `How can an agent accomplish "${gap.taskDescription}" without a '${gap.capability}' capability? ${gap.detail}`
}

/**
 * Tier 2: the agent lacks a capability. Research a workaround, write it into a persona document and
 * requeue the task so the next attempt sees it. Never counts against the task's retry budget.
 */
export class MetaCognitionTier {
    private now: () => Date
    private persona: string

    constructor(private deps: MetaCognitionDeps) {
        this.now = deps.now ?? (() => new Date())
        this.persona = deps.persona ?? DEFAULT_PERSONA
    }

    async handle(task: Task, gap: KnowledgeGap, plan: TaskManager, signal?: AbortSignal): Promise<TaskOutcome> {
        const { transitions, model, config } = this.deps
        plan.setTier(task.id, 'meta-cognition')
        transitions.record(task, 'meta-cognition', 'GapIdentified', `${gap.capability} (confidence ${gap.confidence.toFixed(2)})`)

        if (plan.get(task.id).researchAttempts >= config.maxResearchAttempts) {
            await this.note(task, `research for '${gap.capability}'`, 'Research budget for this task is spent.', 0)
            return { kind: 'blocked', reason: 'ResearchExhausted' }
        }

        plan.block(task.id, 'pending-research')
        plan.incrementResearch(task.id)
        transitions.record(task, 'meta-cognition', 'MetaTaskEscalated', gap.capability)

        transitions.record(task, 'meta-cognition', 'Researching')
        const findings = await this.research(task, gap, signal)
        const heuristic = await model.synthesizeHeuristic(gap, findings, signal)

        const sources = findings.map((f) => f.source).join(', ') || 'none'
        if (!heuristic) {
            await this.note(task, `research for '${gap.capability}'`, `No usable heuristic from ${findings.length} findings (${sources}).`, 0)
            return { kind: 'blocked', reason: 'ResearchExhausted' }
        }
        await this.note(task, `research for '${gap.capability}'`, `Heuristic: ${heuristic} (sources: ${sources})`, 1)
        transitions.record(task, 'meta-cognition', 'HeuristicSynthesized', heuristic)

        let version: number
        try {
            const doc = await this.deps.knowledgeBase.update(
                this.persona,
                (current) => appendHeuristic(current.content, heuristic),
                config.kbMaxWriteAttempts
            )
            version = doc.version
        } catch (error) {
            if (error instanceof KnowledgeBaseConflict) return { kind: 'blocked', reason: 'KnowledgeBaseConflict' }
            throw error
        }
        transitions.record(task, 'meta-cognition', 'KnowledgeBaseUpdated', `${this.persona} v${version}`)

        // The plan moves the task back to Pending when the outcome is recorded
        plan.resolveGap(task.id, gap.capability)
        transitions.record(task, 'meta-cognition', 'Requeued')
        return { kind: 'requeued' }
    }

    private async research(task: Task, gap: KnowledgeGap, signal?: AbortSignal): Promise<Finding[]> {
        try {
            return await this.deps.research.research(researchQuery(gap), { missionId: task.missionId, taskId: task.id, signal })
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) throw error
            this.deps.logger.warn({ taskId: task.id, error: errorMessage(error) }, 'meta:research-failed')
            return []
        }
    }

    private async note(task: Task, action: string, text: string, score: number): Promise<void> {
        await this.deps.memory.append({
            missionId: task.missionId,
            taskId: task.id,
            action,
            observation: text,
            evaluationScore: score,
            reflectionText: text,
            timestamp: this.now().toISOString(),
            category: 'research',
        })
    }
}
