import type { ProtocolConfig } from '../../config/schema.js'
import type { Task } from '../../core/types.js'
import type { Logger } from '../../logger/index.js'
import type { EpisodicMemory } from '../../memory/episodic-memory.js'
import type { FailureSummary, ReasoningModel } from '../../reasoning/types.js'
import type { TaskManager } from '../plan/task-manager.js'
import type { StepFailure, TaskOutcome } from '../types.js'
import { renderAction } from '../reflexion/evaluator.js'
import type { TransitionRecorder } from './transitions.js'

export type ClassifiedFailure = Extract<StepFailure, { kind: 'classified' }>

interface ReflexionTierDeps {
    model: ReasoningModel
    memory: EpisodicMemory
    transitions: TransitionRecorder
    config: Pick<ProtocolConfig, 'maxRetries'>
    logger: Logger
    now?: () => Date
}

/**
 * Tier 1: a known tool failed for a recognizable reason. Inject one corrective task ahead of the failed
 * one and retry once it succeeds, at most maxRetries times per task.
 */
export class ReflexionTier {
    private now: () => Date

    constructor(private deps: ReflexionTierDeps) {
        this.now = deps.now ?? (() => new Date())
    }

    async handle(task: Task, failure: ClassifiedFailure, plan: TaskManager, signal?: AbortSignal): Promise<TaskOutcome> {
        const { transitions, model, memory } = this.deps
        plan.setTier(task.id, 'reflexion')
        transitions.record(task, 'reflexion', 'Detected', failure.observation.slice(0, 200))
        transitions.record(task, 'reflexion', 'Categorized', failure.category)

        const current = plan.get(task.id)
        if (current.retryCount >= this.deps.config.maxRetries) {
            transitions.record(task, 'reflexion', 'CircuitBreakerTripped', `${current.retryCount} corrective retries used`)
            return { kind: 'blocked', reason: 'CircuitBreakerTripped' }
        }

        const summary: FailureSummary = {
            action: renderAction(failure.action),
            observation: failure.observation,
            category: failure.category,
            causes: failure.causes,
        }
        const hypothesis = await model.hypothesize(task, summary, signal)
        transitions.record(task, 'reflexion', 'HypothesisFormed', hypothesis)

        const draft = await model.synthesizeCorrection(task, summary, hypothesis, signal)
        const corrective = plan.injectTask(
            {
                description: draft.description,
                kind: 'corrective',
                tags: draft.tags,
                requiredCapabilities: draft.requiredCapabilities,
            },
            task.id
        )
        const retryCount = plan.incrementRetry(task.id)

        await memory.append({
            missionId: task.missionId,
            taskId: task.id,
            action: `inject corrective task ${corrective.id}`,
            observation: failure.observation,
            evaluationScore: 0,
            reflectionText: `${failure.category}: ${hypothesis} Corrective task: ${draft.description} (retry ${retryCount}/${this.deps.config.maxRetries})`,
            timestamp: this.now().toISOString(),
            category: 'corrective',
        })
        transitions.record(task, 'reflexion', 'CorrectiveTaskInjected', `task ${corrective.id}: ${draft.description}`)
        this.deps.logger.info({ taskId: task.id, corrective: corrective.id, retryCount }, 'reflexion:corrective-injected')

        return { kind: 'failed', detail: `Waiting on corrective task ${corrective.id}` }
    }
}
