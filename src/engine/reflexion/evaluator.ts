import type { CapabilityRegistry } from '../../capabilities/registry.js'
import type { CapabilityConfig } from '../../config/schema.js'
import type { Observation, ReflexionRecord, Task, ToolAction, ToolError } from '../../core/types.js'
import { truncate } from '../../core/text.js'
import type { Logger } from '../../logger/index.js'
import type { EpisodicMemory } from '../../memory/episodic-memory.js'
import { type EvaluationResult, FINISH_TOOL } from '../types.js'
import { classifyFailure } from './classifier.js'
import type { OutcomeEvaluator } from './types.js'

const OBSERVATION_CHARS = 2_000

export function renderAction(action: ToolAction): string {
    return action.tool === FINISH_TOOL ? FINISH_TOOL : `${action.tool} ${JSON.stringify(action.args)}`
}

/** Outcome of a call the gateway refused or could not complete. */
export function evaluateToolError(error: ToolError): EvaluationResult {
    switch (error.kind) {
        case 'NotFound':
            return { score: 0, reflectionText: `${error.message}. A capability is missing.`, verdict: 'failure', causes: [error.message] }
        case 'Unauthorized':
            return { score: 0, reflectionText: `${error.message}. Needs an operator.`, verdict: 'failure', causes: [error.message] }
        case 'Timeout':
            return { score: 0, reflectionText: error.message, verdict: 'failure', category: 'timeout', causes: [error.message] }
        case 'RuntimeError': {
            const result = classifyFailure(error.message)
            return {
                score: 0,
                reflectionText: error.message,
                verdict: result.category ? 'failure' : 'ambiguous',
                category: result.category,
                causes: result.causes,
            }
        }
    }
}

interface EvaluatorDeps {
    evaluators: OutcomeEvaluator[]
    memory: EpisodicMemory
    capabilities: CapabilityRegistry
    config: Pick<CapabilityConfig, 'successDelta' | 'failureDelta'>
    logger: Logger
    now?: () => Date
}

/**
 * Judges every action and leaves a record of it. Reflection runs on success and failure alike: the record
 * is appended and the tool's confidence moves before the caller sees the result.
 */
export class ReflexionEvaluator {
    private now: () => Date

    constructor(private deps: EvaluatorDeps) {
        this.now = deps.now ?? (() => new Date())
    }

    async evaluate(task: Task, action: ToolAction, observation: Observation, signal?: AbortSignal): Promise<EvaluationResult> {
        const evaluator = this.deps.evaluators.find((e) => e.appliesTo(action, observation))
        if (!evaluator) {
            return observation.ok
                ? { score: 1, reflectionText: 'Completed.', verdict: 'success', causes: [] }
                : { score: 0, reflectionText: 'Failed with no evaluator for this tool.', verdict: 'ambiguous', causes: [] }
        }
        const result = await evaluator.evaluate(task, action, observation, signal)
        return { ...result, score: Math.min(1, Math.max(0, result.score)) }
    }

    async reflect(
        task: Task,
        action: ToolAction,
        observation: Observation,
        signal?: AbortSignal,
        thought?: string
    ): Promise<{ evaluation: EvaluationResult; record: ReflexionRecord }> {
        const evaluation = await this.evaluate(task, action, observation, signal)
        const record = await this.recordEvaluation(task, action, observation.output, evaluation, thought)
        return { evaluation, record }
    }

    async reflectOnToolError(
        task: Task,
        action: ToolAction,
        error: ToolError,
        thought?: string
    ): Promise<{ evaluation: EvaluationResult; record: ReflexionRecord }> {
        const evaluation = evaluateToolError(error)
        const record = await this.recordEvaluation(task, action, `${error.kind}: ${error.message}`, evaluation, thought)
        return { evaluation, record }
    }

    async recordEvaluation(
        task: Task,
        action: ToolAction,
        observation: string,
        evaluation: EvaluationResult,
        thought?: string
    ): Promise<ReflexionRecord> {
        const record = await this.deps.memory.append({
            missionId: task.missionId,
            taskId: task.id,
            action: renderAction(action),
            observation: truncate(observation, OBSERVATION_CHARS),
            evaluationScore: evaluation.score,
            reflectionText: thought ? `${thought}\n${evaluation.reflectionText}` : evaluation.reflectionText,
            timestamp: this.now().toISOString(),
            category: 'action',
        })

        if (action.tool !== FINISH_TOOL) {
            const succeeded = evaluation.verdict === 'success' || evaluation.verdict === 'progress'
            const delta = succeeded ? this.deps.config.successDelta : -this.deps.config.failureDelta
            this.deps.capabilities.adjustConfidence(action.tool, delta)
        }

        this.deps.logger.debug(
            { taskId: task.id, action: record.action, verdict: evaluation.verdict, score: evaluation.score },
            'reflexion:recorded'
        )
        return record
    }
}
