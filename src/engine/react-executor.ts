import type { Task, ToolAction } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { AgentContext } from '../memory/context-curator.js'
import type { ReasoningModel } from '../reasoning/types.js'
import type { ToolGateway } from '../tools/gateway.js'
import type { ReflexionEvaluator } from './reflexion/evaluator.js'
import { type EvaluationResult, FINISH_TOOL, type StepFailure, type StepResult } from './types.js'

interface ReActDeps {
    model: ReasoningModel
    gateway: ToolGateway
    evaluator: ReflexionEvaluator
    toolTimeoutMs: number
    logger: Logger
}

function failureFrom(action: ToolAction, output: string, evaluation: EvaluationResult): StepFailure | undefined {
    if (evaluation.verdict === 'success' || evaluation.verdict === 'progress') return undefined
    if (evaluation.verdict === 'failure' && evaluation.category) {
        return { kind: 'classified', category: evaluation.category, action, observation: output, causes: evaluation.causes }
    }
    return { kind: 'ambiguous', action, observation: output, causes: evaluation.causes }
}

/** One Thought, Action, Observation cycle per call. Looping is the caller's decision. */
export class ReActExecutor {
    constructor(private deps: ReActDeps) {}

    async step(task: Task, context: AgentContext, signal?: AbortSignal): Promise<StepResult> {
        const decision = await this.deps.model.think(task, context, signal)

        if (decision.kind === 'finish') {
            const action: ToolAction = { tool: FINISH_TOOL, args: {} }
            const observation = { ok: true, output: decision.result }
            const evaluation: EvaluationResult = { score: 1, reflectionText: 'Task reported complete.', verdict: 'success', causes: [] }
            await this.deps.evaluator.recordEvaluation(task, action, observation.output, evaluation, decision.thought)
            return { thought: decision.thought, action, observation, evaluation, terminal: true }
        }

        return this.act(task, decision.action, decision.thought, signal)
    }

    /** Runs one action through the gateway, evaluates it and records the reflection. */
    async act(task: Task, action: ToolAction, thought: string, signal?: AbortSignal): Promise<StepResult> {
        const result = await this.deps.gateway.invoke(action.tool, action.args, {
            timeoutMs: this.deps.toolTimeoutMs,
            signal,
            missionId: task.missionId,
            taskId: task.id,
        })

        if (!result.ok) {
            const error = result.error
            const { evaluation } = await this.deps.evaluator.reflectOnToolError(task, action, error, thought)
            const observation = { ok: false, output: `${error.kind}: ${error.message}` }
            this.deps.logger.info({ taskId: task.id, tool: action.tool, kind: error.kind }, 'react:tool-error')

            if (error.kind === 'NotFound') {
                const failure: StepFailure = { kind: 'gap', capability: action.tool, confidence: 0, observation: observation.output }
                return { thought, action, observation, evaluation, terminal: true, failure }
            }
            if (error.kind === 'Unauthorized') {
                const failure: StepFailure = { kind: 'unauthorized', action, observation: observation.output }
                return { thought, action, observation, evaluation, terminal: true, failure }
            }
            return { thought, action, observation, evaluation, terminal: true, failure: failureFrom(action, observation.output, evaluation) }
        }

        const observation = result.value
        const { evaluation } = await this.deps.evaluator.reflect(task, action, observation, signal, thought)
        const failure = failureFrom(action, observation.output, evaluation)
        return {
            thought,
            action,
            observation,
            evaluation,
            terminal: failure !== undefined || evaluation.verdict === 'success',
            failure,
        }
    }
}
