import type { Observation, Task, ToolAction } from '../../core/types.js'
import type { EvaluationResult } from '../types.js'

/** Judges one action's outcome. Evaluators are tried in registration order; the first that applies wins. */
export interface OutcomeEvaluator {
    readonly name: string
    appliesTo(action: ToolAction, observation: Observation): boolean
    evaluate(task: Task, action: ToolAction, observation: Observation, signal?: AbortSignal): Promise<EvaluationResult>
}
