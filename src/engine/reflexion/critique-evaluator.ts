import type { Observation, Task, ToolAction } from '../../core/types.js'
import type { ReasoningModel } from '../../reasoning/types.js'
import type { EvaluationResult } from '../types.js'
import { classifyFailure } from './classifier.js'
import type { OutcomeEvaluator } from './types.js'

/** Fallback for tools with no structured output: the reasoning model judges the observation. */
export class CritiqueEvaluator implements OutcomeEvaluator {
    readonly name = 'critique'

    constructor(private model: ReasoningModel) {}

    appliesTo(): boolean {
        return true
    }

    async evaluate(task: Task, action: ToolAction, observation: Observation, signal?: AbortSignal): Promise<EvaluationResult> {
        const critique = await this.model.critique(task, action, observation, signal)
        if (critique.verdict !== 'failure') {
            return { score: critique.score, reflectionText: critique.reflection, verdict: critique.verdict, causes: [] }
        }

        // A failure the tiers can act on needs a category; without one it is ambiguous.
        const result = classifyFailure(observation.output)
        return {
            score: critique.score,
            reflectionText: critique.reflection,
            verdict: result.category ? 'failure' : 'ambiguous',
            category: result.category,
            causes: result.causes,
        }
    }
}
