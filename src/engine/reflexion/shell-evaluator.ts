import type { Observation, Task, ToolAction } from '../../core/types.js'
import type { EvaluationResult } from '../types.js'
import { classifyFailure } from './classifier.js'
import type { OutcomeEvaluator } from './types.js'

export class ShellEvaluator implements OutcomeEvaluator {
    readonly name = 'shell'

    appliesTo(action: ToolAction): boolean {
        return action.tool === 'shell'
    }

    async evaluate(_task: Task, _action: ToolAction, observation: Observation): Promise<EvaluationResult> {
        if (observation.exitCode === 0) {
            return { score: 1, reflectionText: 'Command exited 0.', verdict: 'success', causes: [] }
        }

        const text = observation.stderr?.trim() ? observation.stderr : observation.output
        const result = classifyFailure(text)
        const code = observation.exitCode ?? 'unknown'
        if (result.category) {
            return {
                score: 0,
                reflectionText: `Command exited ${code} with a ${result.category}: ${result.causes[0] ?? ''}`,
                verdict: 'failure',
                category: result.category,
                causes: result.causes,
            }
        }
        return {
            score: 0,
            reflectionText: `Command exited ${code}; the cause is not identifiable (${result.causes.length} candidate causes).`,
            verdict: 'ambiguous',
            causes: result.causes,
        }
    }
}
