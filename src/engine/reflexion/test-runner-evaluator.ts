import type { Observation, Task, ToolAction } from '../../core/types.js'
import type { EvaluationResult } from '../types.js'
import { classifyFailure } from './classifier.js'
import type { OutcomeEvaluator } from './types.js'

export interface TestSummary {
    passed: number
    failed: number
}

// Vitest "Tests  1 failed | 4 passed", Jest "Tests:  1 failed, 4 passed", pytest "=== 1 failed, 3 passed in 0.1s ==="
const SUMMARY_LINE = /^.*(?:\bTests:?\s|=+\s).*\b(?:passed|failed)\b.*$/im

export function parseTestSummary(text: string): TestSummary | null {
    const line = text.match(SUMMARY_LINE)?.[0]
    if (!line) return null
    const passed = /(\d+) passed/.exec(line)?.[1]
    const failed = /(\d+) failed/.exec(line)?.[1]
    return { passed: Number(passed ?? 0), failed: Number(failed ?? 0) }
}

export class TestRunnerEvaluator implements OutcomeEvaluator {
    readonly name = 'test-runner'

    appliesTo(action: ToolAction, observation: Observation): boolean {
        return action.tool === 'shell' && parseTestSummary(observation.output) !== null
    }

    async evaluate(_task: Task, _action: ToolAction, observation: Observation): Promise<EvaluationResult> {
        const summary = parseTestSummary(observation.output) ?? { passed: 0, failed: 0 }
        const total = summary.passed + summary.failed
        const score = total === 0 ? 0 : summary.passed / total

        if (summary.failed === 0 && observation.exitCode === 0) {
            return { score: 1, reflectionText: `All ${summary.passed} tests passed.`, verdict: 'success', causes: [] }
        }

        const result = classifyFailure(observation.output)
        const reflectionText = `${summary.failed} of ${total} tests failed.`
        if (result.category) {
            return { score, reflectionText: `${reflectionText} Cause: ${result.category}.`, verdict: 'failure', category: result.category, causes: result.causes }
        }
        return { score, reflectionText, verdict: 'ambiguous', causes: result.causes }
    }
}
