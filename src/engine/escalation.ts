import { COMPLEXITY_TAGS, type Task } from '../core/types.js'
import type { StepFailure } from './types.js'

export function hasComplexityTag(task: Pick<Task, 'tags'>): boolean {
    return task.tags.some((tag) => COMPLEXITY_TAGS.some((c) => c === tag))
}

/**
 * ReAct or Tree-of-Thoughts. Search when the last failure has no single identifiable cause, or when a
 * high-complexity planning task has not been attempted yet.
 */
export function shouldEscalateToToT(task: Pick<Task, 'tags' | 'attempts'>, lastFailure?: StepFailure): boolean {
    if (lastFailure) return lastFailure.kind === 'ambiguous'
    return task.attempts === 0 && hasComplexityTag(task)
}
