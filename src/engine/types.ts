import type { BlockedReason, FailureCategory, Observation, ToolAction } from '../core/types.js'

export type Verdict = 'success' | 'progress' | 'failure' | 'ambiguous'

export interface EvaluationResult {
    /** 0 to 1. */
    score: number
    reflectionText: string
    verdict: Verdict
    category?: FailureCategory
    causes: string[]
}

/** Why a step did not move the task forward, in the terms the protocol tiers route on. */
export type StepFailure =
    | { kind: 'classified'; category: FailureCategory; action: ToolAction; observation: string; causes: string[] }
    | { kind: 'ambiguous'; action?: ToolAction; observation: string; causes: string[] }
    | { kind: 'gap'; capability: string; confidence: number; observation: string }
    | { kind: 'unauthorized'; action: ToolAction; observation: string }

export interface StepResult {
    thought: string
    action: ToolAction
    observation: Observation
    evaluation: EvaluationResult
    /** The observation completed the task, or ended the attempt. */
    terminal: boolean
    failure?: StepFailure
}

export type TaskOutcome =
    | { kind: 'succeeded'; result: string }
    /** Waiting on an injected corrective task, or stopped on an unexpected error (resume retries it). */
    | { kind: 'failed'; detail: string }
    | { kind: 'requeued' }
    /** `detail` reaches the escalation record when the block is terminal. */
    | { kind: 'blocked'; reason: BlockedReason; detail?: string }
    | { kind: 'cancelled' }

export const FINISH_TOOL = 'finish'
