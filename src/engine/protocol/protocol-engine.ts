import type { CapabilityRegistry } from '../../capabilities/registry.js'
import type { CapabilityConfig, ProtocolConfig, ToTConfig } from '../../config/schema.js'
import { errorMessage, isAbortError } from '../../core/errors.js'
import type { TypedEventEmitter } from '../../core/events.js'
import type { EscalationReason, Task, TaskId, TerminalBlockReason } from '../../core/types.js'
import type { HumanEscalationChannel } from '../../escalation/channel.js'
import type { Logger } from '../../logger/index.js'
import type { ContextCurator } from '../../memory/context-curator.js'
import type { EpisodicMemory } from '../../memory/episodic-memory.js'
import type { KnowledgeGap } from '../../reasoning/types.js'
import { shouldEscalateToToT } from '../escalation.js'
import type { TaskManager } from '../plan/task-manager.js'
import type { ReActExecutor } from '../react-executor.js'
import type { ToTEngine } from '../tot-engine.js'
import type { StepFailure, TaskOutcome } from '../types.js'
import type { MetaCognitionTier } from './meta-cognition-tier.js'
import type { ReflexionTier } from './reflexion-tier.js'
import type { TransitionRecorder } from './transitions.js'

export interface ProtocolEngineDeps {
    react: ReActExecutor
    tot: ToTEngine
    curator: ContextCurator
    capabilities: CapabilityRegistry
    reflexion: ReflexionTier
    metaCognition: MetaCognitionTier
    memory: EpisodicMemory
    escalation: HumanEscalationChannel
    transitions: TransitionRecorder
    eventBus: TypedEventEmitter
    logger: Logger
    config: {
        protocol: Pick<ProtocolConfig, 'maxStepsPerAttempt'>
        tot: ToTConfig
        capabilities: Pick<CapabilityConfig, 'minConfidence'>
        context: { budgetTokens: number }
    }
    now?: () => Date
}

function isTerminalBlock(reason: Task['blockedReason']): reason is TerminalBlockReason {
    return reason !== undefined && reason !== 'pending-research'
}

/**
 * Runs one attempt of one task and applies its outcome to the plan: ReAct by default, Tree-of-Thoughts
 * when escalation calls for it, and the Reflexion or Meta-Cognition tier when the attempt fails.
 */
export class ProtocolEngine {
    private now: () => Date

    constructor(private deps: ProtocolEngineDeps) {
        this.now = deps.now ?? (() => new Date())
    }

    async runTask(taskId: TaskId, plan: TaskManager, signal?: AbortSignal): Promise<Task> {
        const task = plan.get(taskId)
        let outcome: TaskOutcome
        try {
            outcome = await this.attempt(task, plan, signal)
        } catch (error) {
            if (signal?.aborted || isAbortError(error)) throw error
            return this.crashed(task, plan, error)
        }
        return this.apply(task, plan, outcome)
    }

    /** An attempt that threw leaves the task Failed, retryable on resume, and tells the operator once. */
    private async crashed(task: Task, plan: TaskManager, error: unknown): Promise<Task> {
        const detail = errorMessage(error)
        this.deps.logger.error({ taskId: task.id, error: detail }, 'task:crashed')
        const effects = plan.recordOutcome(task.id, { kind: 'failed', detail })
        await this.escalate(effects.task, 'AttemptCrashed', detail)
        return effects.task
    }

    private async attempt(task: Task, plan: TaskManager, signal?: AbortSignal): Promise<TaskOutcome> {
        const gap = this.findGap(task)
        if (gap) return this.deps.metaCognition.handle(task, gap, plan, signal)

        if (shouldEscalateToToT(task)) return this.search(task, plan, undefined, signal)

        const { maxStepsPerAttempt } = this.deps.config.protocol
        for (let i = 0; i < maxStepsPerAttempt; i++) {
            signal?.throwIfAborted()
            const context = await this.deps.curator.buildContext(task, this.deps.config.context.budgetTokens)
            const step = await this.deps.react.step(task, context, signal)

            if (step.failure) {
                if (shouldEscalateToToT(task, step.failure)) return this.search(task, plan, step.failure, signal)
                return this.handleFailure(task, plan, step.failure, signal)
            }
            if (step.terminal) return { kind: 'succeeded', result: step.observation.output }
        }

        // Out of steps without an answer: no identifiable cause, so search
        const stalled: StepFailure = {
            kind: 'ambiguous',
            observation: `No terminal outcome after ${maxStepsPerAttempt} steps`,
            causes: [],
        }
        return this.search(task, plan, stalled, signal)
    }

    private async search(task: Task, plan: TaskManager, failure: StepFailure | undefined, signal?: AbortSignal): Promise<TaskOutcome> {
        const context = await this.deps.curator.buildContext(task, this.deps.config.context.budgetTokens)
        const result = await this.deps.tot.search(
            task,
            context,
            failure,
            this.deps.config.tot,
            (node) => this.deps.react.act(task, node.action, node.text, signal),
            signal
        )

        if (result.outcome === 'success') {
            return { kind: 'succeeded', result: result.observation?.output ?? result.path.map((n) => n.text).join(' > ') }
        }

        const last = result.failure
        if (last && last.kind !== 'ambiguous') return this.handleFailure(task, plan, last, signal)
        return {
            kind: 'blocked',
            reason: 'SearchExhausted',
            detail:
                result.failedCalls > 0
                    ? `${result.explored} candidates explored, ${result.failedCalls} proposal or scoring calls failed`
                    : undefined,
        }
    }

    private async handleFailure(task: Task, plan: TaskManager, failure: StepFailure, signal?: AbortSignal): Promise<TaskOutcome> {
        switch (failure.kind) {
            case 'classified':
                return this.deps.reflexion.handle(task, failure, plan, signal)
            case 'gap':
                return this.deps.metaCognition.handle(
                    task,
                    {
                        capability: failure.capability,
                        confidence: failure.confidence,
                        taskDescription: task.description,
                        detail: failure.observation,
                    },
                    plan,
                    signal
                )
            case 'unauthorized':
                return { kind: 'blocked', reason: 'ToolUnauthorized' }
            case 'ambiguous':
                return { kind: 'blocked', reason: 'SearchExhausted' }
        }
    }

    /** First required capability with nothing confident enough behind it, skipping gaps already researched. */
    private findGap(task: Task): KnowledgeGap | null {
        // Correctives lower confidence on purpose; that is Tier 1's loop, not a new gap
        if (task.escalationTier === 'reflexion') return null
        for (const hint of task.requiredCapabilities) {
            if (task.resolvedGaps.includes(hint)) continue
            const resolution = this.deps.capabilities.resolve(hint, this.deps.config.capabilities.minConfidence)
            if (!resolution.gap) continue
            return {
                capability: hint,
                confidence: resolution.bestConfidence,
                taskDescription: task.description,
                detail:
                    resolution.entries.length === 0
                        ? 'No registered tool matches.'
                        : `Closest tools: ${resolution.entries.map((e) => `${e.toolName} (${e.confidenceScore.toFixed(2)})`).join(', ')}`,
            }
        }
        return null
    }

    private async apply(task: Task, plan: TaskManager, outcome: TaskOutcome): Promise<Task> {
        const before = plan.get(task.id)
        const effects = plan.recordOutcome(task.id, outcome)

        if (outcome.kind === 'succeeded' && before.escalationTier === 'reflexion') {
            this.deps.transitions.record(task, 'reflexion', 'Resolved', `after ${before.retryCount} corrective retries`)
        }
        for (const parent of effects.reactivated) {
            this.deps.transitions.record(parent, 'reflexion', 'Retrying', `corrective task ${task.id} succeeded`)
        }

        const detail = outcome.kind === 'blocked' ? outcome.detail : undefined
        for (const blocked of [effects.task, ...effects.propagated]) {
            if (blocked.state === 'Blocked' && isTerminalBlock(blocked.blockedReason)) {
                await this.escalate(blocked, blocked.blockedReason, blocked.id === task.id ? detail : undefined)
            }
        }

        this.deps.logger.info({ taskId: task.id, outcome: outcome.kind, state: effects.task.state }, 'task:attempt-recorded')
        return effects.task
    }

    private async escalate(task: Task, reason: EscalationReason, detail?: string): Promise<void> {
        await this.deps.memory.append({
            missionId: task.missionId,
            taskId: task.id,
            action: 'escalate to operator',
            observation: detail ? `${reason}: ${detail}` : reason,
            evaluationScore: 0,
            reflectionText:
                reason === 'AttemptCrashed'
                    ? `Task ${task.id} stopped on an unexpected error: ${detail ?? 'unknown'}. Resume retries it.`
                    : `Task ${task.id} is blocked (${reason}) and needs an operator decision.`,
            timestamp: this.now().toISOString(),
            category: 'escalation',
        })
        this.deps.eventBus.emit('escalation:raised', { missionId: task.missionId, taskId: task.id, reason })

        try {
            await this.deps.escalation.escalate({
                missionId: task.missionId,
                taskId: task.id,
                reason,
                history: this.deps.memory.forTask(task.missionId, task.id),
            })
        } catch (error) {
            // The task stays Blocked either way; the record above already explains it
            this.deps.logger.error({ taskId: task.id, reason, error: errorMessage(error) }, 'escalation:delivery-failed')
        }
    }
}
