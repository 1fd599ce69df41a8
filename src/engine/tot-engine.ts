import type { ToTConfig } from '../config/schema.js'
import { errorMessage, isAbortError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Observation, Task, ThoughtNode, ToolAction } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { AgentContext } from '../memory/context-curator.js'
import type { ReasoningModel, ThoughtProposal } from '../reasoning/types.js'
import type { StepFailure, StepResult } from './types.js'

export type ExecutableNode = ThoughtNode & { action: ToolAction }

/** Runs a node's action for real. Called at most once per node. */
export type ExecuteNode = (node: ExecutableNode, path: ThoughtNode[]) => Promise<StepResult>

export interface ToTResult {
    outcome: 'success' | 'exhausted' | 'budget-exceeded'
    /** Root to the winning node, or to the highest-scoring executed node when nothing succeeded. */
    path: ThoughtNode[]
    explored: number
    executed: number
    /** Proposal or scoring calls that failed and were treated as empty or zero. */
    failedCalls: number
    observation?: Observation
    failure?: StepFailure
}

interface ToTDeps {
    model: ReasoningModel
    eventBus: TypedEventEmitter
    logger: Logger
}

interface Executed {
    node: ThoughtNode
    result: StepResult
}

const MAX_SCORE = 10

function isExecutable(node: ThoughtNode): node is ExecutableNode {
    return node.action !== undefined
}

/**
 * Beam search over candidate strategies. Expansion and scoring for one level run concurrently; only
 * selected nodes touch the gateway, one at a time, best first, falling back to the next sibling on failure.
 */
export class ToTEngine {
    constructor(private deps: ToTDeps) {}

    async search(
        task: Task,
        context: AgentContext,
        failure: StepFailure | undefined,
        config: ToTConfig,
        execute: ExecuteNode,
        signal?: AbortSignal
    ): Promise<ToTResult> {
        const { beamWidth, maxDepth, scoreThreshold } = config
        const budget = beamWidth * maxDepth
        const nodes = new Map<number, ThoughtNode>()
        let nextId = 0

        const root: ThoughtNode = {
            id: nextId++,
            parentId: null,
            text: failure ? `Previous attempt failed: ${failure.observation}` : `Choose an approach for: ${task.description}`,
            score: MAX_SCORE,
            depth: 0,
        }
        nodes.set(root.id, root)

        const pathTo = (node: ThoughtNode): ThoughtNode[] => {
            const path: ThoughtNode[] = []
            let current: ThoughtNode | undefined = node
            while (current) {
                path.unshift(current)
                current = current.parentId === null ? undefined : nodes.get(current.parentId)
            }
            return path
        }

        let frontier: ThoughtNode[] = [root]
        let explored = 0
        let failedCalls = 0
        const executed: Executed[] = []
        const countFailure = (): void => {
            failedCalls++
        }

        const finish = (outcome: ToTResult['outcome'], winner?: Executed): ToTResult => {
            const best = winner ?? executed.reduce<Executed | undefined>((top, e) => (!top || e.node.score > top.node.score ? e : top), undefined)
            this.deps.logger.info({ taskId: task.id, outcome, explored, executed: executed.length, failedCalls }, 'tot:finished')
            return {
                outcome,
                path: best ? pathTo(best.node) : [root],
                explored,
                executed: executed.length,
                failedCalls,
                observation: best?.result.observation,
                failure: best?.result.failure,
            }
        }

        for (let depth = 1; depth <= maxDepth; depth++) {
            signal?.throwIfAborted()
            const remaining = budget - explored
            if (remaining <= 0) return finish('budget-exceeded')

            const quotas = this.quotas(frontier.length, beamWidth, remaining)
            const proposals = await Promise.all(
                frontier.map((parent, i) => this.propose(task, context, pathTo(parent), quotas[i] ?? 0, countFailure, signal))
            )

            const candidates: Array<{ parent: ThoughtNode; proposal: ThoughtProposal }> = []
            frontier.forEach((parent, i) => {
                for (const proposal of (proposals[i] ?? []).slice(0, quotas[i] ?? 0)) candidates.push({ parent, proposal })
            })

            const scores = await Promise.all(candidates.map((c) => this.score(task, pathTo(c.parent), c.proposal, countFailure, signal)))
            explored += candidates.length

            const level: ThoughtNode[] = candidates.map((c, i) => {
                const node: ThoughtNode = {
                    id: nextId++,
                    parentId: c.parent.id,
                    text: c.proposal.text,
                    score: scores[i] ?? 0,
                    depth,
                    action: c.proposal.action,
                }
                nodes.set(node.id, node)
                return node
            })

            // Array.prototype.sort is stable, so equal scores keep insertion order
            const selected = level
                .filter((n) => n.score >= scoreThreshold)
                .sort((a, b) => b.score - a.score)
                .slice(0, beamWidth)

            this.deps.eventBus.emit('tot:explored', {
                missionId: task.missionId,
                taskId: task.id,
                depth,
                explored,
                executed: executed.length,
            })

            if (selected.length === 0) return finish('exhausted')

            for (const node of selected) {
                if (!isExecutable(node)) continue
                signal?.throwIfAborted()
                const result = await execute(node, pathTo(node))
                const entry = { node, result }
                executed.push(entry)
                if (!result.failure && result.evaluation.verdict === 'success') return finish('success', entry)
            }

            frontier = selected
        }

        return finish('exhausted')
    }

    /** Up to beamWidth children per frontier node, best parents first, never past the remaining budget. */
    private quotas(parents: number, beamWidth: number, remaining: number): number[] {
        const quotas: number[] = []
        let left = remaining
        for (let i = 0; i < parents; i++) {
            const take = Math.min(beamWidth, left)
            quotas.push(take)
            left -= take
        }
        return quotas
    }

    private async propose(
        task: Task,
        context: AgentContext,
        path: ThoughtNode[],
        count: number,
        onFailure: () => void,
        signal?: AbortSignal
    ): Promise<ThoughtProposal[]> {
        if (count <= 0) return []
        try {
            return await this.deps.model.proposeThoughts(task, context, path, count, signal)
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) throw error
            this.deps.logger.warn({ taskId: task.id, error: errorMessage(error) }, 'tot:propose-failed')
            onFailure()
            return []
        }
    }

    private async score(
        task: Task,
        path: ThoughtNode[],
        proposal: ThoughtProposal,
        onFailure: () => void,
        signal?: AbortSignal
    ): Promise<number> {
        try {
            const score = await this.deps.model.scoreThought(task, path, proposal, signal)
            return Math.min(MAX_SCORE, Math.max(0, score))
        } catch (error) {
            if (isAbortError(error) || signal?.aborted) throw error
            this.deps.logger.warn({ taskId: task.id, error: errorMessage(error) }, 'tot:score-failed')
            onFailure()
            return 0
        }
    }
}
