import { InvalidPlanError, PermanentError } from '../../core/errors.js'
import type { Artifact, BlockedReason, EscalationTier, Resolution, Task, TaskId, TaskKind } from '../../core/types.js'
import type { TaskOutcome } from '../types.js'

export interface NewTask {
    description: string
    kind: TaskKind
    tags?: string[]
    requiredCapabilities?: string[]
    artifacts?: Artifact[]
}

export interface OutcomeEffects {
    task: Task
    /** Failed tasks whose corrective task just succeeded, now Pending again. */
    reactivated: Task[]
    /** Tasks blocked because the corrective task they were waiting on was blocked. */
    propagated: Task[]
}

function isTerminallyBlocked(task: Task): boolean {
    return task.state === 'Blocked' && task.blockedReason !== 'pending-research'
}

export function createTask(missionId: string, id: TaskId, fields: NewTask, dependencies: TaskId[]): Task {
    return {
        id,
        missionId,
        description: fields.description,
        dependencies,
        state: 'Pending',
        retryCount: 0,
        escalationTier: 'none',
        kind: fields.kind,
        tags: fields.tags ?? [],
        requiredCapabilities: fields.requiredCapabilities ?? [],
        researchAttempts: 0,
        resolvedGaps: [],
        attempts: 0,
        artifacts: fields.artifacts ?? [],
    }
}

/**
 * Throws InvalidPlanError on an unknown dependency or a cycle. Depth-first search with an explicit
 * on-path set; the reported cycle lists the ids along it.
 */
export function assertAcyclic(tasks: readonly Task[]): void {
    const byId = new Map(tasks.map((t) => [t.id, t]))
    for (const task of tasks) {
        for (const dep of task.dependencies) {
            if (!byId.has(dep)) throw new InvalidPlanError(`Task ${task.id} depends on unknown task ${dep}`)
        }
    }

    const done = new Set<TaskId>()
    const onPath: TaskId[] = []

    const visit = (task: Task): void => {
        if (done.has(task.id)) return
        const at = onPath.indexOf(task.id)
        if (at !== -1) {
            const cycle = [...onPath.slice(at), task.id].join(' -> ')
            throw new InvalidPlanError(`Plan contains a cycle: ${cycle}`)
        }
        onPath.push(task.id)
        for (const dep of task.dependencies) {
            const next = byId.get(dep)
            if (next) visit(next)
        }
        onPath.pop()
        done.add(task.id)
    }

    for (const task of tasks) visit(task)
}

/**
 * Owns one mission's task graph. Every method is synchronous, so concurrent workers on the same event loop
 * never observe a half-applied transition.
 */
export class TaskManager {
    private tasks = new Map<TaskId, Task>()

    constructor(
        readonly missionId: string,
        tasks: readonly Task[] = []
    ) {
        assertAcyclic(tasks)
        for (const task of tasks) this.tasks.set(task.id, structuredClone(task))
    }

    get(taskId: TaskId): Task {
        return structuredClone(this.require(taskId))
    }

    list(): Task[] {
        return [...this.tasks.values()].sort((a, b) => a.id - b.id).map((t) => structuredClone(t))
    }

    snapshot(): Task[] {
        return this.list()
    }

    nextRunnable(): Task | undefined {
        let best: Task | undefined
        for (const task of this.tasks.values()) {
            if (task.state !== 'Pending') continue
            if (!task.dependencies.every((dep) => this.tasks.get(dep)?.state === 'Succeeded')) continue
            // A corrective task waits until the attempt that injected it has been recorded
            if (task.parentTaskId !== undefined && this.tasks.get(task.parentTaskId)?.state === 'Running') continue
            if (!best || task.id < best.id) best = task
        }
        return best ? structuredClone(best) : undefined
    }

    markRunning(taskId: TaskId): Task {
        const task = this.require(taskId)
        if (task.state !== 'Pending') {
            throw new PermanentError(`Task ${taskId} is ${task.state}, not Pending`)
        }
        task.state = 'Running'
        return structuredClone(task)
    }

    /**
     * Inserts a task that must succeed before `before` can run again. The new task inherits the
     * dependencies of `before`, so it is runnable as soon as `before` was.
     */
    injectTask(fields: NewTask, before: TaskId): Task {
        const target = this.require(before)
        const id = this.nextId()
        const injected = createTask(this.missionId, id, fields, [...target.dependencies])
        injected.parentTaskId = before

        assertAcyclic([...this.tasks.values(), injected].map((t) => (t.id === before ? { ...t, dependencies: [...t.dependencies, id] } : t)))

        this.tasks.set(id, injected)
        target.dependencies.push(id)
        target.awaitingCorrection = id
        return structuredClone(injected)
    }

    incrementRetry(taskId: TaskId): number {
        const task = this.require(taskId)
        task.retryCount++
        return task.retryCount
    }

    incrementResearch(taskId: TaskId): number {
        const task = this.require(taskId)
        task.researchAttempts++
        return task.researchAttempts
    }

    setTier(taskId: TaskId, tier: EscalationTier): void {
        this.require(taskId).escalationTier = tier
    }

    resolveGap(taskId: TaskId, capability: string): void {
        const task = this.require(taskId)
        if (!task.resolvedGaps.includes(capability)) task.resolvedGaps.push(capability)
    }

    block(taskId: TaskId, reason: BlockedReason): Task {
        const task = this.require(taskId)
        task.state = 'Blocked'
        task.blockedReason = reason
        return structuredClone(task)
    }

    requeue(taskId: TaskId): Task {
        const task = this.require(taskId)
        if (task.state !== 'Blocked' && task.state !== 'Failed' && task.state !== 'Running') {
            throw new PermanentError(`Task ${taskId} is ${task.state} and cannot be requeued`)
        }
        task.state = 'Pending'
        task.blockedReason = undefined
        return structuredClone(task)
    }

    recordOutcome(taskId: TaskId, outcome: TaskOutcome): OutcomeEffects {
        const task = this.require(taskId)
        task.attempts++

        switch (outcome.kind) {
            case 'succeeded':
                return this.succeed(task, outcome.result)
            case 'failed':
                task.state = 'Failed'
                task.blockedReason = undefined
                task.result = outcome.detail
                return this.effects(task)
            case 'requeued':
                this.requeue(taskId)
                task.escalationTier = 'none'
                return this.effects(task)
            case 'blocked':
                task.state = 'Blocked'
                task.blockedReason = outcome.reason
                return this.effects(task, [], this.propagateBlock(task))
            case 'cancelled':
                task.state = 'Cancelled'
                return this.effects(task)
        }
    }

    /** Operator answer for a terminally blocked task. */
    resolve(taskId: TaskId, resolution: Resolution): OutcomeEffects {
        const task = this.require(taskId)
        if (!isTerminallyBlocked(task) && task.state !== 'Failed') {
            throw new PermanentError(`Task ${taskId} is ${task.state} and has nothing to resolve`)
        }
        task.blockedReason = undefined
        if (resolution.kind === 'cancel') {
            task.state = 'Cancelled'
            return this.effects(task)
        }
        return this.succeed(task, resolution.output)
    }

    /** Moves every Pending or Running task to Cancelled; returns their ids. */
    cancelInFlight(): TaskId[] {
        const cancelled: TaskId[] = []
        for (const task of this.tasks.values()) {
            if (task.state === 'Pending' || task.state === 'Running') {
                task.state = 'Cancelled'
                cancelled.push(task.id)
            }
        }
        return cancelled
    }

    /**
     * After a restart: attempts that never completed run again. Research that was under way restarts,
     * and a Failed task that is not waiting on a correction ended on an unexpected error.
     */
    recoverInterrupted(): TaskId[] {
        const recovered: TaskId[] = []
        for (const task of this.tasks.values()) {
            const interrupted =
                task.state === 'Running' ||
                (task.state === 'Blocked' && task.blockedReason === 'pending-research') ||
                (task.state === 'Failed' && task.awaitingCorrection === undefined)
            if (!interrupted) continue
            task.state = 'Pending'
            task.blockedReason = undefined
            recovered.push(task.id)
        }
        return recovered
    }

    isComplete(): boolean {
        return [...this.tasks.values()]
            .filter((t) => t.kind === 'planned')
            .every((t) => t.state === 'Succeeded' || t.state === 'Cancelled')
    }

    blocked(): Task[] {
        return this.list().filter(isTerminallyBlocked)
    }

    private succeed(task: Task, result: string): OutcomeEffects {
        task.state = 'Succeeded'
        task.result = result
        task.escalationTier = 'none'

        const reactivated: Task[] = []
        const parent = task.parentTaskId !== undefined ? this.tasks.get(task.parentTaskId) : undefined
        if (parent && parent.awaitingCorrection === task.id && (parent.state === 'Failed' || parent.state === 'Blocked')) {
            parent.state = 'Pending'
            parent.blockedReason = undefined
            parent.awaitingCorrection = undefined
            reactivated.push(structuredClone(parent))
        }
        return this.effects(task, reactivated)
    }

    private propagateBlock(task: Task): Task[] {
        if (!isTerminallyBlocked(task) || task.parentTaskId === undefined) return []
        const parent = this.tasks.get(task.parentTaskId)
        if (!parent || parent.awaitingCorrection !== task.id || parent.state !== 'Failed') return []

        parent.state = 'Blocked'
        parent.blockedReason = task.blockedReason
        return [structuredClone(parent), ...this.propagateBlock(parent)]
    }

    private effects(task: Task, reactivated: Task[] = [], propagated: Task[] = []): OutcomeEffects {
        return { task: structuredClone(task), reactivated, propagated }
    }

    private nextId(): TaskId {
        let max = 0
        for (const id of this.tasks.keys()) max = Math.max(max, id)
        return max + 1
    }

    private require(taskId: TaskId): Task {
        const task = this.tasks.get(taskId)
        if (!task) throw new PermanentError(`Unknown task ${taskId} in mission ${this.missionId}`)
        return task
    }
}
