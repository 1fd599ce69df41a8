import { randomUUID } from 'node:crypto'
import { errorMessage, InvalidPlanError, isAbortError, MissionCancelledError, PermanentError } from '../core/errors.js'
import type { ProtocolTransition, TypedEventEmitter } from '../core/events.js'
import { KeyedLock } from '../core/lock.js'
import type { BlockedReason, Mission, MissionStatus, Resolution, Task, TaskId } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { EpisodicMemory } from '../memory/episodic-memory.js'
import type { GoalStateManager } from '../memory/goal-state.js'
import type { MissionStore } from '../memory/mission-store.js'
import type { Planner } from './plan/planner.js'
import { TaskManager } from './plan/task-manager.js'
import type { ProtocolEngine } from './protocol/protocol-engine.js'

export interface MissionReport {
    missionId: string
    status: MissionStatus
    tasks: Task[]
    transitions: ProtocolTransition[]
    blocked: Array<{ taskId: TaskId; reason: BlockedReason }>
    /** Attempts that stopped on an unexpected error; resume retries them. */
    failed: Array<{ taskId: TaskId; detail: string }>
    error?: string
}

interface MissionRunnerDeps {
    planner: Planner
    engine: ProtocolEngine
    store: MissionStore
    goals: GoalStateManager
    memory: EpisodicMemory
    eventBus: TypedEventEmitter
    logger: Logger
    maxConcurrentTasks: number
    now?: () => Date
    newId?: () => string
}

interface RunState {
    mission: Mission
    plan: TaskManager
    transitions: ProtocolTransition[]
}

/**
 * Drives missions to a terminal status with a pool of workers, each owning one task end to end.
 * The pool refills from the plan as workers finish; the snapshot is saved after every task.
 */
export class MissionRunner {
    private controllers = new Map<string, AbortController>()
    private saveLock = new KeyedLock()
    private now: () => Date
    private newId: () => string

    constructor(private deps: MissionRunnerDeps) {
        this.now = deps.now ?? (() => new Date())
        this.newId = deps.newId ?? (() => randomUUID())
    }

    async start(primeDirective: string): Promise<MissionReport> {
        const mission: Mission = {
            id: this.newId(),
            primeDirective,
            createdAt: this.now().toISOString(),
            status: 'active',
        }
        const controller = this.register(mission.id)
        this.deps.eventBus.emit('mission:start', { missionId: mission.id, primeDirective })
        this.deps.logger.info({ missionId: mission.id }, 'mission:start')

        let plan: TaskManager
        try {
            const decomposed = await this.deps.planner.decompose(mission, controller.signal)
            plan = new TaskManager(mission.id, decomposed.tasks)
        } catch (error) {
            this.controllers.delete(mission.id)
            if (!(error instanceof InvalidPlanError)) throw error
            const state: RunState = { mission: { ...mission, status: 'failed' }, plan: new TaskManager(mission.id), transitions: [] }
            await this.save(state)
            this.deps.eventBus.emit('mission:end', { missionId: mission.id, status: 'failed' })
            this.deps.logger.error({ missionId: mission.id, error: error.message }, 'mission:invalid-plan')
            return { ...this.report(state), error: error.message }
        }

        await this.deps.goals.initialize(mission, plan.list().map((t) => t.description))
        return this.execute({ mission, plan, transitions: [] }, controller)
    }

    /** Continues a persisted mission. Attempts cut short by a restart run again from the start. */
    async resume(missionId: string): Promise<MissionReport> {
        const snapshot = await this.deps.store.load(missionId)
        if (!snapshot) throw new PermanentError(`Unknown mission ${missionId}`)
        if (this.controllers.has(missionId)) throw new PermanentError(`Mission ${missionId} is already running`)

        const plan = new TaskManager(missionId, snapshot.tasks)
        const state: RunState = { mission: snapshot.mission, plan, transitions: [...snapshot.transitions] }
        if (snapshot.mission.status !== 'active' && snapshot.mission.status !== 'blocked') return this.report(state)

        const recovered = plan.recoverInterrupted()
        if (recovered.length > 0) this.deps.logger.info({ missionId, recovered }, 'mission:recovered-tasks')

        state.mission = { ...state.mission, status: 'active' }
        const controller = this.register(missionId)
        this.deps.eventBus.emit('mission:start', { missionId, primeDirective: state.mission.primeDirective })
        return this.execute(state, controller)
    }

    cancel(missionId: string): boolean {
        const controller = this.controllers.get(missionId)
        if (!controller) return false
        controller.abort(new MissionCancelledError(missionId))
        return true
    }

    /** Applies an operator decision to a blocked task of a persisted mission. Call resume to continue. */
    async resolve(missionId: string, taskId: TaskId, resolution: Resolution): Promise<Task> {
        if (this.controllers.has(missionId)) throw new PermanentError(`Mission ${missionId} is running; cancel it first`)
        const snapshot = await this.deps.store.load(missionId)
        if (!snapshot) throw new PermanentError(`Unknown mission ${missionId}`)

        const plan = new TaskManager(missionId, snapshot.tasks)
        const effects = plan.resolve(taskId, resolution)
        const detail = resolution.kind === 'observation' ? resolution.output : 'cancelled by operator'

        await this.deps.memory.append({
            missionId,
            taskId,
            action: `operator ${resolution.kind}`,
            observation: detail,
            evaluationScore: resolution.kind === 'observation' ? 1 : 0,
            reflectionText: `Operator resolved task ${taskId}: ${detail}`,
            timestamp: this.now().toISOString(),
            category: 'resolution',
        })
        if (effects.task.state === 'Succeeded') await this.markDone(effects.task)

        await this.save({ mission: snapshot.mission, plan, transitions: [...snapshot.transitions] })
        this.deps.logger.info({ missionId, taskId, resolution: resolution.kind, reactivated: effects.reactivated.map((t) => t.id) }, 'mission:resolved')
        return effects.task
    }

    private register(missionId: string): AbortController {
        const controller = new AbortController()
        this.controllers.set(missionId, controller)
        return controller
    }

    private async execute(state: RunState, controller: AbortController): Promise<MissionReport> {
        const { mission, plan } = state
        const signal = controller.signal
        const onTransition = (t: ProtocolTransition) => {
            if (t.missionId === mission.id) state.transitions.push(t)
        }
        this.deps.eventBus.on('protocol:transition', onTransition)

        try {
            await this.save(state)
            const running = new Map<TaskId, Promise<void>>()

            for (;;) {
                while (!signal.aborted && running.size < this.deps.maxConcurrentTasks) {
                    const next = plan.nextRunnable()
                    if (!next) break
                    plan.markRunning(next.id)
                    const worker = this.work(state, next, signal).finally(() => running.delete(next.id))
                    running.set(next.id, worker)
                }
                if (running.size === 0) break
                try {
                    await Promise.race(running.values())
                } catch (error) {
                    // Persistence failed under a worker; stop the others before giving up
                    controller.abort(error)
                    await Promise.allSettled(running.values())
                    throw error
                }
            }

            if (signal.aborted) plan.cancelInFlight()
            state.mission = { ...mission, status: this.statusOf(plan, signal.aborted) }
            await this.save(state)
        } finally {
            this.deps.eventBus.off('protocol:transition', onTransition)
            this.controllers.delete(mission.id)
        }

        this.deps.eventBus.emit('mission:end', { missionId: mission.id, status: state.mission.status })
        this.deps.logger.info({ missionId: mission.id, status: state.mission.status }, 'mission:end')
        return this.report(state)
    }

    private async work(state: RunState, task: Task, signal: AbortSignal): Promise<void> {
        const { mission, plan } = state
        const started = Date.now()
        this.deps.eventBus.emit('task:start', { missionId: mission.id, taskId: task.id, description: task.description })

        let finished: Task
        try {
            finished = await this.deps.engine.runTask(task.id, plan, signal)
        } catch (error) {
            if (signal.aborted || isAbortError(error)) {
                finished = plan.recordOutcome(task.id, { kind: 'cancelled' }).task
            } else {
                // The engine records its own crashes; this only catches a failure to record one
                this.deps.logger.error({ missionId: mission.id, taskId: task.id, error: errorMessage(error) }, 'task:crashed')
                finished = plan.recordOutcome(task.id, { kind: 'failed', detail: errorMessage(error) }).task
            }
        }

        if (finished.state === 'Succeeded') await this.markDone(finished)
        if (finished.awaitingCorrection !== undefined) {
            const corrective = plan.get(finished.awaitingCorrection)
            await this.deps.goals.addItem(mission.id, corrective.description)
        }

        this.deps.eventBus.emit('task:end', { missionId: mission.id, taskId: task.id, state: finished.state, duration: Date.now() - started })
        await this.save(state)
    }

    private async markDone(task: Task): Promise<void> {
        await this.deps.goals.markDone(task.missionId, task.description)
    }

    private statusOf(plan: TaskManager, cancelled: boolean): MissionStatus {
        if (cancelled) return 'cancelled'
        if (plan.isComplete()) return 'succeeded'
        return 'blocked'
    }

    private async save(state: RunState): Promise<void> {
        await this.saveLock.run(state.mission.id, () =>
            this.deps.store.save({
                schemaVersion: 1,
                mission: state.mission,
                tasks: state.plan.snapshot(),
                transitions: state.transitions,
                updatedAt: this.now().toISOString(),
            })
        )
    }

    private report(state: RunState): MissionReport {
        const tasks = state.plan.snapshot()
        return {
            missionId: state.mission.id,
            status: state.mission.status,
            tasks,
            transitions: [...state.transitions],
            blocked: tasks.flatMap((t) => (t.state === 'Blocked' && t.blockedReason ? [{ taskId: t.id, reason: t.blockedReason }] : [])),
            failed: tasks.flatMap((t) =>
                t.state === 'Failed' && t.awaitingCorrection === undefined ? [{ taskId: t.id, detail: t.result ?? '' }] : []
            ),
        }
    }
}
