import path from 'node:path'
import { PermanentError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { GoalState, Mission } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { GoalStateSchema } from './schemas.js'

/**
 * Keeps each mission's prime directive and checklist, recited at the top of every cognitive-loop step
 * so long missions do not lose their goal.
 */
export class GoalStateManager {
    private live = new Map<string, GoalState>()
    private readonly dir: string

    constructor(
        private fs: FileSystem,
        stateRoot: string,
        private logger: Logger
    ) {
        this.dir = path.join(stateRoot, 'goals')
    }

    async initialize(mission: Mission, items: string[]): Promise<GoalState> {
        const state: GoalState = {
            missionId: mission.id,
            primeDirective: mission.primeDirective,
            checklist: items.map((item) => ({ item, done: false })),
        }
        await this.persist(state)
        return structuredClone(state)
    }

    async recite(missionId: string): Promise<GoalState> {
        const cached = this.live.get(missionId)
        if (cached) return structuredClone(cached)

        const file = this.goalPath(missionId)
        if (!(await this.fs.exists(file))) {
            throw new PermanentError(`No goal state for mission ${missionId}`)
        }
        const state = GoalStateSchema.parse(await this.fs.readJSON(file))
        this.live.set(missionId, state)
        return structuredClone(state)
    }

    async addItem(missionId: string, item: string): Promise<void> {
        const state = await this.recite(missionId)
        if (state.checklist.some((c) => c.item === item)) return
        state.checklist.push({ item, done: false })
        await this.persist(state)
    }

    async markDone(missionId: string, item: string): Promise<boolean> {
        const state = await this.recite(missionId)
        const entry = state.checklist.find((c) => c.item === item && !c.done)
        if (!entry) return false
        entry.done = true
        await this.persist(state)
        this.logger.info({ missionId, item }, 'goal:item-done')
        return true
    }

    private async persist(state: GoalState): Promise<void> {
        const file = this.goalPath(state.missionId)
        const temp = `${file}.tmp`
        await this.fs.mkdir(this.dir)
        await this.fs.writeJSON(temp, state)
        await this.fs.rename(temp, file)
        this.live.set(state.missionId, structuredClone(state))
    }

    private goalPath(missionId: string): string {
        return path.join(this.dir, `${missionId}.json`)
    }
}
