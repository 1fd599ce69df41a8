import type { CapabilityRegistry } from '../../capabilities/registry.js'
import { InvalidPlanError } from '../../core/errors.js'
import type { Mission, Task, TaskId } from '../../core/types.js'
import type { Logger } from '../../logger/index.js'
import { PlanDraftSchema } from '../../reasoning/schemas.js'
import type { ReasoningModel } from '../../reasoning/types.js'
import { assertAcyclic, createTask } from './task-manager.js'

export interface Plan {
    missionId: string
    tasks: Task[]
}

export class Planner {
    constructor(
        private model: ReasoningModel,
        private capabilities: CapabilityRegistry,
        private logger: Logger
    ) {}

    /**
     * Asks the reasoning model for a draft and turns it into numbered tasks. Ids follow draft order, which
     * makes the lowest-id tie-break in scheduling follow the order the model listed the work in.
     */
    async decompose(mission: Mission, signal?: AbortSignal): Promise<Plan> {
        const raw = await this.model.decompose(mission.primeDirective, this.capabilities.list(), signal)
        const parsed = PlanDraftSchema.safeParse(raw)
        if (!parsed.success) {
            throw new InvalidPlanError(`Malformed plan: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
        }

        const ids = new Map<string, TaskId>()
        for (const [index, draft] of parsed.data.tasks.entries()) {
            if (ids.has(draft.key)) throw new InvalidPlanError(`Duplicate task key '${draft.key}'`)
            ids.set(draft.key, index + 1)
        }

        const tasks = parsed.data.tasks.map((draft, index) => {
            const dependencies = draft.dependsOn.map((key) => {
                const id = ids.get(key)
                if (id === undefined) throw new InvalidPlanError(`Task '${draft.key}' depends on unknown key '${key}'`)
                return id
            })
            return createTask(
                mission.id,
                index + 1,
                {
                    description: draft.description,
                    kind: 'planned',
                    tags: draft.tags,
                    requiredCapabilities: draft.requiredCapabilities,
                    artifacts: draft.artifacts.map((path) => ({ path })),
                },
                [...new Set(dependencies)]
            )
        })

        assertAcyclic(tasks)
        this.logger.info({ missionId: mission.id, tasks: tasks.length }, 'plan:decomposed')
        return { missionId: mission.id, tasks }
    }
}
