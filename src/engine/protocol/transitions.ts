import type { ProtocolState, ProtocolTransition, TypedEventEmitter } from '../../core/events.js'
import type { Task } from '../../core/types.js'
import type { Logger } from '../../logger/index.js'

export class TransitionRecorder {
    constructor(
        private eventBus: TypedEventEmitter,
        private logger: Logger,
        private now: () => Date = () => new Date()
    ) {}

    record(task: Pick<Task, 'missionId' | 'id'>, tier: ProtocolTransition['tier'], state: ProtocolState, detail?: string): void {
        const transition: ProtocolTransition = {
            missionId: task.missionId,
            taskId: task.id,
            tier,
            state,
            at: this.now().toISOString(),
            detail,
        }
        this.logger.info({ taskId: task.id, tier, state, detail }, 'protocol:transition')
        this.eventBus.emit('protocol:transition', transition)
    }
}
