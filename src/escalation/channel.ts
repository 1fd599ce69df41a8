import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import type { EscalationReason, ReflexionRecord, TaskId } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export interface EscalationPayload {
    missionId: string
    taskId: TaskId
    reason: EscalationReason
    history: ReflexionRecord[]
}

/** Operator-facing outlet for blocked or crashed tasks. Resolutions come back through the mission runner. */
export interface HumanEscalationChannel {
    escalate(payload: EscalationPayload): Promise<void>
}

export class LoggingEscalationChannel implements HumanEscalationChannel {
    constructor(private logger: Logger) {}

    async escalate(payload: EscalationPayload): Promise<void> {
        this.logger.warn(
            { missionId: payload.missionId, taskId: payload.taskId, reason: payload.reason, records: payload.history.length },
            'escalation:raised'
        )
    }
}

export class FileEscalationChannel implements HumanEscalationChannel {
    private readonly dir: string

    constructor(
        private fs: FileSystem,
        stateRoot: string,
        private now: () => Date = () => new Date()
    ) {
        this.dir = path.join(stateRoot, 'escalations')
    }

    async escalate(payload: EscalationPayload): Promise<void> {
        const file = path.join(this.dir, `${payload.missionId}-${payload.taskId}.json`)
        const temp = `${file}.tmp`
        await this.fs.mkdir(this.dir)
        await this.fs.writeJSON(temp, { ...payload, raisedAt: this.now().toISOString() })
        await this.fs.rename(temp, file)
    }
}

export class CompositeEscalationChannel implements HumanEscalationChannel {
    constructor(private channels: HumanEscalationChannel[]) {}

    async escalate(payload: EscalationPayload): Promise<void> {
        await Promise.all(this.channels.map((c) => c.escalate(payload)))
    }
}
