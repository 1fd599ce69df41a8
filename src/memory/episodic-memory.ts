import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { KeyedLock } from '../core/lock.js'
import { keywords, overlap } from '../core/text.js'
import type { ReflexionRecord, TaskId } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { ReflexionRecordSchema } from './schemas.js'

export interface RecallOptions {
    missionId?: string
    taskId?: TaskId
    k: number
}

/**
 * Append-only log of reflexion records. A record is written to disk before it becomes visible to readers,
 * and is frozen once visible.
 */
export class EpisodicMemory {
    private records: ReflexionRecord[] = []
    private lock = new KeyedLock()
    private readonly logPath: string

    constructor(
        private fs: FileSystem,
        stateRoot: string,
        private logger: Logger
    ) {
        this.logPath = path.join(stateRoot, 'memory', 'episodes.jsonl')
    }

    async load(): Promise<number> {
        if (!(await this.fs.exists(this.logPath))) return 0
        const raw = await this.fs.readText(this.logPath)
        const loaded: ReflexionRecord[] = []
        for (const [index, line] of raw.split('\n').entries()) {
            if (!line.trim()) continue
            try {
                loaded.push(Object.freeze(ReflexionRecordSchema.parse(JSON.parse(line))))
            } catch (error) {
                this.logger.warn({ line: index + 1, error }, 'episodic-memory:skipped-corrupt-line')
            }
        }
        this.records = loaded
        return loaded.length
    }

    async append(record: ReflexionRecord): Promise<ReflexionRecord> {
        const frozen = Object.freeze({ ...record })
        await this.lock.run(this.logPath, async () => {
            await this.fs.appendText(this.logPath, `${JSON.stringify(frozen)}\n`)
            this.records.push(frozen)
        })
        return frozen
    }

    forTask(missionId: string, taskId: TaskId): ReflexionRecord[] {
        return this.records.filter((r) => r.missionId === missionId && r.taskId === taskId)
    }

    forMission(missionId: string): ReflexionRecord[] {
        return this.records.filter((r) => r.missionId === missionId)
    }

    recall(query: string, opts: RecallOptions): ReflexionRecord[] {
        const wanted = keywords(query)
        return this.records
            .map((record, index) => ({ record, index }))
            .filter(({ record }) => opts.missionId === undefined || record.missionId === opts.missionId)
            .map(({ record, index }) => {
                const text = `${record.action} ${record.observation} ${record.reflectionText}`
                const sameTask = opts.taskId !== undefined && record.taskId === opts.taskId ? 2 : 0
                return { record, index, score: overlap(wanted, keywords(text)) + sameTask }
            })
            .sort((a, b) => b.score - a.score || b.index - a.index)
            .slice(0, opts.k)
            .map(({ record }) => record)
    }

    all(): ReflexionRecord[] {
        return [...this.records]
    }

    count(): number {
        return this.records.length
    }
}
