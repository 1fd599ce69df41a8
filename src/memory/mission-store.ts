import path from 'node:path'
import { PermanentError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { type MissionSnapshot, MissionSnapshotSchema } from './schemas.js'

export class MissionStore {
    private readonly dir: string

    constructor(
        private fs: FileSystem,
        stateRoot: string,
        private logger: Logger
    ) {
        this.dir = path.join(stateRoot, 'missions')
    }

    async save(snapshot: MissionSnapshot): Promise<void> {
        const file = this.missionPath(snapshot.mission.id)
        const temp = `${file}.tmp`
        await this.fs.mkdir(this.dir)
        await this.fs.writeJSON(temp, snapshot)
        await this.fs.rename(temp, file)
        this.logger.debug({ missionId: snapshot.mission.id, tasks: snapshot.tasks.length }, 'mission:saved')
    }

    async load(missionId: string): Promise<MissionSnapshot | null> {
        const file = this.missionPath(missionId)
        if (!(await this.fs.exists(file))) return null

        const parsed = MissionSnapshotSchema.safeParse(await this.fs.readJSON(file))
        if (!parsed.success) {
            throw new PermanentError(`Mission file ${file} is corrupt: ${parsed.error.message}`)
        }
        return parsed.data
    }

    async list(): Promise<MissionSnapshot[]> {
        const files = await this.fs.list(this.dir)
        const snapshots: MissionSnapshot[] = []
        for (const file of files.filter((f) => f.endsWith('.json'))) {
            try {
                const snapshot = await this.load(file.slice(0, -'.json'.length))
                if (snapshot) snapshots.push(snapshot)
            } catch (error) {
                this.logger.warn({ file, error }, 'mission:unreadable')
            }
        }
        return snapshots.sort((a, b) => a.mission.createdAt.localeCompare(b.mission.createdAt))
    }

    private missionPath(missionId: string): string {
        return path.join(this.dir, `${missionId}.json`)
    }
}
