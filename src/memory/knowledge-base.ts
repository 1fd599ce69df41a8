import path from 'node:path'
import { KnowledgeBaseConflict, PermanentError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { KeyedLock } from '../core/lock.js'
import { err, ok, type Result } from '../core/result.js'
import type { KnowledgeBaseDocument } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { type KnowledgeBaseChange, KnowledgeBaseChangeSchema, KnowledgeBaseDocumentSchema } from './schemas.js'

export interface VersionConflict {
    kind: 'VersionConflict'
    name: string
    expectedVersion: number
    actualVersion: number
}

const NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i

/**
 * Versioned persona documents. Writes are compare-and-set on the version and serialized per document;
 * a committed write replaces the file atomically and appends to the document's change history.
 */
export class KnowledgeBaseStore {
    private lock = new KeyedLock()
    private readonly dir: string

    constructor(
        private fs: FileSystem,
        stateRoot: string,
        private eventBus: TypedEventEmitter,
        private logger: Logger,
        private now: () => Date = () => new Date()
    ) {
        this.dir = path.join(stateRoot, 'personas')
    }

    async read(name: string): Promise<KnowledgeBaseDocument> {
        const file = this.documentPath(name)
        if (!(await this.fs.exists(file))) {
            return { name, version: 0, content: '', updatedAt: new Date(0).toISOString() }
        }
        return KnowledgeBaseDocumentSchema.parse(await this.fs.readJSON(file))
    }

    async write(name: string, newContent: string, expectedVersion: number): Promise<Result<KnowledgeBaseDocument, VersionConflict>> {
        return this.lock.run(name, async () => {
            const current = await this.read(name)
            if (current.version !== expectedVersion) {
                this.logger.debug({ name, expectedVersion, actualVersion: current.version }, 'kb:version-conflict')
                return err({ kind: 'VersionConflict', name, expectedVersion, actualVersion: current.version })
            }

            const next: KnowledgeBaseDocument = {
                name,
                version: current.version + 1,
                content: newContent,
                updatedAt: this.now().toISOString(),
            }

            const file = this.documentPath(name)
            const temp = `${file}.${next.version}.tmp`
            await this.fs.mkdir(this.dir)
            await this.fs.writeJSON(temp, next)
            await this.fs.rename(temp, file)

            const change: KnowledgeBaseChange = {
                name,
                fromVersion: current.version,
                toVersion: next.version,
                previousContent: current.content,
                content: newContent,
                at: next.updatedAt,
            }
            await this.fs.appendText(this.historyPath(name), `${JSON.stringify(change)}\n`)

            this.eventBus.emit('kb:commit', { name, version: next.version })
            this.logger.info({ name, version: next.version }, 'kb:committed')
            return ok(next)
        })
    }

    /**
     * Read, compute, compare-and-set. On conflict the content is recomputed against the latest document.
     */
    async update(
        name: string,
        compute: (current: KnowledgeBaseDocument) => string | Promise<string>,
        maxAttempts: number
    ): Promise<KnowledgeBaseDocument> {
        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const current = await this.read(name)
            const content = await compute(current)
            const result = await this.write(name, content, current.version)
            if (result.ok) return result.value
            this.logger.info({ name, attempt, actualVersion: result.error.actualVersion }, 'kb:retrying-after-conflict')
        }
        throw new KnowledgeBaseConflict(name, maxAttempts)
    }

    async history(name: string): Promise<KnowledgeBaseChange[]> {
        const file = this.historyPath(name)
        if (!(await this.fs.exists(file))) return []
        const raw = await this.fs.readText(file)
        return raw
            .split('\n')
            .filter((line) => line.trim())
            .map((line) => KnowledgeBaseChangeSchema.parse(JSON.parse(line)))
    }

    async list(): Promise<string[]> {
        const files = await this.fs.list(this.dir)
        return files.filter((f) => f.endsWith('.json')).map((f) => f.slice(0, -'.json'.length))
    }

    private documentPath(name: string): string {
        if (!NAME_PATTERN.test(name)) throw new PermanentError(`Invalid persona name '${name}'`)
        return path.join(this.dir, `${name}.json`)
    }

    private historyPath(name: string): string {
        if (!NAME_PATTERN.test(name)) throw new PermanentError(`Invalid persona name '${name}'`)
        return path.join(this.dir, `${name}.history.jsonl`)
    }
}
