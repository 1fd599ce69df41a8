import { describe, expect, it, vi } from 'vitest'
import { KnowledgeBaseConflict, PermanentError } from '../../../src/core/errors.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { KnowledgeBaseStore } from '../../../src/memory/knowledge-base.js'
import { FIXED_NOW, STATE_ROOT, fixedClock, silentLogger } from '../../helpers/fakes.js'

function setup() {
    const fs = new MockFileSystem()
    const eventBus = new TypedEventEmitter()
    const kb = new KnowledgeBaseStore(fs, STATE_ROOT, eventBus, silentLogger(), fixedClock())
    return { fs, eventBus, kb }
}

describe('KnowledgeBaseStore', () => {
    it('reads a missing document as version 0', async () => {
        const { kb } = setup()
        expect(await kb.read('operator')).toEqual({
            name: 'operator',
            version: 0,
            content: '',
            updatedAt: '1970-01-01T00:00:00.000Z',
        })
    })

    it('commits a write against the expected version', async () => {
        const { kb, fs, eventBus } = setup()
        const commits = vi.fn()
        eventBus.on('kb:commit', commits)

        const result = await kb.write('operator', '- prefer npm ci', 0)

        expect(result).toEqual({
            ok: true,
            value: { name: 'operator', version: 1, content: '- prefer npm ci', updatedAt: FIXED_NOW.toISOString() },
        })
        expect(await kb.read('operator')).toMatchObject({ version: 1, content: '- prefer npm ci' })
        expect(commits).toHaveBeenCalledWith({ name: 'operator', version: 1 })
        expect([...fs.getFiles().keys()].filter((f) => f.endsWith('.tmp'))).toEqual([])
    })

    it('rejects a stale write without touching the document', async () => {
        const { kb } = setup()
        await kb.write('operator', 'first', 0)

        const result = await kb.write('operator', 'stale', 0)

        expect(result).toEqual({
            ok: false,
            error: { kind: 'VersionConflict', name: 'operator', expectedVersion: 0, actualVersion: 1 },
        })
        expect((await kb.read('operator')).content).toBe('first')
    })

    it('records every committed change in the history', async () => {
        const { kb } = setup()
        await kb.write('operator', 'one', 0)
        await kb.write('operator', 'two', 1)

        expect(await kb.history('operator')).toEqual([
            { name: 'operator', fromVersion: 0, toVersion: 1, previousContent: '', content: 'one', at: FIXED_NOW.toISOString() },
            { name: 'operator', fromVersion: 1, toVersion: 2, previousContent: 'one', content: 'two', at: FIXED_NOW.toISOString() },
        ])
        expect(await kb.history('unknown')).toEqual([])
    })

    it('lists documents by name', async () => {
        const { kb } = setup()
        await kb.write('operator', 'a', 0)
        await kb.write('builder', 'b', 0)
        expect(await kb.list()).toEqual(['builder', 'operator'])
    })

    it('refuses names that would escape the persona directory', async () => {
        const { kb } = setup()
        await expect(kb.read('../secrets')).rejects.toBeInstanceOf(PermanentError)
    })

    it('recomputes the loser of a concurrent update against the winner', async () => {
        const { kb } = setup()
        const seen: number[] = []
        let release = () => {}
        const bothRead = new Promise<void>((resolve) => {
            release = resolve
        })
        // Both updates read version 0 before either writes, so exactly one of them conflicts
        const append = (line: string) => async (doc: { version: number; content: string }) => {
            seen.push(doc.version)
            if (seen.length === 2) release()
            await bothRead
            return `${doc.content}${line}\n`
        }

        await Promise.all([kb.update('operator', append('A'), 3), kb.update('operator', append('B'), 3)])

        const doc = await kb.read('operator')
        expect(doc.version).toBe(2)
        expect(doc.content.split('\n').filter(Boolean).sort()).toEqual(['A', 'B'])
        expect(seen).toEqual([0, 0, 1])
        expect((await kb.history('operator')).map((c) => c.fromVersion)).toEqual([0, 1])
    })

    it('gives up after the configured number of conflicting attempts', async () => {
        const { kb } = setup()
        const compute = async (doc: { version: number }) => {
            await kb.write('operator', 'someone else', doc.version)
            return 'mine'
        }

        const failure = kb.update('operator', compute, 2)
        await expect(failure).rejects.toBeInstanceOf(KnowledgeBaseConflict)
        await expect(failure).rejects.toThrow("Persona 'operator' kept changing underneath 2 write attempts")
        expect(await kb.read('operator')).toMatchObject({ version: 2, content: 'someone else' })
    })
})
