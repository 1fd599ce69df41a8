import { describe, expect, it } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { readFileTool } from '../../../src/tools/filesystem/read.js'
import { writeFileTool } from '../../../src/tools/filesystem/write.js'
import type { ToolContext } from '../../../src/tools/types.js'

function context(fs: MockFileSystem): ToolContext {
    return { fs, cwd: '/project', signal: new AbortController().signal }
}

describe('read_file and write_file', () => {
    it('writes relative to the project root and reads back', async () => {
        const fs = new MockFileSystem()
        expect(await writeFileTool.execute({ path: 'notes/a.txt', content: 'one\ntwo\nthree' }, context(fs))).toBe(
            'File written: /project/notes/a.txt'
        )
        expect(await readFileTool.execute({ path: 'notes/a.txt' }, context(fs))).toBe('one\ntwo\nthree')
    })

    it('reads a window of lines', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/a.txt', 'one\ntwo\nthree\nfour')
        expect(await readFileTool.execute({ path: 'a.txt', offset: 1, maxLines: 2 }, context(fs))).toBe('two\nthree')
    })

    it('health-checks by checking the project root exists', async () => {
        const fs = new MockFileSystem()
        expect(await readFileTool.healthCheck?.(context(fs))).toBe(false)
        fs.setFile('/project', '')
        expect(await readFileTool.healthCheck?.(context(fs))).toBe(true)
    })
})
