import { appendFile, mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON(path: string): Promise<unknown>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    appendText(path: string, content: string): Promise<void>
    rename(from: string, to: string): Promise<void>
    exists(path: string): Promise<boolean>
    list(dir: string): Promise<string[]>
    mkdir(path: string): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async readJSON(filePath: string): Promise<unknown> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await writeFile(filePath, content, 'utf8')
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        await this.writeText(filePath, JSON.stringify(data, null, 2))
    }

    async appendText(filePath: string, content: string): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true })
        await appendFile(filePath, content, 'utf8')
    }

    async rename(from: string, to: string): Promise<void> {
        await rename(from, to)
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await stat(filePath)
            return true
        } catch {
            return false
        }
    }

    async list(dir: string): Promise<string[]> {
        if (!(await this.exists(dir))) return []
        const entries = await readdir(dir)
        return entries.sort()
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { recursive: true, force: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return content
    }

    async readJSON(filePath: string): Promise<unknown> {
        return JSON.parse(await this.readText(filePath))
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, content)
    }

    async writeJSON(filePath: string, data: unknown): Promise<void> {
        this.files.set(filePath, JSON.stringify(data, null, 2))
    }

    async appendText(filePath: string, content: string): Promise<void> {
        this.files.set(filePath, (this.files.get(filePath) ?? '') + content)
    }

    async rename(from: string, to: string): Promise<void> {
        const content = await this.readText(from)
        this.files.delete(from)
        this.files.set(to, content)
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath)
    }

    async list(dir: string): Promise<string[]> {
        const prefix = dir.endsWith('/') ? dir : `${dir}/`
        const names = new Set<string>()
        for (const key of this.files.keys()) {
            if (!key.startsWith(prefix)) continue
            const rest = key.slice(prefix.length)
            const [first] = rest.split('/')
            if (first) names.add(first)
        }
        return [...names].sort()
    }

    async mkdir(_path: string): Promise<void> {}

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}
