import path from 'node:path'
import { z } from 'zod'
import type { Tool } from '../types.js'

const WriteInput = z.object({
    path: z.string().describe('File path, absolute or relative to the project root'),
    content: z.string().describe('Content to write to the file'),
})

type WriteInput = z.infer<typeof WriteInput>

export const writeFileTool: Tool<WriteInput> = {
    name: 'write_file',
    description: 'Write content to a file, creating it if needed',
    parameters: WriteInput,
    requiredPermission: 'write',
    async execute(input, ctx) {
        const target = path.resolve(ctx.cwd, input.path)
        await ctx.fs.writeText(target, input.content)
        return `File written: ${target}`
    },
}
