import { execaCommand } from 'execa'
import { z } from 'zod'
import type { Tool } from '../types.js'

const ShellInput = z.object({
    command: z.string().min(1).describe('Shell command to execute'),
    cwd: z.string().optional().describe('Working directory (default: project root)'),
})

type ShellInput = z.infer<typeof ShellInput>

export const shellTool: Tool<ShellInput> = {
    name: 'shell',
    description: 'Execute a shell command and return exit code, stdout and stderr',
    parameters: ShellInput,
    requiredPermission: 'execute',
    async execute(input, ctx) {
        const { stdout, stderr, exitCode } = await execaCommand(input.command, {
            cwd: input.cwd ?? ctx.cwd,
            reject: false,
            shell: true,
            cancelSignal: ctx.signal,
        })

        const code = exitCode ?? 1
        return {
            ok: code === 0,
            output: [stdout, stderr].filter(Boolean).join('\n') || '(no output)',
            exitCode: code,
            stderr,
        }
    },
    async healthCheck(ctx) {
        const { exitCode } = await execaCommand('true', { cwd: ctx.cwd, reject: false, shell: true })
        return exitCode === 0
    },
}
