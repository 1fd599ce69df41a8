import type { ZodType, ZodTypeDef } from 'zod'
import type { FileSystem } from '../core/fs.js'
import type { Observation, Permission } from '../core/types.js'

export interface ToolContext {
    fs: FileSystem
    cwd: string
    signal: AbortSignal
}

export interface Tool<TInput = unknown> {
    name: string
    description: string
    parameters: ZodType<TInput, ZodTypeDef, unknown>
    requiredPermission: Permission
    execute(input: TInput, ctx: ToolContext): Promise<Observation | string>
    /** Cheap read-only check that the tool can run here. */
    healthCheck?(ctx: ToolContext): Promise<boolean>
}

export type AnyTool = Tool<unknown>
