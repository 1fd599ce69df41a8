import type { CapabilityRegistry } from '../capabilities/registry.js'
import { errorMessage, isAbortError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { err, ok, type Result } from '../core/result.js'
import type { Observation, TaskId, ToolError, ToolPermissions } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { ToolRegistry } from './registry.js'
import type { AnyTool, ToolContext } from './types.js'

export interface InvokeOptions {
    timeoutMs: number
    signal?: AbortSignal
    missionId: string
    taskId: TaskId
}

interface GatewayDeps {
    tools: ToolRegistry
    capabilities: CapabilityRegistry
    permissions: ToolPermissions
    verifyThreshold: number
    fs: FileSystem
    cwd: string
    eventBus: TypedEventEmitter
    logger: Logger
}

function toObservation(output: Observation | string): Observation {
    return typeof output === 'string' ? { ok: true, output } : output
}

/**
 * Single entry point for every effectful operation. A tool runs only if the capability registry knows it,
 * an implementation exists, permissions allow it, and a low-confidence tool passes its health check first.
 */
export class ToolGateway {
    constructor(private deps: GatewayDeps) {}

    async invoke(toolName: string, args: unknown, opts: InvokeOptions): Promise<Result<Observation, ToolError>> {
        const entry = this.deps.capabilities.get(toolName)
        if (!entry) {
            return err({ kind: 'NotFound', message: `Tool '${toolName}' is not in the capability registry` })
        }

        const tool = this.deps.tools.get(toolName)
        if (!tool) {
            return err({ kind: 'NotFound', message: `Tool '${toolName}' has no implementation` })
        }

        if (!this.deps.permissions[tool.requiredPermission]) {
            return err({ kind: 'Unauthorized', message: `Tool '${toolName}' requires '${tool.requiredPermission}' permission` })
        }

        if (entry.confidenceScore < this.deps.verifyThreshold) {
            const verified = await this.deps.capabilities.verify(toolName)
            if (!verified) {
                return err({ kind: 'RuntimeError', message: `Tool '${toolName}' failed its health check` })
            }
        }

        const parsed = tool.parameters.safeParse(args)
        if (!parsed.success) {
            return err({ kind: 'RuntimeError', message: `Invalid params for ${toolName}: ${parsed.error.message}` })
        }

        return this.run(tool, parsed.data, opts)
    }

    healthCheck(toolName: string): Promise<boolean> {
        const tool = this.deps.tools.get(toolName)
        if (!tool?.healthCheck) return Promise.resolve(tool !== undefined)
        return tool.healthCheck(this.context(new AbortController().signal))
    }

    private async run(tool: AnyTool, input: unknown, opts: InvokeOptions): Promise<Result<Observation, ToolError>> {
        const timeout = AbortSignal.timeout(opts.timeoutMs)
        const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout
        const { missionId, taskId } = opts

        this.deps.eventBus.emit('tool:before', { missionId, taskId, toolName: tool.name, args: input })
        const start = Date.now()

        try {
            const output = await Promise.race([tool.execute(input, this.context(signal)), abortedBy(signal)])
            const observation = toObservation(output)
            this.after(tool.name, opts, start, observation.ok)
            return ok(observation)
        } catch (error) {
            this.after(tool.name, opts, start, false)
            if (opts.signal?.aborted) throw opts.signal.reason ?? error
            if (timeout.aborted) {
                return err({ kind: 'Timeout', message: `Tool '${tool.name}' timed out after ${opts.timeoutMs}ms` })
            }
            if (isAbortError(error)) throw error
            this.deps.logger.debug({ tool: tool.name, error: errorMessage(error) }, 'tool:error')
            return err({ kind: 'RuntimeError', message: `Tool '${tool.name}' failed: ${errorMessage(error)}` })
        }
    }

    private after(toolName: string, opts: InvokeOptions, start: number, success: boolean): void {
        this.deps.eventBus.emit('tool:after', {
            missionId: opts.missionId,
            taskId: opts.taskId,
            toolName,
            duration: Date.now() - start,
            success,
        })
    }

    private context(signal: AbortSignal): ToolContext {
        return { fs: this.deps.fs, cwd: this.deps.cwd, signal }
    }
}

/** Rejects when the signal fires. A tool that ignores its signal is abandoned and its late result discarded. */
function abortedBy(signal: AbortSignal): Promise<never> {
    return new Promise((_resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason)
            return
        }
        signal.addEventListener('abort', () => reject(signal.reason), { once: true })
    })
}
