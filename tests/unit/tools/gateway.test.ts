import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { CapabilityRegistry } from '../../../src/capabilities/registry.js'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import type { ToolPermissions } from '../../../src/core/types.js'
import { ToolGateway } from '../../../src/tools/gateway.js'
import { ToolRegistry } from '../../../src/tools/registry.js'
import { registerCapability } from '../../../src/tools/setup.js'
import type { AnyTool } from '../../../src/tools/types.js'
import { FIXED_NOW, fakeTool, fixedClock, silentLogger } from '../../helpers/fakes.js'

const OPTS = { timeoutMs: 1000, missionId: 'm1', taskId: 1 }
const ALL: ToolPermissions = { read: true, write: true, execute: true, web: true }

function setup(options: { permissions?: Partial<ToolPermissions>; verifyThreshold?: number } = {}) {
    const eventBus = new TypedEventEmitter()
    const tools = new ToolRegistry()
    const capabilities = new CapabilityRegistry(silentLogger(), fixedClock())
    const gateway = new ToolGateway({
        tools,
        capabilities,
        permissions: { ...ALL, ...options.permissions },
        verifyThreshold: options.verifyThreshold ?? 0.5,
        fs: new MockFileSystem(),
        cwd: '/project',
        eventBus,
        logger: silentLogger(),
    })
    const add = (tool: AnyTool, confidence = 0.9) => registerCapability(capabilities, tools, gateway, tool, confidence)
    return { eventBus, tools, capabilities, gateway, add }
}

describe('ToolGateway', () => {
    it('refuses a tool the capability registry does not know', async () => {
        const { gateway, tools } = setup()
        tools.register(fakeTool('shell', () => 'ran'))
        const result = await gateway.invoke('shell', {}, OPTS)
        expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: "Tool 'shell' is not in the capability registry" } })
    })

    it('refuses a capability with no implementation', async () => {
        const { gateway, capabilities } = setup()
        capabilities.register({ toolName: 'ghost', description: 'imagined', invocationSchema: {}, confidenceScore: 1, verifiedAt: null })
        const result = await gateway.invoke('ghost', {}, OPTS)
        expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: "Tool 'ghost' has no implementation" } })
    })

    it('refuses a tool whose permission is turned off', async () => {
        const { gateway, add } = setup({ permissions: { execute: false } })
        const run = vi.fn(() => 'ran')
        add(fakeTool('shell', run))
        const result = await gateway.invoke('shell', {}, OPTS)
        expect(result).toEqual({ ok: false, error: { kind: 'Unauthorized', message: "Tool 'shell' requires 'execute' permission" } })
        expect(run).not.toHaveBeenCalled()
    })

    it('health-checks a low-confidence tool before running it', async () => {
        const { gateway, add, capabilities } = setup()
        const healthCheck = vi.fn(async () => true)
        add(fakeTool('shell', () => 'ran', { healthCheck }), 0.3)

        const result = await gateway.invoke('shell', {}, OPTS)
        expect(result).toEqual({ ok: true, value: { ok: true, output: 'ran' } })
        expect(healthCheck).toHaveBeenCalledTimes(1)
        expect(capabilities.get('shell')?.verifiedAt).toBe(FIXED_NOW.toISOString())
    })

    it('does not run a tool that fails its health check', async () => {
        const { gateway, add } = setup()
        const run = vi.fn(() => 'ran')
        add(fakeTool('shell', run, { healthCheck: async () => false }), 0.3)

        const result = await gateway.invoke('shell', {}, OPTS)
        expect(result).toEqual({ ok: false, error: { kind: 'RuntimeError', message: "Tool 'shell' failed its health check" } })
        expect(run).not.toHaveBeenCalled()
    })

    it('skips the health check for a trusted tool', async () => {
        const { gateway, add } = setup()
        const healthCheck = vi.fn(async () => true)
        add(fakeTool('shell', () => 'ran', { healthCheck }), 0.9)
        await gateway.invoke('shell', {}, OPTS)
        expect(healthCheck).not.toHaveBeenCalled()
    })

    it('validates arguments against the tool schema', async () => {
        const { gateway, add } = setup()
        add({
            name: 'strict',
            description: 'needs a command',
            parameters: z.object({ command: z.string() }),
            requiredPermission: 'execute',
            execute: async () => 'ran',
        })
        const result = await gateway.invoke('strict', { command: 42 }, OPTS)
        expect(result.ok).toBe(false)
        if (!result.ok) {
            expect(result.error.kind).toBe('RuntimeError')
            expect(result.error.message.startsWith('Invalid params for strict:')).toBe(true)
        }
    })

    it('emits tool events around a successful call', async () => {
        const { gateway, add, eventBus } = setup()
        add(fakeTool('shell', () => ({ ok: true, output: 'hi', exitCode: 0 })))
        const before = vi.fn()
        const after = vi.fn()
        eventBus.on('tool:before', before)
        eventBus.on('tool:after', after)

        const result = await gateway.invoke('shell', { command: 'echo hi' }, OPTS)
        expect(result).toEqual({ ok: true, value: { ok: true, output: 'hi', exitCode: 0 } })
        expect(before).toHaveBeenCalledWith({ missionId: 'm1', taskId: 1, toolName: 'shell', args: { command: 'echo hi' } })
        expect(after).toHaveBeenCalledWith(expect.objectContaining({ toolName: 'shell', success: true }))
    })

    it('turns a thrown error into a RuntimeError', async () => {
        const { gateway, add } = setup()
        add(
            fakeTool('shell', () => {
                throw new Error('boom')
            })
        )
        const result = await gateway.invoke('shell', {}, OPTS)
        expect(result).toEqual({ ok: false, error: { kind: 'RuntimeError', message: "Tool 'shell' failed: boom" } })
    })

    it('times out a tool that does not answer', async () => {
        const { gateway, add } = setup()
        add(fakeTool('slow', () => new Promise<string>(() => {})))
        const result = await gateway.invoke('slow', {}, { ...OPTS, timeoutMs: 20 })
        expect(result).toEqual({ ok: false, error: { kind: 'Timeout', message: "Tool 'slow' timed out after 20ms" } })
    })

    it('rethrows when the caller aborts', async () => {
        const { gateway, add } = setup()
        add(fakeTool('slow', () => new Promise<string>(() => {})))
        const controller = new AbortController()
        const pending = gateway.invoke('slow', {}, { ...OPTS, signal: controller.signal })
        controller.abort(new Error('stop'))
        await expect(pending).rejects.toThrow('stop')
    })
})
