import pino from 'pino'
import { z } from 'zod'
import { DEFAULT_CONFIG } from '../../src/config/defaults.js'
import type { ResolvedConfig } from '../../src/config/schema.js'
import type { Observation, Permission, Task } from '../../src/core/types.js'
import { createTask, type NewTask } from '../../src/engine/plan/task-manager.js'
import type { EscalationPayload, HumanEscalationChannel } from '../../src/escalation/channel.js'
import type { Logger } from '../../src/logger/index.js'
import type { AgentContext } from '../../src/memory/context-curator.js'
import type { AnyTool } from '../../src/tools/types.js'

export const PROJECT_DIR = '/project'
export const STATE_ROOT = '/project/.recourse'
export const FIXED_NOW = new Date('2026-01-02T03:04:05.000Z')

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}

export function fixedClock(): () => Date {
    return () => FIXED_NOW
}

export function stripAnsi(text: string): string {
    return text.replace(/\u001b\[[0-9;]*m/g, '')
}

export type ConfigOverrides = Partial<Omit<ResolvedConfig, 'protocol' | 'tot' | 'capabilities' | 'context'>> & {
    protocol?: Partial<ResolvedConfig['protocol']>
    tot?: Partial<ResolvedConfig['tot']>
    capabilities?: Partial<ResolvedConfig['capabilities']>
    context?: Partial<ResolvedConfig['context']>
}

export function testConfig(overrides: ConfigOverrides = {}): ResolvedConfig {
    return {
        ...DEFAULT_CONFIG,
        ...overrides,
        apiKey: 'test-secret',
        logLevel: 'silent',
        projectDir: PROJECT_DIR,
        configDir: '/config',
        protocol: { ...DEFAULT_CONFIG.protocol, ...overrides.protocol },
        tot: { ...DEFAULT_CONFIG.tot, ...overrides.tot },
        capabilities: { ...DEFAULT_CONFIG.capabilities, ...overrides.capabilities },
        context: { ...DEFAULT_CONFIG.context, ...overrides.context },
        permissions: { ...DEFAULT_CONFIG.permissions, ...overrides.permissions },
    }
}

export function makeTask(overrides: Partial<Task> = {}, fields: Partial<NewTask> = {}): Task {
    const base = createTask(overrides.missionId ?? 'm1', overrides.id ?? 1, { description: 'Build the project', kind: 'planned', ...fields }, [])
    return { ...base, ...overrides }
}

export type ToolRun = (args: Record<string, unknown>) => Observation | string | Promise<Observation | string>

export function fakeTool(
    name: string,
    run: ToolRun,
    options: { description?: string; permission?: Permission; healthCheck?: () => Promise<boolean> } = {}
): AnyTool {
    return {
        name,
        description: options.description ?? `Fake ${name} tool`,
        parameters: z.record(z.unknown()),
        requiredPermission: options.permission ?? 'execute',
        async execute(input) {
            return run(z.record(z.unknown()).parse(input))
        },
        healthCheck: options.healthCheck,
    }
}

/** Shell stand-in that answers from a queue of results; the last one repeats. */
export function scriptedShell(results: Observation[]): { tool: AnyTool; commands: string[] } {
    const commands: string[] = []
    let index = 0
    const tool = fakeTool(
        'shell',
        (args) => {
            commands.push(String(args.command ?? ''))
            const result = results[Math.min(index, results.length - 1)]
            index++
            if (!result) throw new Error('scriptedShell has no results')
            return result
        },
        { description: 'Execute a shell command and return exit code, stdout and stderr' }
    )
    return { tool, commands }
}

export function exited(code: number, output: string): Observation {
    return code === 0 ? { ok: true, output, exitCode: 0, stderr: '' } : { ok: false, output, exitCode: code, stderr: output }
}

export class RecordingEscalationChannel implements HumanEscalationChannel {
    readonly payloads: EscalationPayload[] = []

    async escalate(payload: EscalationPayload): Promise<void> {
        this.payloads.push(payload)
    }
}

export function emptyContext(missionId = 'm1'): AgentContext {
    return {
        goal: { missionId, primeDirective: 'Build the project', checklist: [] },
        capabilities: [],
        personas: [],
        reflections: [],
        text: '',
        manifest: { sections: [], totalTokens: 0, budget: 0 },
    }
}
