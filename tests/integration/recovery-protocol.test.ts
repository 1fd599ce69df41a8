import { describe, expect, it } from 'vitest'
import type { Task } from '../../src/core/types.js'
import type { ThoughtProposal } from '../../src/reasoning/types.js'
import { exited } from '../helpers/fakes.js'
import { createHarness } from '../helpers/harness.js'
import { ScriptedReasoningModel, act, draftTask, finish } from '../helpers/scripted-model.js'

const NOT_FOUND = 'sh: tsc: command not found'

/** Corrective tasks report success straight away; planned tasks compile. */
const compileOrFix = (task: Task) => Promise.resolve(task.kind === 'corrective' ? finish('installed') : act('shell', { command: 'tsc' }))

function shellThought(command: string): ThoughtProposal {
    return { text: command, action: { tool: 'shell', args: { command } } }
}

describe('tier 1: reflexion', () => {
    it('recovers from a missing dependency with one corrective task', async () => {
        const model = new ScriptedReasoningModel({ think: compileOrFix })
        const { container, commands } = await createHarness({ model, shell: [exited(127, NOT_FOUND), exited(0, 'ok')] })

        const report = await container.runner.start('Build the project')

        expect(report.status).toBe('succeeded')
        expect(commands).toEqual(['tsc', 'tsc'])
        expect(report.tasks.map((t) => [t.id, t.kind, t.state, t.parentTaskId, t.retryCount])).toEqual([
            [1, 'planned', 'Succeeded', undefined, 1],
            [2, 'corrective', 'Succeeded', 1, 0],
        ])
        expect(report.transitions.map((t) => [t.taskId, t.state])).toEqual([
            [1, 'Detected'],
            [1, 'Categorized'],
            [1, 'HypothesisFormed'],
            [1, 'CorrectiveTaskInjected'],
            [1, 'Retrying'],
            [1, 'Resolved'],
        ])
        expect(report.transitions[1]?.detail).toBe('missing-dependency')
    })

    it('adds the corrective task to the goal checklist and ticks both off', async () => {
        const model = new ScriptedReasoningModel({ think: compileOrFix })
        const { container } = await createHarness({ model, shell: [exited(127, NOT_FOUND), exited(0, 'ok')] })

        await container.runner.start('Build the project')

        expect((await container.goals.recite('m1')).checklist).toEqual([
            { item: 'Build the project', done: true },
            { item: 'Fix: Build the project', done: true },
        ])
    })

    it('reflects on every action, successful or not', async () => {
        const model = new ScriptedReasoningModel({ think: compileOrFix })
        const { container } = await createHarness({ model, shell: [exited(127, NOT_FOUND), exited(0, 'ok')] })

        await container.runner.start('Build the project')

        expect(container.memory.forTask('m1', 1).map((r) => [r.category, r.evaluationScore])).toEqual([
            ['action', 0],
            ['corrective', 0],
            ['action', 1],
        ])
        expect(container.memory.forTask('m1', 2).map((r) => r.action)).toEqual(['finish'])
        expect(container.capabilities.get('shell')?.confidenceScore).toBeCloseTo(0.3)
    })

    it('trips the circuit breaker and escalates after maxRetries corrections', async () => {
        const model = new ScriptedReasoningModel({ think: compileOrFix })
        const { container, commands, escalation } = await createHarness({ model, shell: [exited(127, NOT_FOUND)] })

        const report = await container.runner.start('Build the project')

        expect(report.status).toBe('blocked')
        expect(commands).toHaveLength(4)
        expect(report.tasks.filter((t) => t.kind === 'corrective').map((t) => t.id)).toEqual([2, 3, 4])
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'CircuitBreakerTripped' }])
        expect(report.transitions.filter((t) => t.state === 'CircuitBreakerTripped')).toHaveLength(1)

        const records = container.memory.forTask('m1', 1)
        expect(records.filter((r) => r.category === 'corrective')).toHaveLength(3)
        expect(records.at(-1)).toMatchObject({ category: 'escalation', observation: 'CircuitBreakerTripped' })

        expect(escalation.payloads).toHaveLength(1)
        expect(escalation.payloads[0]).toMatchObject({ missionId: 'm1', taskId: 1, reason: 'CircuitBreakerTripped' })
        expect(escalation.payloads[0]?.history).toHaveLength(records.length)
    })

    it('keeps retrying through reflexion while the failing tool loses confidence', async () => {
        const model = new ScriptedReasoningModel({
            decompose: async () => ({ tasks: [draftTask('build', 'Build the project', { requiredCapabilities: ['shell'] })] }),
            think: compileOrFix,
        })
        const { container, commands, research, escalation } = await createHarness({ model, shell: [exited(127, NOT_FOUND)] })

        const report = await container.runner.start('Build the project')

        expect(report.status).toBe('blocked')
        expect(commands).toHaveLength(4)
        expect(research.queries).toEqual([])
        expect(report.transitions.map((t) => t.state)).not.toContain('GapIdentified')
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'CircuitBreakerTripped' }])
        expect(escalation.payloads).toHaveLength(1)
        expect((await container.knowledgeBase.read('operator')).version).toBe(0)
    })
})

describe('tier 2: meta-cognition', () => {
    const fetchPlan = async () => ({
        tasks: [draftTask('fetch', 'Fetch the release notes', { requiredCapabilities: ['http request'] })],
    })

    it('researches a missing capability, commits a heuristic and requeues the task', async () => {
        const seen: string[] = []
        const model = new ScriptedReasoningModel({
            decompose: fetchPlan,
            think: async (_task, context) => {
                seen.push(context.text)
                return finish('fetched with curl')
            },
        })
        const { container, research } = await createHarness({
            model,
            findings: [{ source: 'notes', summary: 'Use curl through the shell' }],
        })

        const report = await container.runner.start('Publish the release')

        expect(report.status).toBe('succeeded')
        expect(research.queries).toHaveLength(1)
        expect(report.transitions.map((t) => [t.state, t.detail])).toEqual([
            ['GapIdentified', 'http request (confidence 0.00)'],
            ['MetaTaskEscalated', 'http request'],
            ['Researching', undefined],
            ['HeuristicSynthesized', 'Use curl through the shell'],
            ['KnowledgeBaseUpdated', 'operator v1'],
            ['Requeued', undefined],
        ])
        expect(report.tasks[0]).toMatchObject({ state: 'Succeeded', retryCount: 0, researchAttempts: 1, attempts: 2 })
        expect(seen).toHaveLength(1)
        expect(seen[0]).toContain('## Persona: operator (v1)\n\n# Operating heuristics\n- Use curl through the shell')
    })

    it('blocks with ResearchExhausted when research finds nothing', async () => {
        const model = new ScriptedReasoningModel({ decompose: fetchPlan })
        const { container, escalation } = await createHarness({ model, findings: [] })

        const report = await container.runner.start('Publish the release')

        expect(report.status).toBe('blocked')
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'ResearchExhausted' }])
        expect(escalation.payloads.map((p) => p.reason)).toEqual(['ResearchExhausted'])
        expect((await container.knowledgeBase.read('operator')).version).toBe(0)
    })

    it('leaves a task that crashes mid-research Failed for resume and tells the operator', async () => {
        const model = new ScriptedReasoningModel({
            decompose: fetchPlan,
            synthesizeHeuristic: async () => {
                throw new Error('LLM 503 after retries')
            },
        })
        const { container, escalation } = await createHarness({
            model,
            findings: [{ source: 'notes', summary: 'Use curl through the shell' }],
        })

        const report = await container.runner.start('Publish the release')

        expect(report.status).toBe('blocked')
        expect(report.tasks[0]).toMatchObject({ state: 'Failed', result: 'LLM 503 after retries' })
        expect(report.tasks[0]?.blockedReason).toBeUndefined()
        expect(report.blocked).toEqual([])
        expect(report.failed).toEqual([{ taskId: 1, detail: 'LLM 503 after retries' }])
        expect(escalation.payloads).toHaveLength(1)
        expect(escalation.payloads.map((p) => p.reason)).toEqual(['AttemptCrashed'])
        expect(container.memory.forTask('m1', 1).at(-1)).toMatchObject({
            category: 'escalation',
            observation: 'AttemptCrashed: LLM 503 after retries',
        })
    })

    it('treats a call to an unregistered tool as a gap', async () => {
        const model = new ScriptedReasoningModel({ think: async () => act('kubectl', { args: 'apply' }) })
        const { container, research } = await createHarness({
            model,
            findings: [{ source: 'docs', summary: 'Deploy with the shell instead' }],
        })

        const report = await container.runner.start('Deploy')

        expect(research.queries[0]).toContain("without a 'kubectl' capability")
        expect(report.transitions.map((t) => t.state)).toContain('KnowledgeBaseUpdated')
        expect(report.status).toBe('blocked')
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'ResearchExhausted' }])
    })
})

describe('escalation to search', () => {
    it('searches alternatives for a complex task and falls back to the next one', async () => {
        const model = new ScriptedReasoningModel({
            decompose: async () => ({
                tasks: [draftTask('arch', 'Choose the service architecture', { tags: ['architecture-selection'] })],
            }),
            proposeThoughts: async () => [shellThought('monolith'), shellThought('micro')],
            scoreThought: async (_task, _path, candidate) => (candidate.text === 'monolith' ? 8 : 6),
        })
        const { container, commands } = await createHarness({
            model,
            shell: [exited(1, 'build failed'), exited(0, 'services up')],
            config: { tot: { beamWidth: 2, maxDepth: 2 } },
        })

        const report = await container.runner.start('Ship the platform')

        expect(report.status).toBe('succeeded')
        expect(commands).toEqual(['monolith', 'micro'])
        expect(report.tasks[0]?.result).toBe('services up')
        expect(model.calls.think).toBe(0)
    })

    it('blocks with SearchExhausted when no alternative works', async () => {
        const model = new ScriptedReasoningModel({
            think: async () => act('shell', { command: 'make' }),
            proposeThoughts: async () => [shellThought('make all')],
            scoreThought: async () => 7,
        })
        const { container, escalation } = await createHarness({
            model,
            shell: [exited(2, 'it broke')],
            config: { tot: { beamWidth: 1, maxDepth: 1 } },
        })

        const report = await container.runner.start('Build')

        expect(report.blocked).toEqual([{ taskId: 1, reason: 'SearchExhausted' }])
        expect(escalation.payloads.map((p) => p.reason)).toEqual(['SearchExhausted'])
    })

    it('counts failed scoring calls in the escalation record', async () => {
        const model = new ScriptedReasoningModel({
            think: async () => act('shell', { command: 'make' }),
            proposeThoughts: async () => [shellThought('make all'), shellThought('make clean all')],
            scoreThought: async () => {
                throw new Error('scorer offline')
            },
        })
        const { container, commands } = await createHarness({
            model,
            shell: [exited(2, 'it broke')],
            config: { tot: { beamWidth: 2, maxDepth: 1 } },
        })

        const report = await container.runner.start('Build')

        expect(commands).toEqual(['make'])
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'SearchExhausted' }])
        expect(container.memory.forTask('m1', 1).at(-1)).toMatchObject({
            category: 'escalation',
            observation: 'SearchExhausted: 2 candidates explored, 2 proposal or scoring calls failed',
        })
    })
})

describe('permissions', () => {
    it('blocks a task whose tool is not allowed and escalates', async () => {
        const model = new ScriptedReasoningModel({ think: async () => act('shell', { command: 'rm -rf build' }) })
        const { container, commands, escalation } = await createHarness({
            model,
            config: { permissions: { read: true, write: true, execute: false, web: true } },
        })

        const report = await container.runner.start('Clean the build')

        expect(commands).toEqual([])
        expect(report.blocked).toEqual([{ taskId: 1, reason: 'ToolUnauthorized' }])
        expect(escalation.payloads.map((p) => p.reason)).toEqual(['ToolUnauthorized'])
    })
})
