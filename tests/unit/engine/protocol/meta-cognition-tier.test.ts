import { describe, expect, it } from 'vitest'
import { KnowledgeBaseConflict } from '../../../../src/core/errors.js'
import type { ProtocolTransition } from '../../../../src/core/events.js'
import { TypedEventEmitter } from '../../../../src/core/events.js'
import { MockFileSystem } from '../../../../src/core/fs.js'
import type { KnowledgeBaseDocument, Task } from '../../../../src/core/types.js'
import { TaskManager } from '../../../../src/engine/plan/task-manager.js'
import { MetaCognitionTier, appendHeuristic } from '../../../../src/engine/protocol/meta-cognition-tier.js'
import { TransitionRecorder } from '../../../../src/engine/protocol/transitions.js'
import { EpisodicMemory } from '../../../../src/memory/episodic-memory.js'
import { KnowledgeBaseStore } from '../../../../src/memory/knowledge-base.js'
import type { Finding, KnowledgeGap } from '../../../../src/reasoning/types.js'
import { STATE_ROOT, fixedClock, makeTask, silentLogger } from '../../../helpers/fakes.js'
import { FakeResearchCollaborator, ScriptedReasoningModel } from '../../../helpers/scripted-model.js'

const GAP: KnowledgeGap = {
    capability: 'http request',
    confidence: 0,
    taskDescription: 'Build the project',
    detail: 'No registered tool matches.',
}

class ConflictingStore extends KnowledgeBaseStore {
    override async update(name: string): Promise<KnowledgeBaseDocument> {
        throw new KnowledgeBaseConflict(name, 3)
    }
}

function setup(options: { findings?: Finding[] | Error; task?: Task; conflicting?: boolean } = {}) {
    const logger = silentLogger()
    const fs = new MockFileSystem()
    const eventBus = new TypedEventEmitter()
    const transitions: ProtocolTransition[] = []
    eventBus.on('protocol:transition', (t) => transitions.push(t))
    const knowledgeBase = options.conflicting
        ? new ConflictingStore(fs, STATE_ROOT, eventBus, logger, fixedClock())
        : new KnowledgeBaseStore(fs, STATE_ROOT, eventBus, logger, fixedClock())
    const memory = new EpisodicMemory(fs, STATE_ROOT, logger)
    const research = new FakeResearchCollaborator(options.findings ?? [{ source: 'notes', summary: 'Use curl through the shell' }])
    const tier = new MetaCognitionTier({
        model: new ScriptedReasoningModel(),
        research,
        knowledgeBase,
        memory,
        transitions: new TransitionRecorder(eventBus, logger, fixedClock()),
        config: { maxResearchAttempts: 1, kbMaxWriteAttempts: 3 },
        logger,
        now: fixedClock(),
    })
    const task = options.task ?? makeTask({ requiredCapabilities: ['http request'] })
    const plan = new TaskManager('m1', [task])
    plan.markRunning(task.id)
    return { tier, plan, memory, research, knowledgeBase, transitions, task: plan.get(task.id) }
}

describe('appendHeuristic', () => {
    it('starts a heuristics list in an empty document', () => {
        expect(appendHeuristic('', 'Use curl')).toBe('# Operating heuristics\n- Use curl\n')
    })

    it('appends to existing content', () => {
        expect(appendHeuristic('# Operating heuristics\n- Use curl\n\n', 'Prefer npm ci')).toBe(
            '# Operating heuristics\n- Use curl\n- Prefer npm ci\n'
        )
    })
})

describe('MetaCognitionTier', () => {
    it('researches the gap, writes the heuristic and requeues the task', async () => {
        const { tier, plan, task, knowledgeBase, research } = setup()

        const outcome = await tier.handle(task, GAP, plan)

        expect(outcome).toEqual({ kind: 'requeued' })
        expect(await knowledgeBase.read('operator')).toMatchObject({
            version: 1,
            content: '# Operating heuristics\n- Use curl through the shell\n',
        })
        expect(research.queries).toEqual([
            `How can an agent accomplish "Build the project" without a 'http request' capability? No registered tool matches.`,
        ])
        expect(plan.get(1)).toMatchObject({
            state: 'Blocked',
            blockedReason: 'pending-research',
            researchAttempts: 1,
            resolvedGaps: ['http request'],
            retryCount: 0,
            escalationTier: 'meta-cognition',
        })
    })

    it('walks the meta-cognition states in order', async () => {
        const { tier, plan, task, transitions } = setup()
        await tier.handle(task, GAP, plan)

        expect(transitions.map((t) => [t.state, t.detail])).toEqual([
            ['GapIdentified', 'http request (confidence 0.00)'],
            ['MetaTaskEscalated', 'http request'],
            ['Researching', undefined],
            ['HeuristicSynthesized', 'Use curl through the shell'],
            ['KnowledgeBaseUpdated', 'operator v1'],
            ['Requeued', undefined],
        ])
    })

    it('notes the research in episodic memory', async () => {
        const { tier, plan, task, memory } = setup()
        await tier.handle(task, GAP, plan)

        const [note] = memory.forTask('m1', 1)
        expect(note).toMatchObject({
            action: "research for 'http request'",
            reflectionText: 'Heuristic: Use curl through the shell (sources: notes)',
            evaluationScore: 1,
            category: 'research',
        })
    })

    it('blocks once the research budget is spent', async () => {
        const { tier, plan, task, research, transitions } = setup({
            task: makeTask({ requiredCapabilities: ['http request'], researchAttempts: 1 }),
        })

        expect(await tier.handle(task, GAP, plan)).toEqual({ kind: 'blocked', reason: 'ResearchExhausted' })
        expect(research.queries).toEqual([])
        expect(transitions.map((t) => t.state)).toEqual(['GapIdentified'])
    })

    it('blocks when the findings yield no heuristic', async () => {
        const { tier, plan, task, memory, knowledgeBase } = setup({ findings: [] })

        expect(await tier.handle(task, GAP, plan)).toEqual({ kind: 'blocked', reason: 'ResearchExhausted' })
        expect(memory.forTask('m1', 1)[0]?.reflectionText).toBe('No usable heuristic from 0 findings (none).')
        expect((await knowledgeBase.read('operator')).version).toBe(0)
    })

    it('carries on without findings when research fails', async () => {
        const { tier, plan, task } = setup({ findings: new Error('offline') })
        expect(await tier.handle(task, GAP, plan)).toEqual({ kind: 'blocked', reason: 'ResearchExhausted' })
    })

    it('blocks when the persona keeps changing underneath it', async () => {
        const { tier, plan, task, transitions } = setup({ conflicting: true })

        expect(await tier.handle(task, GAP, plan)).toEqual({ kind: 'blocked', reason: 'KnowledgeBaseConflict' })
        expect(transitions.map((t) => t.state)).not.toContain('KnowledgeBaseUpdated')
    })
})
