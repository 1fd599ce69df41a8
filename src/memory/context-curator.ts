import path from 'node:path'
import type { CapabilityRegistry } from '../capabilities/registry.js'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { truncate } from '../core/text.js'
import type { CapabilityManifestEntry, GoalState, KnowledgeBaseDocument, ReflexionRecord, Task } from '../core/types.js'
import { PromptBuilder, type PromptManifest } from '../llm/prompt-builder.js'
import type { Logger } from '../logger/index.js'
import type { EpisodicMemory } from './episodic-memory.js'
import type { GoalStateManager } from './goal-state.js'
import type { KnowledgeBaseStore } from './knowledge-base.js'

export interface AgentContext {
    goal: GoalState
    capabilities: CapabilityManifestEntry[]
    personas: KnowledgeBaseDocument[]
    reflections: ReflexionRecord[]
    /** Rendered sections, highest priority first in the budget, original order in the text. */
    text: string
    manifest: PromptManifest
}

interface CuratorDeps {
    goals: GoalStateManager
    capabilities: CapabilityRegistry
    knowledgeBase: KnowledgeBaseStore
    memory: EpisodicMemory
    fs: FileSystem
    cwd: string
    topK: number
    logger: Logger
}

const PRIORITY = {
    goal: 100,
    capabilities: 80,
    personas: 70,
    reflections: 60,
    artifacts: 40,
} as const

const MAX_ARTIFACT_CHARS = 8_000

export function renderGoal(goal: GoalState): string {
    const items = goal.checklist.map((c) => `- [${c.done ? 'x' : ' '}] ${c.item}`)
    return [`Prime directive: ${goal.primeDirective}`, ...items].join('\n')
}

function renderCapability(entry: CapabilityManifestEntry): string {
    const verified = entry.verifiedAt ? `verified ${entry.verifiedAt}` : 'unverified'
    return `- ${entry.toolName} (confidence ${entry.confidenceScore.toFixed(2)}, ${verified}): ${entry.description}\n  args: ${JSON.stringify(entry.invocationSchema.properties ?? {})}`
}

function renderRecord(record: ReflexionRecord): string {
    return `- [${record.category}] task ${record.taskId} ${record.action} -> score ${record.evaluationScore.toFixed(2)}: ${truncate(record.reflectionText, 300)}`
}

/**
 * Assembles the working context for one reasoning step. The goal state is pinned so the prime directive
 * survives any budget; everything else competes by priority.
 */
export class ContextCurator {
    constructor(private deps: CuratorDeps) {}

    async buildContext(task: Task, budgetTokens: number): Promise<AgentContext> {
        const { goals, capabilities, knowledgeBase, memory } = this.deps

        const goal = await goals.recite(task.missionId)
        const relevant = capabilities.relevantTo(`${task.description} ${task.requiredCapabilities.join(' ')}`)
        const personas = await this.personas()
        const reflections = memory.recall(task.description, {
            missionId: task.missionId,
            taskId: task.id,
            k: this.deps.topK,
        })

        const builder = new PromptBuilder()
        builder.add('Goal', renderGoal(goal), PRIORITY.goal, { pinned: true })
        builder.add('Current task', `#${task.id}: ${task.description}`, PRIORITY.goal, { pinned: true })

        if (relevant.length > 0) {
            builder.add('Capabilities', relevant.map(renderCapability).join('\n'), PRIORITY.capabilities, {
                fallback: relevant.map((e) => `- ${e.toolName}`).join('\n'),
            })
        }

        for (const doc of personas) {
            builder.add(`Persona: ${doc.name} (v${doc.version})`, doc.content, PRIORITY.personas)
        }

        if (reflections.length > 0) {
            builder.add('Past reflections', reflections.map(renderRecord).join('\n'), PRIORITY.reflections)
        }

        for (const artifact of task.artifacts) {
            const content = artifact.content ?? (await this.readArtifact(artifact.path))
            if (content === null) {
                builder.add(`Artifact: ${artifact.path}`, `(unreadable) ${artifact.path}`, PRIORITY.artifacts)
                continue
            }
            builder.add(`Artifact: ${artifact.path}`, truncate(content, MAX_ARTIFACT_CHARS), PRIORITY.artifacts, {
                fallback: `Path only: ${artifact.path}`,
            })
        }

        const { prompt, manifest } = builder.buildWithManifest(budgetTokens)
        return { goal, capabilities: relevant, personas, reflections, text: prompt, manifest }
    }

    private async personas(): Promise<KnowledgeBaseDocument[]> {
        const names = await this.deps.knowledgeBase.list()
        const docs = await Promise.all(names.sort().map((name) => this.deps.knowledgeBase.read(name)))
        return docs.filter((d) => d.content.trim().length > 0)
    }

    private async readArtifact(artifactPath: string): Promise<string | null> {
        try {
            return await this.deps.fs.readText(path.resolve(this.deps.cwd, artifactPath))
        } catch (error) {
            this.deps.logger.debug({ path: artifactPath, error: errorMessage(error) }, 'context:artifact-unreadable')
            return null
        }
    }
}
