import type { CapabilityManifestEntry, Observation, Task, ThoughtNode, ToolAction } from '../core/types.js'
import { truncate } from '../core/text.js'
import type { LLMClient } from '../llm/types.js'
import type { AgentContext } from '../memory/context-curator.js'
import {
    ACTOR_SYSTEM_PROMPT,
    CORRECTION_SYSTEM_PROMPT,
    CRITIC_SYSTEM_PROMPT,
    HEURISTIC_SYSTEM_PROMPT,
    HYPOTHESIS_SYSTEM_PROMPT,
    PLANNER_SYSTEM_PROMPT,
    PROPOSER_SYSTEM_PROMPT,
    SCORER_SYSTEM_PROMPT,
} from './prompts.js'
import { parseWith } from './result-parser.js'
import {
    CorrectionDraftSchema,
    CritiqueResultSchema,
    HeuristicSchema,
    HypothesisSchema,
    PlanDraftSchema,
    ScoreSchema,
    ThinkDecisionSchema,
    ThoughtProposalsSchema,
} from './schemas.js'
import type {
    CorrectionDraft,
    CritiqueResult,
    FailureSummary,
    Finding,
    KnowledgeGap,
    PlanDraft,
    ReasoningModel,
    ThinkDecision,
    ThoughtProposal,
} from './types.js'

const OBSERVATION_CHARS = 4_000

function renderPath(path: ThoughtNode[]): string {
    if (path.length === 0) return '(root)'
    return path.map((n) => `${'  '.repeat(n.depth)}- ${n.text} [score ${n.score}]`).join('\n')
}

function renderFailure(failure: FailureSummary): string {
    return [
        `Action: ${failure.action}`,
        `Observation: ${truncate(failure.observation, OBSERVATION_CHARS)}`,
        failure.category ? `Category: ${failure.category}` : null,
        failure.causes.length > 0 ? `Causes: ${failure.causes.join('; ')}` : null,
    ]
        .filter(Boolean)
        .join('\n')
}

function renderAction(action: ToolAction): string {
    return `${action.tool} ${JSON.stringify(action.args)}`
}

export class LLMReasoningModel implements ReasoningModel {
    constructor(private llm: LLMClient) {}

    async decompose(directive: string, capabilities: CapabilityManifestEntry[], signal?: AbortSignal): Promise<PlanDraft> {
        const tools = capabilities.map((c) => `- ${c.toolName}: ${c.description}`).join('\n')
        const raw = await this.ask(PLANNER_SYSTEM_PROMPT, `Prime directive: ${directive}\n\nTools:\n${tools}`, signal)
        return parseWith(PlanDraftSchema, raw, 'plan')
    }

    async think(task: Task, context: AgentContext, signal?: AbortSignal): Promise<ThinkDecision> {
        const raw = await this.ask(ACTOR_SYSTEM_PROMPT, context.text, signal)
        return parseWith(ThinkDecisionSchema, raw, `decision for task ${task.id}`)
    }

    async proposeThoughts(
        task: Task,
        context: AgentContext,
        path: ThoughtNode[],
        count: number,
        signal?: AbortSignal
    ): Promise<ThoughtProposal[]> {
        const prompt = `${context.text}\n\n## Reasoning so far\n\n${renderPath(path)}\n\nPropose ${count} distinct next steps.`
        const raw = await this.ask(PROPOSER_SYSTEM_PROMPT, prompt, signal)
        const { thoughts } = parseWith(ThoughtProposalsSchema, raw, `thoughts for task ${task.id}`)
        return thoughts.slice(0, count)
    }

    async scoreThought(task: Task, path: ThoughtNode[], candidate: ThoughtProposal, signal?: AbortSignal): Promise<number> {
        const prompt = [
            `Task: ${task.description}`,
            `Reasoning so far:\n${renderPath(path)}`,
            `Candidate: ${candidate.text}`,
            candidate.action ? `Action: ${renderAction(candidate.action)}` : '',
        ].join('\n\n')
        const raw = await this.ask(SCORER_SYSTEM_PROMPT, prompt, signal)
        return parseWith(ScoreSchema, raw, 'thought score').score
    }

    async critique(task: Task, action: ToolAction, observation: Observation, signal?: AbortSignal): Promise<CritiqueResult> {
        const prompt = [
            `Task: ${task.description}`,
            `Action: ${renderAction(action)}`,
            `Succeeded: ${observation.ok}`,
            `Observation:\n${truncate(observation.output, OBSERVATION_CHARS)}`,
        ].join('\n\n')
        const raw = await this.ask(CRITIC_SYSTEM_PROMPT, prompt, signal)
        return parseWith(CritiqueResultSchema, raw, 'critique')
    }

    async hypothesize(task: Task, failure: FailureSummary, signal?: AbortSignal): Promise<string> {
        const raw = await this.ask(HYPOTHESIS_SYSTEM_PROMPT, `Task: ${task.description}\n\n${renderFailure(failure)}`, signal)
        return parseWith(HypothesisSchema, raw, 'hypothesis').hypothesis
    }

    async synthesizeCorrection(
        task: Task,
        failure: FailureSummary,
        hypothesis: string,
        signal?: AbortSignal
    ): Promise<CorrectionDraft> {
        const prompt = `Task: ${task.description}\n\n${renderFailure(failure)}\n\nHypothesis: ${hypothesis}`
        const raw = await this.ask(CORRECTION_SYSTEM_PROMPT, prompt, signal)
        return parseWith(CorrectionDraftSchema, raw, 'corrective task')
    }

    async synthesizeHeuristic(gap: KnowledgeGap, findings: Finding[], signal?: AbortSignal): Promise<string | null> {
        const prompt = [
            `Missing capability: ${gap.capability} (best confidence ${gap.confidence.toFixed(2)})`,
            `Task: ${gap.taskDescription}`,
            `Detail: ${gap.detail}`,
            `Findings:\n${findings.map((f) => `- (${f.source}) ${f.summary}`).join('\n') || '(none)'}`,
        ].join('\n\n')
        const raw = await this.ask(HEURISTIC_SYSTEM_PROMPT, prompt, signal)
        const { heuristic } = parseWith(HeuristicSchema, raw, 'heuristic')
        return heuristic?.trim() ? heuristic.trim() : null
    }

    private async ask(system: string, user: string, signal?: AbortSignal): Promise<string | null> {
        const response = await this.llm.chat({
            messages: [
                { role: 'system', content: system },
                { role: 'user', content: user },
            ],
            json: true,
            signal,
        })
        return response.content
    }
}
