import { z } from 'zod'

export const ToolActionSchema = z.object({
    tool: z.string().min(1),
    args: z.record(z.unknown()).default({}),
})

export const DraftTaskSchema = z.object({
    key: z.string().min(1),
    description: z.string().min(1),
    dependsOn: z.array(z.string()).default([]),
    tags: z.array(z.string()).default([]),
    requiredCapabilities: z.array(z.string()).default([]),
    artifacts: z.array(z.string()).default([]),
})

export const PlanDraftSchema = z.object({
    tasks: z.array(DraftTaskSchema).min(1),
})

export const ThinkDecisionSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('act'), thought: z.string(), action: ToolActionSchema }),
    z.object({ kind: z.literal('finish'), thought: z.string(), result: z.string() }),
])

export const ThoughtProposalSchema = z.object({
    text: z.string().min(1),
    action: ToolActionSchema.optional(),
})

export const ThoughtProposalsSchema = z.object({
    thoughts: z.array(ThoughtProposalSchema),
})

export const ScoreSchema = z.object({
    score: z.number().min(0).max(10),
})

export const CritiqueResultSchema = z.object({
    score: z.number().min(0).max(1),
    reflection: z.string(),
    verdict: z.enum(['success', 'progress', 'failure', 'ambiguous']),
})

export const HypothesisSchema = z.object({
    hypothesis: z.string().min(1),
})

export const CorrectionDraftSchema = z.object({
    description: z.string().min(1),
    requiredCapabilities: z.array(z.string()).default([]),
    tags: z.array(z.string()).default([]),
})

export const HeuristicSchema = z.object({
    heuristic: z.string().nullable(),
})

export const ResearchAnswerSchema = z.object({
    findings: z.array(z.object({ source: z.string(), summary: z.string() })).default([]),
    urls: z.array(z.string().url()).default([]),
})

export type DraftTask = z.infer<typeof DraftTaskSchema>
export type PlanDraft = z.infer<typeof PlanDraftSchema>
export type ThinkDecision = z.infer<typeof ThinkDecisionSchema>
export type ThoughtProposal = z.infer<typeof ThoughtProposalSchema>
export type CritiqueResult = z.infer<typeof CritiqueResultSchema>
export type CorrectionDraft = z.infer<typeof CorrectionDraftSchema>
