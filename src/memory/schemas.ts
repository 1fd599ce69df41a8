import { z } from 'zod'

export const ReflexionRecordSchema = z.object({
    missionId: z.string(),
    taskId: z.number().int(),
    action: z.string(),
    observation: z.string(),
    evaluationScore: z.number(),
    reflectionText: z.string(),
    timestamp: z.string(),
    category: z.enum(['action', 'corrective', 'research', 'escalation', 'resolution']),
})

export const KnowledgeBaseDocumentSchema = z.object({
    name: z.string(),
    version: z.number().int().min(0),
    content: z.string(),
    updatedAt: z.string(),
})

export const KnowledgeBaseChangeSchema = z.object({
    name: z.string(),
    fromVersion: z.number().int().min(0),
    toVersion: z.number().int().min(1),
    previousContent: z.string(),
    content: z.string(),
    at: z.string(),
})

export type KnowledgeBaseChange = z.infer<typeof KnowledgeBaseChangeSchema>

const BlockedReasonSchema = z.enum([
    'pending-research',
    'CircuitBreakerTripped',
    'ResearchExhausted',
    'KnowledgeBaseConflict',
    'ToolUnauthorized',
    'SearchExhausted',
])

export const TaskSchema = z.object({
    id: z.number().int(),
    missionId: z.string(),
    description: z.string(),
    dependencies: z.array(z.number().int()),
    state: z.enum(['Pending', 'Running', 'Succeeded', 'Failed', 'Blocked', 'Cancelled']),
    retryCount: z.number().int().min(0),
    escalationTier: z.enum(['none', 'reflexion', 'meta-cognition']),
    result: z.string().optional(),
    kind: z.enum(['planned', 'corrective']),
    tags: z.array(z.string()),
    requiredCapabilities: z.array(z.string()),
    parentTaskId: z.number().int().optional(),
    awaitingCorrection: z.number().int().optional(),
    blockedReason: BlockedReasonSchema.optional(),
    researchAttempts: z.number().int().min(0),
    resolvedGaps: z.array(z.string()),
    attempts: z.number().int().min(0),
    artifacts: z.array(z.object({ path: z.string(), content: z.string().optional() })),
})

export const GoalStateSchema = z.object({
    missionId: z.string(),
    primeDirective: z.string(),
    checklist: z.array(z.object({ item: z.string(), done: z.boolean() })),
})

export const MissionSchema = z.object({
    id: z.string(),
    primeDirective: z.string(),
    createdAt: z.string(),
    status: z.enum(['active', 'succeeded', 'failed', 'blocked', 'cancelled']),
})

export const ProtocolTransitionSchema = z.object({
    missionId: z.string(),
    taskId: z.number().int(),
    tier: z.enum(['reflexion', 'meta-cognition']),
    state: z.enum([
        'Detected',
        'Categorized',
        'HypothesisFormed',
        'CorrectiveTaskInjected',
        'Retrying',
        'Resolved',
        'CircuitBreakerTripped',
        'GapIdentified',
        'MetaTaskEscalated',
        'Researching',
        'HeuristicSynthesized',
        'KnowledgeBaseUpdated',
        'Requeued',
    ]),
    at: z.string(),
    detail: z.string().optional(),
})

export const MissionSnapshotSchema = z.object({
    schemaVersion: z.literal(1),
    mission: MissionSchema,
    tasks: z.array(TaskSchema),
    transitions: z.array(ProtocolTransitionSchema),
    updatedAt: z.string(),
})

export type MissionSnapshot = z.infer<typeof MissionSnapshotSchema>
