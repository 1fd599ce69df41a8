import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().positive().optional(),
    logLevel: LogLevelSchema.optional(),
    stateDir: z.string().optional(),
    toolTimeoutMs: z.number().positive().optional(),
    maxConcurrentTasks: z.number().int().positive().optional(),
    protocol: z
        .object({
            maxRetries: z.number().int().min(0).optional(),
            maxStepsPerAttempt: z.number().int().positive().optional(),
            maxResearchAttempts: z.number().int().positive().optional(),
            kbMaxWriteAttempts: z.number().int().positive().optional(),
        })
        .optional(),
    tot: z
        .object({
            beamWidth: z.number().int().positive().optional(),
            maxDepth: z.number().int().positive().optional(),
            scoreThreshold: z.number().min(0).max(10).optional(),
        })
        .optional(),
    capabilities: z
        .object({
            verifyThreshold: z.number().min(0).max(1).optional(),
            minConfidence: z.number().min(0).max(1).optional(),
            successDelta: z.number().min(0).max(1).optional(),
            failureDelta: z.number().min(0).max(1).optional(),
        })
        .optional(),
    context: z
        .object({
            budgetTokens: z.number().int().positive().optional(),
            topK: z.number().int().positive().optional(),
        })
        .optional(),
    permissions: z
        .object({
            read: z.boolean().optional(),
            write: z.boolean().optional(),
            execute: z.boolean().optional(),
            web: z.boolean().optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ProtocolConfig {
    maxRetries: number
    maxStepsPerAttempt: number
    maxResearchAttempts: number
    kbMaxWriteAttempts: number
}

export interface ToTConfig {
    beamWidth: number
    maxDepth: number
    scoreThreshold: number
}

export interface CapabilityConfig {
    verifyThreshold: number
    minConfidence: number
    successDelta: number
    failureDelta: number
}

export interface ResolvedConfig {
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    maxTokens: number
    logLevel: LogLevel
    stateDir: string
    toolTimeoutMs: number
    maxConcurrentTasks: number
    protocol: ProtocolConfig
    tot: ToTConfig
    capabilities: CapabilityConfig
    context: { budgetTokens: number; topK: number }
    permissions: { read: boolean; write: boolean; execute: boolean; web: boolean }
    projectDir: string
    configDir: string
}
