import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'projectDir' | 'configDir'> = {
    model: 'anthropic/claude-sonnet-4.5',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0,
    maxTokens: 4096,
    logLevel: 'warn',
    stateDir: '.recourse',
    toolTimeoutMs: 30000,
    maxConcurrentTasks: 4,
    protocol: {
        maxRetries: 3,
        maxStepsPerAttempt: 8,
        maxResearchAttempts: 1,
        kbMaxWriteAttempts: 3,
    },
    tot: {
        beamWidth: 4,
        maxDepth: 4,
        scoreThreshold: 5,
    },
    capabilities: {
        verifyThreshold: 0.5,
        minConfidence: 0.2,
        successDelta: 0.05,
        failureDelta: 0.15,
    },
    context: {
        budgetTokens: 3000,
        topK: 5,
    },
    permissions: { read: true, write: true, execute: true, web: true },
}

export const CONFIG_DIR = path.join(process.env.HOME ?? os.homedir(), '.config', 'recourse')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_FILE = 'config.json'

/** Persona every task reads; Tier 2 heuristics land here unless a task names another. */
export const DEFAULT_PERSONA = 'operator'
