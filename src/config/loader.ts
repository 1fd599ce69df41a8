import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    onInvalid?: (filePath: string, error: unknown) => void
}

async function loadJsonConfig(fs: FileSystem, filePath: string, onInvalid?: LoadConfigOptions['onInvalid']): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        onInvalid?.(filePath, error)
    }
    return {}
}

const SECTIONS = new Set(['protocol', 'tot', 'capabilities', 'context', 'permissions'])

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined && !SECTIONS.has(key)) {
                ;(merged as Record<string, unknown>)[key] = value
            }
        }
        // Sections merge per field, so a local file can tune one knob without restating the rest
        if (cfg.protocol) merged.protocol = { ...merged.protocol, ...cfg.protocol }
        if (cfg.tot) merged.tot = { ...merged.tot, ...cfg.tot }
        if (cfg.capabilities) merged.capabilities = { ...merged.capabilities, ...cfg.capabilities }
        if (cfg.context) merged.context = { ...merged.context, ...cfg.context }
        if (cfg.permissions) merged.permissions = { ...merged.permissions, ...cfg.permissions }
    }
    return merged
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.RECOURSE_API_KEY) config.apiKey = env.RECOURSE_API_KEY
    if (env.RECOURSE_MODEL) config.model = env.RECOURSE_MODEL
    if (env.RECOURSE_STATE_DIR) config.stateDir = env.RECOURSE_STATE_DIR
    const level = LogLevelSchema.safeParse(env.RECOURSE_LOG_LEVEL)
    if (level.success) config.logLevel = level.data
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env, onInvalid } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, onInvalid)
    const fromEnv = envConfig(env)
    const stateDir = cliFlags.stateDir ?? fromEnv.stateDir ?? globalConfig.stateDir ?? DEFAULT_CONFIG.stateDir
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, stateDir, LOCAL_CONFIG_FILE), onInvalid)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, fromEnv, cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey: merged.apiKey ?? '',
        stateDir,
        projectDir,
        configDir: CONFIG_DIR,
        protocol: { ...DEFAULT_CONFIG.protocol, ...merged.protocol },
        tot: { ...DEFAULT_CONFIG.tot, ...merged.tot },
        capabilities: { ...DEFAULT_CONFIG.capabilities, ...merged.capabilities },
        context: { ...DEFAULT_CONFIG.context, ...merged.context },
        permissions: { ...DEFAULT_CONFIG.permissions, ...merged.permissions },
    }
}
