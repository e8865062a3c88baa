import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.TERM_AGENT_LOG_DIR) config.logDir = env.TERM_AGENT_LOG_DIR
    const level = LogLevelSchema.safeParse(env.TERM_AGENT_LOG_LEVEL)
    if (level.success) config.logLevel = level.data
    return config
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.logDir !== undefined) merged.logDir = cfg.logDir
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.capture) merged.capture = { ...merged.capture, ...cfg.capture }
        if (cfg.wait) merged.wait = { ...merged.wait, ...cfg.wait }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), cliFlags)

    return {
        logDir: merged.logDir,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        capture: {
            maxLines: merged.capture?.maxLines ?? DEFAULT_CONFIG.capture.maxLines,
        },
        wait: {
            timeout: merged.wait?.timeout ?? DEFAULT_CONFIG.wait.timeout,
            pollInterval: merged.wait?.pollInterval ?? DEFAULT_CONFIG.wait.pollInterval,
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
