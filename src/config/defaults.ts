import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'warn',
    capture: { maxLines: 20 },
    wait: { timeout: 30, pollInterval: 0.5 },
}

export const HOME_DIR = process.env.HOME ?? '~'
export const CONFIG_DIR = `${HOME_DIR}/.config/term-agent`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.term-agent'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`

export const HOME_LOG_DIR = `${HOME_DIR}/.term-agent/logs`
export const FALLBACK_LOG_DIR = '/tmp/term-agent-logs'

/** Files or directories whose presence marks the cwd as a project root. */
export const PROJECT_INDICATORS = [
    '.git',
    '.term-agent',
    'pyproject.toml',
    'package.json',
    'Cargo.toml',
    'go.mod',
    'pom.xml',
]
