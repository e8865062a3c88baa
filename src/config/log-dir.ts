import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { errorMessage, isPermissionError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { FALLBACK_LOG_DIR, HOME_LOG_DIR, LOCAL_CONFIG_DIR, PROJECT_INDICATORS } from './defaults.js'

export type LogDirSource = 'explicit' | 'project' | 'home' | 'fallback'

export interface LogDir {
    dir: string
    source: LogDirSource
}

interface ResolveLogDirOptions {
    fs: FileSystem
    logger: Logger
    projectDir: string
    explicit?: string
}

export async function isProjectDirectory(fs: FileSystem, dir: string): Promise<boolean> {
    for (const indicator of PROJECT_INDICATORS) {
        if (await fs.exists(path.join(dir, indicator))) return true
    }
    return false
}

/**
 * Adds `.term-agent/` to the project's .gitignore unless some entry already mentions it.
 * Failures are ignored; a missing ignore entry only costs a noisy `git status`.
 */
export async function ensureGitignore(fs: FileSystem, projectDir: string, logger: Logger): Promise<void> {
    const gitignore = path.join(projectDir, '.gitignore')
    try {
        const content = (await fs.exists(gitignore)) ? await fs.readText(gitignore) : ''
        if (content.includes(LOCAL_CONFIG_DIR)) return

        const prefix = content && !content.endsWith('\n') ? '\n' : ''
        await fs.appendText(gitignore, `${prefix}\n# term-agent transcripts\n${LOCAL_CONFIG_DIR}/\n`)
    } catch (error) {
        logger.debug({ err: errorMessage(error), gitignore }, 'could not update .gitignore')
    }
}

/**
 * Picks the transcript directory: explicit setting, then a project-local
 * `.term-agent/logs`, then `~/.term-agent/logs`. Falls back to a shared tmp
 * directory when the chosen one cannot be created.
 */
export async function resolveLogDir(options: ResolveLogDirOptions): Promise<LogDir> {
    const { fs, logger, projectDir, explicit } = options

    let chosen: LogDir
    if (explicit) {
        chosen = { dir: explicit, source: 'explicit' }
    } else if (await isProjectDirectory(fs, projectDir)) {
        chosen = { dir: path.join(projectDir, LOCAL_CONFIG_DIR, 'logs'), source: 'project' }
    } else {
        chosen = { dir: HOME_LOG_DIR, source: 'home' }
    }

    try {
        await fs.mkdir(chosen.dir, 0o755)
    } catch (error) {
        if (!isPermissionError(error)) throw error
        logger.warn({ dir: chosen.dir }, `log directory not writable, using ${FALLBACK_LOG_DIR}`)
        await fs.mkdir(FALLBACK_LOG_DIR, 0o755)
        return { dir: FALLBACK_LOG_DIR, source: 'fallback' }
    }

    if (chosen.source === 'project' && (await fs.exists(path.join(projectDir, '.git')))) {
        await ensureGitignore(fs, projectDir, logger)
    }

    return chosen
}
