import { randomBytes } from 'node:crypto'
import type { Clock } from '../core/clock.js'
import { systemClock } from '../core/clock.js'
import { errorMessage, InvalidArgumentError, isFatal, isPermissionError, NotFoundError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Envelope, SessionMetadata, TaskType } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { PaneInfo, PaneProvider, SessionInfo, WindowInfo } from '../tmux/types.js'
import { extractFromMarker, type ExtractionMethod, type ExtractionResult } from '../transcript/extractor.js'
import { beginCommand } from '../transcript/markers.js'
import { transcriptPath } from '../transcript/paths.js'
import { MetadataStore, OPTION_KEYS, parseTaskType } from './metadata.js'
import { type WaitStatus, waitForCompletion } from './poller.js'

export interface AgentDeps {
    provider: PaneProvider
    fs: FileSystem
    logger: Logger
    logDir: string
    clock?: Clock
    defaults?: Partial<AgentDefaults>
}

export interface AgentDefaults {
    maxLines: number
    timeout: number
    pollInterval: number
}

const BUILTIN_DEFAULTS: AgentDefaults = { maxLines: 20, timeout: 30, pollInterval: 0.5 }

export interface PaneSelector {
    window?: string
    pane?: number
}

interface PaneTarget {
    session: SessionInfo
    window: WindowInfo
    pane: PaneInfo
}

export interface ListSessionsResult {
    status: 'success'
    sessions: SessionInfo[]
}

export interface CreateSessionResult {
    status: 'success'
    action: 'created' | 'attached'
    sessionName: string
    sessionId: string
    windows: number
    taskType: TaskType | null
    description: string | null
}

export interface SetMetadataResult {
    status: 'success'
    message: string
    taskType: TaskType | null
    description: string | null
}

export interface GetMetadataResult {
    status: 'success'
    sessionName: string
    windowName: string | null
    metadata: SessionMetadata
}

export interface ExecuteResult {
    status: 'success'
    sessionName: string
    windowName: string
    paneId: string
    markerId: string
    logFile: string
    transcript: 'written' | 'skipped'
    message: string
}

export interface CaptureResult {
    status: 'success'
    sessionName: string
    source: 'transcript' | 'pane'
    output: string[]
    lineCount: number
    extractionMethod: ExtractionMethod | 'capture_pane'
    truncated: boolean
    forcedFull: boolean
    logFile?: string
    markerId?: string
    windowName?: string
    paneId?: string
    originalLineCount?: number
    message?: string
}

export interface WaitResult {
    status: WaitStatus
    sessionName: string
    windowName: string
    paneId: string
    output: string[]
    elapsed: number
    timedOut: boolean
    taskType?: TaskType
    message?: string
}

export interface KillResult {
    status: 'success'
    message: string
    logFileRemoved: boolean
}

export interface CreateSessionOptions {
    name?: string
    taskType?: string
    description?: string
}

export interface CaptureOptions extends PaneSelector {
    start?: number
    end?: number
    /** Skip smart extraction and return the whole region. */
    full?: boolean
}

export interface WaitOptions extends PaneSelector {
    timeout?: number
    pollInterval?: number
    respectMetadata?: boolean
    signal?: AbortSignal
}

export function generateSessionName(): string {
    return `agent-${randomBytes(4).toString('hex')}`
}

/**
 * Session-level operations over a pane provider. Every method resolves to an
 * envelope; missing targets and invalid arguments become `status: 'error'`.
 */
export class TerminalAgent {
    private provider: PaneProvider
    private fs: FileSystem
    private logger: Logger
    private clock: Clock
    private metadata: MetadataStore
    private defaults: AgentDefaults
    readonly logDir: string

    constructor(deps: AgentDeps) {
        this.provider = deps.provider
        this.fs = deps.fs
        this.logger = deps.logger
        this.logDir = deps.logDir
        this.clock = deps.clock ?? systemClock
        this.metadata = new MetadataStore(this.provider, this.clock)
        this.defaults = { ...BUILTIN_DEFAULTS, ...deps.defaults }
    }

    private async guard<T extends { status: string }>(fn: () => Promise<T>): Promise<Envelope<T>> {
        try {
            return await fn()
        } catch (error) {
            if (isFatal(error)) return { status: 'error', kind: error.kind, message: error.message }
            throw error
        }
    }

    private async requireSession(name: string): Promise<SessionInfo> {
        const session = await this.provider.findSession(name)
        if (!session) throw new NotFoundError(`Session '${name}' not found`)
        return session
    }

    private async requireWindow(session: SessionInfo, windowName?: string): Promise<WindowInfo> {
        const windows = await this.provider.listWindows(session.name)
        const window = windowName === undefined ? windows.find((w) => w.active) ?? windows[0] : windows.find((w) => w.name === windowName)
        if (!window) {
            throw new NotFoundError(
                windowName === undefined
                    ? `Session '${session.name}' has no windows`
                    : `Window '${windowName}' not found in session '${session.name}'`
            )
        }
        return window
    }

    private async resolvePane(sessionName: string, selector: PaneSelector): Promise<PaneTarget> {
        const session = await this.requireSession(sessionName)
        const window = await this.requireWindow(session, selector.window)
        const panes = await this.provider.listPanes(window.id)
        const index = selector.pane ?? 0
        const pane = panes[index]
        if (!pane) {
            throw new NotFoundError(`Pane index ${index} out of range (window has ${panes.length} panes)`)
        }
        return { session, window, pane }
    }

    transcriptFor(sessionName: string): string {
        return transcriptPath(this.logDir, sessionName)
    }

    async listSessions(): Promise<Envelope<ListSessionsResult>> {
        return this.guard<ListSessionsResult>(async () => ({ status: 'success', sessions: await this.provider.listSessions() }))
    }

    async getOrCreateSession(options: CreateSessionOptions = {}): Promise<Envelope<CreateSessionResult>> {
        return this.guard<CreateSessionResult>(async () => {
            if (options.taskType) {
                const parsed = parseTaskType(options.taskType)
                if (!parsed.ok) throw new InvalidArgumentError(parsed.error)
            }

            const name = options.name ?? generateSessionName()
            const existing = options.name === undefined ? undefined : await this.provider.findSession(name)
            const session = existing ?? (await this.provider.newSession(name))
            const action = existing ? 'attached' : 'created'

            let taskType: TaskType | null = null
            let description: string | null = null
            if (action === 'created' && (options.taskType || options.description)) {
                const written = await this.metadata.write({ session: session.name }, options)
                taskType = written.taskType
                description = written.description
            }

            this.logger.info({ session: session.name, action }, 'session ready')
            return {
                status: 'success',
                action,
                sessionName: session.name,
                sessionId: session.id,
                windows: session.windows,
                taskType,
                description,
            }
        })
    }

    async setMetadata(
        sessionName: string,
        update: { taskType?: string; description?: string; window?: string }
    ): Promise<Envelope<SetMetadataResult>> {
        return this.guard<SetMetadataResult>(async () => {
            const session = await this.requireSession(sessionName)
            if (update.window !== undefined) await this.requireWindow(session, update.window)
            const written = await this.metadata.write({ session: session.name, window: update.window }, update)
            return { status: 'success', message: 'Metadata set', ...written }
        })
    }

    async getMetadata(sessionName: string, window?: string): Promise<Envelope<GetMetadataResult>> {
        return this.guard<GetMetadataResult>(async () => {
            const session = await this.requireSession(sessionName)
            if (window !== undefined) await this.requireWindow(session, window)
            return {
                status: 'success',
                sessionName: session.name,
                windowName: window ?? null,
                metadata: await this.metadata.read({ session: session.name, window }),
            }
        })
    }

    async executeCommand(sessionName: string, command: string, selector: PaneSelector = {}): Promise<Envelope<ExecuteResult>> {
        return this.guard<ExecuteResult>(async () => {
            const target = await this.resolvePane(sessionName, selector)
            const scope = { session: target.session.name }
            const logFile = this.transcriptFor(target.session.name)

            if (!(await this.fs.exists(logFile))) {
                await this.provider.startPipe(target.session.name, logFile)
                await this.provider.setOption(scope, OPTION_KEYS.logFile, logFile)
            }

            const marker = await beginCommand(logFile, command, { fs: this.fs, logger: this.logger, clock: this.clock })
            await this.provider.setOption(scope, OPTION_KEYS.lastMarker, marker.markerId)
            await this.provider.sendKeys(target.pane.id, command)

            this.logger.debug({ session: target.session.name, pane: target.pane.id, markerId: marker.markerId }, 'command sent')
            return {
                status: 'success',
                sessionName: target.session.name,
                windowName: target.window.name,
                paneId: target.pane.id,
                markerId: marker.markerId,
                logFile,
                transcript: marker.status,
                message: 'Command sent',
            }
        })
    }

    async captureOutput(sessionName: string, options: CaptureOptions = {}): Promise<Envelope<CaptureResult>> {
        return this.guard<CaptureResult>(async () => {
            const session = await this.requireSession(sessionName)
            const logFile = this.transcriptFor(session.name)
            const forcedFull = options.full ?? false

            const markerId = await this.provider.getOption({ session: session.name }, OPTION_KEYS.lastMarker)
            if (markerId) {
                const extraction = await this.readTranscript(logFile, markerId, forcedFull)
                if (extraction && extraction.extractionMethod !== 'no_file' && extraction.extractionMethod !== 'marker_not_found') {
                    return {
                        status: 'success',
                        sessionName: session.name,
                        source: 'transcript',
                        logFile,
                        markerId,
                        output: extraction.lines,
                        lineCount: extraction.lineCount,
                        extractionMethod: extraction.extractionMethod,
                        truncated: extraction.truncated,
                        forcedFull,
                        originalLineCount: extraction.originalLineCount,
                        message: extraction.message,
                    }
                }
                this.logger.debug({ logFile, markerId, reason: extraction?.extractionMethod ?? 'unreadable' }, 'falling back to pane snapshot')
            }

            const target = await this.resolvePane(session.name, options)
            const output = await this.provider.capturePane(target.pane.id, { start: options.start, end: options.end })
            return {
                status: 'success',
                sessionName: session.name,
                source: 'pane',
                windowName: target.window.name,
                paneId: target.pane.id,
                output,
                lineCount: output.length,
                extractionMethod: 'capture_pane',
                truncated: false,
                forcedFull,
            }
        })
    }

    /** Extraction from the transcript, or undefined when the file cannot be read. */
    private async readTranscript(logFile: string, markerId: string, forceFull: boolean): Promise<ExtractionResult | undefined> {
        try {
            return await extractFromMarker(this.fs, logFile, markerId, { maxLines: this.defaults.maxLines, forceFull })
        } catch (error) {
            if (!isPermissionError(error)) throw error
            this.logger.warn({ logFile, err: errorMessage(error) }, 'transcript not readable')
            return undefined
        }
    }

    async waitForCompletion(sessionName: string, options: WaitOptions = {}): Promise<Envelope<WaitResult>> {
        return this.guard<WaitResult>(async () => {
            const target = await this.resolvePane(sessionName, options)
            const timeout = options.timeout ?? this.defaults.timeout

            let taskType: TaskType | null = null
            if (options.respectMetadata ?? true) {
                const metadata = await this.metadata.read({ session: target.session.name, window: options.window })
                taskType = metadata.taskType
            }

            const outcome = await waitForCompletion(() => this.provider.capturePane(target.pane.id), {
                timeout,
                pollInterval: options.pollInterval ?? this.defaults.pollInterval,
                taskType,
                clock: this.clock,
                signal: options.signal,
            })

            const result: WaitResult = {
                ...outcome,
                sessionName: target.session.name,
                windowName: target.window.name,
                paneId: target.pane.id,
            }
            if (outcome.status === 'running' && taskType) {
                result.taskType = taskType
                result.message = `Task type '${taskType}' - not waiting for completion`
            } else if (outcome.status === 'timeout') {
                result.message = `Command still running after ${timeout}s (check again later with 'capture' or 'wait')`
            } else if (outcome.status === 'cancelled') {
                result.message = `Stopped waiting after ${outcome.elapsed}s; the command is still running`
            }
            return result
        })
    }

    async killSession(sessionName: string, options: { keepLog?: boolean } = {}): Promise<Envelope<KillResult>> {
        return this.guard<KillResult>(async () => {
            const session = await this.requireSession(sessionName)
            const logFile = this.transcriptFor(session.name)

            await this.provider.stopPipe(session.name)

            let logFileRemoved = false
            if (!options.keepLog && (await this.fs.exists(logFile))) {
                try {
                    await this.fs.remove(logFile)
                    logFileRemoved = true
                } catch (error) {
                    if (!isPermissionError(error)) throw error
                    this.logger.warn({ logFile, err: errorMessage(error) }, 'could not remove transcript')
                }
            }

            await this.provider.killSession(session.name)
            this.logger.info({ session: session.name, logFileRemoved }, 'session killed')
            return { status: 'success', message: `Session '${session.name}' killed`, logFileRemoved }
        })
    }
}
