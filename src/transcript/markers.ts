import { randomBytes } from 'node:crypto'
import type { Clock } from '../core/clock.js'
import { systemClock, unixSeconds } from '../core/clock.js'
import type { FileSystem } from '../core/fs.js'
import { errorMessage, isPermissionError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'

export const START_SENTINEL = '===TERM-AGENT-CMD-START==='
export const END_SENTINEL = '===TERM-AGENT-CMD-END==='

export const MARKER_ID_LENGTH = 12
export const MARKER_ID_PATTERN = /^[0-9a-f]{12}$/

export const TRANSCRIPT_MODE = 0o644

export interface MarkerWrite {
    markerId: string
    status: 'written' | 'skipped'
    /** Why the marker line was not written, when skipped. */
    reason?: string
}

interface BeginCommandDeps {
    fs: FileSystem
    logger: Logger
    clock?: Clock
}

export function generateMarkerId(): string {
    return randomBytes(MARKER_ID_LENGTH / 2).toString('hex')
}

export function formatMarkerLine(markerId: string, timestamp: number, command: string): string {
    return `\n${START_SENTINEL} ${markerId} ${timestamp} ${command}\n`
}

export function startMarkerFor(markerId: string): string {
    return `${START_SENTINEL} ${markerId}`
}

export function endMarkerFor(markerId: string): string {
    return `${END_SENTINEL} ${markerId}`
}

/**
 * Appends the start marker for a new command to the transcript.
 *
 * The marker id is returned even when the append fails on permissions, so
 * the command can still be dispatched; only transcript-backed capture is lost.
 */
export async function beginCommand(transcript: string, command: string, deps: BeginCommandDeps): Promise<MarkerWrite> {
    const { fs, logger, clock = systemClock } = deps
    const markerId = generateMarkerId()
    const line = formatMarkerLine(markerId, unixSeconds(clock), command)

    try {
        await fs.appendText(transcript, line, TRANSCRIPT_MODE)
        // the umask may have narrowed the creation mode; fix it once, when our line is the whole file
        if ((await fs.size(transcript)) === Buffer.byteLength(line)) {
            await fs.chmod(transcript, TRANSCRIPT_MODE)
        }
    } catch (error) {
        if (!isPermissionError(error)) throw error
        logger.warn({ transcript, markerId }, 'could not write command marker, transcript capture disabled')
        return { markerId, status: 'skipped', reason: errorMessage(error) }
    }

    logger.debug({ transcript, markerId }, 'command marker written')
    return { markerId, status: 'written' }
}
