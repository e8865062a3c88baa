import type { Clock } from '../core/clock.js'
import { systemClock } from '../core/clock.js'
import { LONG_RUNNING_TASK_TYPES, type TaskType } from '../core/types.js'

/** Idle-shell prompts, tested against the last few visible lines. */
export const PROMPT_PATTERNS: readonly RegExp[] = [
    /[$%>#]\s*$/,
    /❯\s*$/,
    /➜\s*$/,
    /~.*[$%>#]\s*$/,
]

export const PROMPT_WINDOW = 3

export type WaitStatus = 'completed' | 'timeout' | 'running' | 'cancelled'

export interface PollOutcome {
    status: WaitStatus
    output: string[]
    /** Seconds, rounded to two decimals. */
    elapsed: number
    timedOut: boolean
}

export interface PollOptions {
    /** Seconds. */
    timeout: number
    /** Seconds. */
    pollInterval: number
    taskType?: TaskType | null
    clock?: Clock
    signal?: AbortSignal
}

export function isCommandComplete(output: readonly string[]): boolean {
    return output.slice(-PROMPT_WINDOW).some((line) => PROMPT_PATTERNS.some((pattern) => pattern.test(line)))
}

export function roundSeconds(ms: number): number {
    return Math.round(ms / 10) / 100
}

/**
 * Samples the pane until a prompt shows up or the timeout passes. The
 * command itself is only observed: on timeout or abort it keeps running.
 */
export async function waitForCompletion(snapshot: () => Promise<string[]>, options: PollOptions): Promise<PollOutcome> {
    const { timeout, pollInterval, taskType, clock = systemClock, signal } = options

    if (taskType && LONG_RUNNING_TASK_TYPES.includes(taskType)) {
        return { status: 'running', output: await snapshot(), elapsed: 0, timedOut: false }
    }

    const start = clock.now()
    for (;;) {
        const output = await snapshot()
        const elapsedMs = clock.now() - start

        if (isCommandComplete(output)) {
            return { status: 'completed', output, elapsed: roundSeconds(elapsedMs), timedOut: false }
        }
        if (elapsedMs >= timeout * 1000) {
            return { status: 'timeout', output, elapsed: roundSeconds(elapsedMs), timedOut: true }
        }
        if (signal?.aborted) {
            return { status: 'cancelled', output, elapsed: roundSeconds(elapsedMs), timedOut: false }
        }

        await clock.sleep(pollInterval * 1000)
    }
}
