import type { FatalErrorKind } from './errors.js'

export const TASK_TYPES = ['interactive', 'background', 'watcher', 'oneshot'] as const

export type TaskType = (typeof TASK_TYPES)[number]

/** Task types whose commands are not expected to return to a prompt. */
export const LONG_RUNNING_TASK_TYPES: readonly TaskType[] = ['background', 'watcher']

export function isTaskType(value: unknown): value is TaskType {
    return typeof value === 'string' && (TASK_TYPES as readonly string[]).includes(value)
}

export interface SessionMetadata {
    taskType: TaskType | null
    description: string | null
    createdAt: string | null
    createdBy: string | null
}

export interface ErrorEnvelope {
    status: 'error'
    kind: FatalErrorKind
    message: string
}

/** Every public operation resolves to its payload or an error envelope, never a rejection for a missing target. */
export type Envelope<T extends { status: string }> = T | ErrorEnvelope

export function isErrorEnvelope<T extends { status: string }>(envelope: Envelope<T>): envelope is ErrorEnvelope {
    return envelope.status === 'error'
}
