import { InvalidArgumentError } from '../core/errors.js'
import type { Clock } from '../core/clock.js'
import { unixSeconds } from '../core/clock.js'
import type { Result } from '../core/result.js'
import { err, ok } from '../core/result.js'
import { isTaskType, type SessionMetadata, TASK_TYPES, type TaskType } from '../core/types.js'
import { TaskTypeSchema } from '../config/schema.js'
import type { OptionScope, PaneProvider } from '../tmux/types.js'

export const OPTION_KEYS = {
    taskType: '@task_type',
    description: '@description',
    createdAt: '@created_at',
    createdBy: '@created_by',
    lastMarker: '@last_marker',
    logFile: '@log_file',
} as const

export const CREATED_BY = 'term-agent'

export interface MetadataUpdate {
    taskType?: string
    description?: string
}

export function parseTaskType(value: string): Result<TaskType> {
    const parsed = TaskTypeSchema.safeParse(value)
    if (parsed.success) return ok(parsed.data)
    return err(`Invalid task_type '${value}'. Must be one of: ${TASK_TYPES.join(', ')}`)
}

export class MetadataStore {
    constructor(
        private provider: PaneProvider,
        private clock: Clock
    ) {}

    async read(scope: OptionScope): Promise<SessionMetadata> {
        const options = await this.provider.listOptions(scope)
        const taskType = options[OPTION_KEYS.taskType]
        return {
            taskType: isTaskType(taskType) ? taskType : null,
            description: options[OPTION_KEYS.description] ?? null,
            createdAt: options[OPTION_KEYS.createdAt] ?? null,
            createdBy: options[OPTION_KEYS.createdBy] ?? null,
        }
    }

    /** Validates before writing anything, so a bad task type leaves existing options untouched. */
    async write(scope: OptionScope, update: MetadataUpdate): Promise<{ taskType: TaskType | null; description: string | null }> {
        let taskType: TaskType | null = null
        if (update.taskType) {
            const parsed = parseTaskType(update.taskType)
            if (!parsed.ok) throw new InvalidArgumentError(parsed.error)
            taskType = parsed.value
        }

        if (taskType) await this.provider.setOption(scope, OPTION_KEYS.taskType, taskType)
        if (update.description) await this.provider.setOption(scope, OPTION_KEYS.description, update.description)
        await this.provider.setOption(scope, OPTION_KEYS.createdAt, String(unixSeconds(this.clock)))
        await this.provider.setOption(scope, OPTION_KEYS.createdBy, CREATED_BY)

        return { taskType, description: update.description || null }
    }
}
