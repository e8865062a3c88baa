import { z } from 'zod'
import { TASK_TYPES } from '../core/types.js'

export const TaskTypeSchema = z.enum(TASK_TYPES)

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    logDir: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    capture: z
        .object({
            maxLines: z.number().int().positive().optional(),
        })
        .optional(),
    wait: z
        .object({
            timeout: z.number().nonnegative().optional(),
            pollInterval: z.number().positive().optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    /** Explicit transcript directory; resolved against the project when absent. */
    logDir?: string
    logLevel: LogLevel
    capture: { maxLines: number }
    wait: { timeout: number; pollInterval: number }
    projectDir: string
    configDir: string
}
