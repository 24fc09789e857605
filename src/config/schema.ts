import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
export const BreakTimerKindSchema = z.enum(['gnome-pomodoro', 'none'])

/** Fields of the durable document that describe what the next `start` will use. */
export const SelectionSchema = z.object({
    clientId: z.string().optional(),
    projectId: z.string().optional(),
    taskId: z.string().optional(),
    taskName: z.string().optional(),
    description: z.string().optional(),
})

export const SettingsSchema = SelectionSchema.extend({
    token: z.string().optional(),
    workspaceId: z.string().optional(),
    baseURL: z.string().url().optional(),
    logLevel: LogLevelSchema.optional(),
    breakTimer: BreakTimerKindSchema.optional(),
    entriesLimit: z.number().int().positive().max(1000).optional(),
    currentEntryId: z.string().optional(),
    /** Epoch milliseconds of the last stop. */
    lastStopTime: z.number().optional(),
})

export type Selection = z.infer<typeof SelectionSchema>
export type Settings = z.infer<typeof SettingsSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>
export type BreakTimerKind = z.infer<typeof BreakTimerKindSchema>

export interface ResolvedConfig {
    token: string
    workspaceId: string
    baseURL: string
    logLevel: LogLevel
    breakTimer: BreakTimerKind
    entriesLimit: number
    configDir: string
}

export const SELECTION_KEYS = ['clientId', 'projectId', 'taskId', 'taskName', 'description'] as const
