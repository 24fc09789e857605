import type { z } from 'zod'
import type {
    ClientSchema,
    ProjectSchema,
    TaskSchema,
    TimeEntrySchema,
    UserSchema,
    WorkspaceSchema,
} from './schemas.js'

export type User = z.infer<typeof UserSchema>
export type Workspace = z.infer<typeof WorkspaceSchema>
export type Client = z.infer<typeof ClientSchema>
export type Project = z.infer<typeof ProjectSchema>
export type Task = z.infer<typeof TaskSchema>
export type TimeEntry = z.infer<typeof TimeEntrySchema>

export interface StartEntryInput {
    description: string
    projectId: string
    taskId?: string
}

/**
 * Operations the rest of the program needs from the time-tracking service.
 * Every method rejects with a `GatewayError` on failure.
 */
export interface Gateway {
    getUser(): Promise<User>
    /** Memoized id of the token's user. */
    userId(): Promise<string>
    getWorkspaces(): Promise<Workspace[]>
    getClients(): Promise<Client[]>
    getProjects(): Promise<Project[]>
    getTasks(projectId: string): Promise<Task[]>
    /** Most recent first. */
    getTimeEntries(limit: number): Promise<TimeEntry[]>
    getActiveEntry(): Promise<TimeEntry | null>
    startEntry(input: StartEntryInput): Promise<TimeEntry>
    stopEntry(): Promise<TimeEntry | null>
    createTask(projectId: string, name: string): Promise<Task>
    deleteTask(projectId: string, taskId: string): Promise<boolean>
    deleteTimeEntry(entryId: string): Promise<boolean>
}
