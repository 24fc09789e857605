import { z } from 'zod'

export const UserSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
    email: z.string().nullish(),
})

export const WorkspaceSchema = z.object({
    id: z.string(),
    name: z.string(),
})

export const ClientSchema = z.object({
    id: z.string(),
    name: z.string(),
})

export const ProjectSchema = z.object({
    id: z.string(),
    name: z.string(),
    clientId: z.string().nullish(),
})

export const TaskSchema = z.object({
    id: z.string(),
    name: z.string(),
    projectId: z.string(),
})

export const TimeEntrySchema = z.object({
    id: z.string(),
    description: z.string().nullish(),
    projectId: z.string().nullish(),
    taskId: z.string().nullish(),
    timeInterval: z.object({
        start: z.string(),
        end: z.string().nullish(),
    }),
})
