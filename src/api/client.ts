import { z } from 'zod'
import { GatewayError, errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { utcTimestamp } from '../utils/time.js'
import {
    ClientSchema,
    ProjectSchema,
    TaskSchema,
    TimeEntrySchema,
    UserSchema,
    WorkspaceSchema,
} from './schemas.js'
import type { Gateway, StartEntryInput, TimeEntry } from './types.js'

export interface GatewayOptions {
    token: string
    workspaceId: string
    baseURL: string
}

type Method = 'GET' | 'POST' | 'PATCH' | 'DELETE'

export class HttpGateway implements Gateway {
    private cachedUserId: string | null = null

    constructor(
        private options: GatewayOptions,
        private logger: Logger
    ) {}

    private get ws(): string {
        return `workspaces/${this.options.workspaceId}`
    }

    private async request(method: Method, endpoint: string, body?: unknown): Promise<unknown> {
        const url = `${this.options.baseURL.replace(/\/+$/, '')}/${endpoint}`
        this.logger.debug({ method, endpoint }, 'gateway:request')

        let response: Response
        try {
            response = await fetch(url, {
                method,
                headers: {
                    'X-Api-Key': this.options.token,
                    'Content-Type': 'application/json',
                },
                body: body === undefined ? undefined : JSON.stringify(body),
            })
        } catch (error) {
            throw new GatewayError(`API request failed: ${errorMessage(error)}`, undefined, { cause: error })
        }

        if (!response.ok) {
            const detail = await response.text().catch(() => '')
            const suffix = detail ? ` - ${detail.slice(0, 200)}` : ''
            throw new GatewayError(
                `API request failed: HTTP ${response.status} ${response.statusText} for ${method} ${endpoint}${suffix}`,
                response.status
            )
        }

        if (response.status === 204) return null
        const text = await response.text()
        if (!text) return null
        try {
            return JSON.parse(text) as unknown
        } catch (error) {
            throw new GatewayError(`API request failed: invalid JSON from ${endpoint}`, response.status, {
                cause: error,
            })
        }
    }

    private async fetchAs<T>(
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        method: Method,
        endpoint: string,
        body?: unknown
    ): Promise<T> {
        const raw = await this.request(method, endpoint, body)
        const parsed = schema.safeParse(raw)
        if (!parsed.success) {
            throw new GatewayError(`API request failed: unexpected response from ${endpoint}: ${parsed.error.message}`)
        }
        return parsed.data
    }

    async getUser() {
        const user = await this.fetchAs(UserSchema, 'GET', 'user')
        this.cachedUserId = user.id
        return user
    }

    async userId(): Promise<string> {
        if (this.cachedUserId) return this.cachedUserId
        const user = await this.getUser()
        return user.id
    }

    async getWorkspaces() {
        return this.fetchAs(z.array(WorkspaceSchema), 'GET', 'workspaces')
    }

    async getClients() {
        return this.fetchAs(z.array(ClientSchema), 'GET', `${this.ws}/clients`)
    }

    async getProjects() {
        return this.fetchAs(z.array(ProjectSchema), 'GET', `${this.ws}/projects`)
    }

    async getTasks(projectId: string) {
        return this.fetchAs(z.array(TaskSchema), 'GET', `${this.ws}/projects/${projectId}/tasks`)
    }

    async getTimeEntries(limit: number) {
        const userId = await this.userId()
        return this.fetchAs(
            z.array(TimeEntrySchema),
            'GET',
            `${this.ws}/user/${userId}/time-entries?page-size=${limit}`
        )
    }

    async getActiveEntry(): Promise<TimeEntry | null> {
        const userId = await this.userId()
        const entries = await this.fetchAs(
            z.array(TimeEntrySchema).nullable(),
            'GET',
            `${this.ws}/user/${userId}/time-entries?in-progress=true`
        )
        return entries?.[0] ?? null
    }

    async startEntry(input: StartEntryInput) {
        const body: Record<string, string> = {
            start: utcTimestamp(),
            description: input.description,
            projectId: input.projectId,
        }
        if (input.taskId) body.taskId = input.taskId
        return this.fetchAs(TimeEntrySchema, 'POST', `${this.ws}/time-entries`, body)
    }

    async stopEntry(): Promise<TimeEntry | null> {
        const userId = await this.userId()
        return this.fetchAs(TimeEntrySchema.nullable(), 'PATCH', `${this.ws}/user/${userId}/time-entries`, {
            end: utcTimestamp(),
        })
    }

    async createTask(projectId: string, name: string) {
        return this.fetchAs(TaskSchema, 'POST', `${this.ws}/projects/${projectId}/tasks`, { name })
    }

    async deleteTask(projectId: string, taskId: string): Promise<boolean> {
        try {
            await this.request('DELETE', `${this.ws}/projects/${projectId}/tasks/${taskId}`)
            return true
        } catch (error) {
            this.logger.warn({ projectId, taskId, error: errorMessage(error) }, 'gateway:delete-task-failed')
            return false
        }
    }

    async deleteTimeEntry(entryId: string): Promise<boolean> {
        try {
            await this.request('DELETE', `${this.ws}/time-entries/${entryId}`)
            return true
        } catch (error) {
            this.logger.warn({ entryId, error: errorMessage(error) }, 'gateway:delete-entry-failed')
            return false
        }
    }
}

export function createGateway(options: GatewayOptions, logger: Logger): Gateway {
    return new HttpGateway(options, logger)
}
