import type { Client, Gateway, Project, Task, TimeEntry } from '../api/types.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'

/**
 * Read access to workspace entities. Chosen once per invocation: interactive
 * commands use a hydrated snapshot, one-shot commands go straight to the
 * service.
 */
export interface WorkspaceSource {
    readonly hydrated: boolean
    userId(): Promise<string>
    clients(): Promise<Client[]>
    projects(): Promise<Project[]>
    tasks(projectId: string): Promise<Task[]>
    /** Most recent first. */
    timeEntries(): Promise<TimeEntry[]>
    invalidateTasks(projectId: string): void
    invalidateTimeEntries(): void
}

export class DirectWorkspaceSource implements WorkspaceSource {
    readonly hydrated = false

    constructor(
        private gateway: Gateway,
        private entriesLimit: number
    ) {}

    userId(): Promise<string> {
        return this.gateway.userId()
    }

    clients(): Promise<Client[]> {
        return this.gateway.getClients()
    }

    projects(): Promise<Project[]> {
        return this.gateway.getProjects()
    }

    tasks(projectId: string): Promise<Task[]> {
        return this.gateway.getTasks(projectId)
    }

    timeEntries(): Promise<TimeEntry[]> {
        return this.gateway.getTimeEntries(this.entriesLimit)
    }

    invalidateTasks(_projectId: string): void {}

    invalidateTimeEntries(): void {}
}

/**
 * Load-once mirror of the workspace. Until `loadAll` has run every accessor
 * falls through to the gateway; afterwards reads are served from memory and
 * only invalidated slices are fetched again.
 */
export class WorkspaceSnapshot implements WorkspaceSource {
    private cachedUserId: string | null = null
    private cachedClients: Client[] | null = null
    private cachedProjects: Project[] | null = null
    private tasksByProject = new Map<string, Task[]>()
    private cachedEntries: TimeEntry[] | null = null
    private loaded = false

    constructor(
        private gateway: Gateway,
        private logger: Logger,
        private entriesLimit: number
    ) {}

    get hydrated(): boolean {
        return this.loaded
    }

    async loadAll(entriesLimit: number = this.entriesLimit): Promise<void> {
        this.entriesLimit = entriesLimit
        this.cachedUserId = await this.gateway.userId()
        this.cachedClients = await this.gateway.getClients()
        this.cachedProjects = await this.gateway.getProjects()

        this.tasksByProject.clear()
        for (const project of this.cachedProjects) {
            try {
                this.tasksByProject.set(project.id, await this.gateway.getTasks(project.id))
            } catch (error) {
                this.logger.warn({ projectId: project.id, error: errorMessage(error) }, 'Failed to load project tasks')
                this.tasksByProject.set(project.id, [])
            }
        }

        this.cachedEntries = await this.gateway.getTimeEntries(entriesLimit)
        this.loaded = true
        this.logger.debug(
            { clients: this.cachedClients.length, projects: this.cachedProjects.length, entries: this.cachedEntries.length },
            'workspace:hydrated'
        )
    }

    async userId(): Promise<string> {
        if (this.cachedUserId) return this.cachedUserId
        this.cachedUserId = await this.gateway.userId()
        return this.cachedUserId
    }

    async clients(): Promise<Client[]> {
        if (this.loaded && this.cachedClients) return this.cachedClients
        this.cachedClients = await this.gateway.getClients()
        return this.cachedClients
    }

    async projects(): Promise<Project[]> {
        if (this.loaded && this.cachedProjects) return this.cachedProjects
        this.cachedProjects = await this.gateway.getProjects()
        return this.cachedProjects
    }

    async tasks(projectId: string): Promise<Task[]> {
        const cached = this.tasksByProject.get(projectId)
        if (this.loaded && cached) return cached
        const tasks = await this.gateway.getTasks(projectId)
        this.tasksByProject.set(projectId, tasks)
        return tasks
    }

    async timeEntries(): Promise<TimeEntry[]> {
        if (this.loaded && this.cachedEntries) return this.cachedEntries
        this.cachedEntries = await this.gateway.getTimeEntries(this.entriesLimit)
        return this.cachedEntries
    }

    invalidateTasks(projectId: string): void {
        this.tasksByProject.delete(projectId)
    }

    invalidateTimeEntries(): void {
        this.cachedEntries = null
    }
}
