import type { Client, Gateway, Project, Task, TimeEntry } from '../api/types.js'
import { RECENT_COMBINATIONS_LIMIT } from '../config/defaults.js'
import { SELECTION_KEYS, type Selection } from '../config/schema.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import { isEmptySelection, type SettingsStore } from '../store/settings-store.js'
import { IDLE_PLAN, type TimerController } from '../tracking/timer-controller.js'
import type { WorkspaceSource } from '../workspace/source.js'
import { collectRecentCombinations, descriptionCandidates, type RecentCombination } from './candidates.js'

export interface SelectionChange {
    clientId?: string
    projectId?: string
    /** Absent for a description-only entry. */
    taskId?: string
    taskName?: string
    description: string
}

export interface CommitOptions {
    /** Snapshot the current selection into the previous slot first. */
    savePrevious?: boolean
    /** Stop whatever is running before the change and bring it back afterwards. */
    restartTimer?: boolean
    /** With a project in the change, take its client as given (absent included) instead of keeping the current one. */
    replace?: boolean
}

export interface ReconcilerDeps {
    store: SettingsStore
    source: WorkspaceSource
    gateway: Gateway
    timer: TimerController
    events: TypedEventEmitter
    logger: Logger
}

function sameSelection(a: Selection, b: Selection): boolean {
    return SELECTION_KEYS.every((key) => (a[key] || undefined) === (b[key] || undefined))
}

/**
 * Owns the client → project → task → description selection: resolves what is
 * current, commits changes with a single-slot history, and keeps the running
 * entry in line with the selection.
 */
export class SelectionReconciler {
    private store: SettingsStore
    private source: WorkspaceSource
    private gateway: Gateway
    private timer: TimerController
    private events: TypedEventEmitter
    private logger: Logger

    constructor(deps: ReconcilerDeps) {
        this.store = deps.store
        this.source = deps.source
        this.gateway = deps.gateway
        this.timer = deps.timer
        this.events = deps.events
        this.logger = deps.logger
    }

    selection(): Promise<Selection> {
        return this.store.selection()
    }

    clients(): Promise<Client[]> {
        return this.source.clients()
    }

    projects(): Promise<Project[]> {
        return this.source.projects()
    }

    async findClient(clientId: string): Promise<Client | null> {
        return (await this.source.clients()).find((c) => c.id === clientId) ?? null
    }

    async findClientByName(name: string): Promise<Client | null> {
        return (await this.source.clients()).find((c) => c.name === name) ?? null
    }

    async findProject(projectId: string): Promise<Project | null> {
        return (await this.source.projects()).find((p) => p.id === projectId) ?? null
    }

    async findProjectByName(name: string): Promise<Project | null> {
        return (await this.source.projects()).find((p) => p.name === name) ?? null
    }

    /**
     * The persisted project when it still exists, otherwise the project of the
     * running entry. This is the only place that decides the current project.
     */
    async currentProject(): Promise<Project | null> {
        const selection = await this.store.selection()
        if (selection.projectId) {
            const project = await this.findProject(selection.projectId)
            if (project) return project
        }

        let active: TimeEntry | null
        try {
            active = await this.timer.activeEntry()
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'Could not read the active entry')
            return null
        }
        if (!active?.projectId) return null
        return this.findProject(active.projectId)
    }

    async currentClient(): Promise<Client | null> {
        const { clientId } = await this.store.selection()
        return clientId ? this.findClient(clientId) : null
    }

    async formalTasks(projectId: string): Promise<Task[]> {
        try {
            return await this.source.tasks(projectId)
        } catch (error) {
            this.logger.warn({ projectId, error: errorMessage(error) }, 'Could not load tasks')
            return []
        }
    }

    async descriptionsFor(projectId: string, taskId?: string): Promise<string[]> {
        try {
            return descriptionCandidates(await this.source.timeEntries(), projectId, taskId)
        } catch (error) {
            this.logger.warn({ projectId, error: errorMessage(error) }, 'Could not load time entries')
            return []
        }
    }

    async recentCombinations(limit = RECENT_COMBINATIONS_LIMIT): Promise<RecentCombination[]> {
        const [entries, projects, clients] = [
            await this.source.timeEntries(),
            await this.source.projects(),
            await this.source.clients(),
        ]
        const combinations = collectRecentCombinations(entries, projects, clients, limit)
        for (const combination of combinations) {
            if (!combination.taskId) continue
            const tasks = await this.formalTasks(combination.projectId)
            combination.taskName = tasks.find((t) => t.id === combination.taskId)?.name
        }
        return combinations
    }

    private async snapshot(current: Selection, next: Selection): Promise<void> {
        if (isEmptySelection(current) || sameSelection(current, next)) return
        await this.store.savePrevious(current)
        this.logger.debug({ previous: current }, 'selection:snapshot')
    }

    /** Client to switch to when `project` belongs to another client than the selection. */
    private async propagatedClient(project: Project, currentClientId?: string): Promise<Client | null> {
        if (!project.clientId || project.clientId === currentClientId) return null
        const client = await this.findClient(project.clientId)
        if (!client) return null
        this.events.emit('client:auto-updated', { client })
        this.events.notice('info', `Client automatically updated to: ${client.name}`)
        return client
    }

    async setClient(clientId: string): Promise<Result<Client>> {
        const client = await this.findClient(clientId)
        if (!client) return err(`Client with ID ${clientId} not found`)

        const current = await this.store.selection()
        const next: Selection = { ...current, clientId: client.id }
        await this.snapshot(current, next)
        await this.store.update({ clientId: client.id })
        this.events.emit('selection:changed', { previous: current, current: next })
        this.events.notice('success', `Current client set to: ${client.name}`)
        return ok(client)
    }

    async setClientByName(name: string): Promise<Result<Client>> {
        const client = await this.findClientByName(name)
        if (!client) return err(`Client '${name}' not found`)
        return this.setClient(client.id)
    }

    async setProject(projectId: string): Promise<Result<Project>> {
        const project = await this.findProject(projectId)
        if (!project) return err(`Project with ID ${projectId} not found`)

        const current = await this.store.selection()
        const client = await this.propagatedClient(project, current.clientId)
        const next: Selection = { ...current, projectId: project.id, clientId: client?.id ?? current.clientId }
        await this.snapshot(current, next)
        await this.store.update({ projectId: next.projectId, clientId: next.clientId })
        this.events.emit('selection:changed', { previous: current, current: next })
        this.events.notice('success', `Current project set to: ${project.name}`)
        return ok(project)
    }

    async setProjectByName(name: string): Promise<Result<Project>> {
        const project = await this.findProjectByName(name)
        if (!project) return err(`Project '${name}' not found`)
        return this.setProject(project.id)
    }

    /**
     * Commits a task/description change. Snapshots the current selection,
     * suspends the timer, writes the new selection and resumes whatever was
     * running before.
     */
    async setSelection(change: SelectionChange, options: CommitOptions = {}): Promise<Selection> {
        const { savePrevious = true, restartTimer = true, replace = false } = options
        const current = await this.store.selection()

        let clientId = change.clientId ?? (replace && change.projectId ? undefined : current.clientId)
        const projectId = change.projectId ?? current.projectId
        let project: Project | null = null
        if (change.projectId) {
            project = await this.findProject(change.projectId)
            if (project && !change.clientId) {
                const client = await this.propagatedClient(project, clientId)
                if (client) clientId = client.id
            }
        }

        const next: Selection = {
            clientId,
            projectId,
            taskId: change.taskId,
            taskName: change.taskId ? change.taskName : undefined,
            description: change.description,
        }

        if (savePrevious) await this.snapshot(current, next)
        const plan = restartTimer ? await this.timer.suspend() : IDLE_PLAN

        await this.store.update(next)
        if (projectId && projectId !== current.projectId) {
            this.events.notice('info', `Project changed to: ${project?.name ?? projectId}`)
        }
        this.events.notice(
            'success',
            next.taskName ? `Task set to: ${next.taskName}` : 'Task cleared (description-only entry)'
        )
        this.events.notice('success', `Description set to: ${next.description}`)
        this.events.emit('selection:changed', { previous: current, current: next })

        const resumed = await this.timer.resume(plan)
        if (!resumed.ok) this.events.notice('warn', resumed.error)
        return next
    }

    /** Keeps the current task and changes only the description. */
    async setDescription(description: string): Promise<Selection> {
        const current = await this.store.selection()
        return this.setSelection({ taskId: current.taskId, taskName: current.taskName, description })
    }

    async createTask(name: string, project?: Project): Promise<Result<Task>> {
        const target = project ?? (await this.currentProject())
        if (!target) return err('No current project found. Set a project first.')
        const taskName = name.trim()
        if (!taskName) return err('Task name cannot be empty.')

        const existing = await this.formalTasks(target.id)
        if (existing.some((t) => t.name === taskName)) {
            return err(`Task '${taskName}' already exists in project '${target.name}'`)
        }

        let task: Task
        try {
            task = await this.gateway.createTask(target.id, taskName)
        } catch (error) {
            return err(`Error creating task '${taskName}': ${errorMessage(error)}`)
        }
        this.source.invalidateTasks(target.id)
        this.events.notice('success', `Task '${taskName}' created in '${target.name}'`)
        return ok(task)
    }

    async deleteTask(name: string): Promise<Result<Task>> {
        const project = await this.currentProject()
        if (!project) return err('No current project found. Set a project first.')
        const task = (await this.formalTasks(project.id)).find((t) => t.name === name)
        if (!task) return err(`Task '${name}' not found in project '${project.name}'`)

        if (!(await this.gateway.deleteTask(project.id, task.id))) {
            return err(`Failed to delete task '${name}'`)
        }
        this.source.invalidateTasks(project.id)

        const selection = await this.store.selection()
        if (selection.taskId === task.id) {
            await this.store.update({ taskId: undefined, taskName: undefined })
            this.events.notice('info', 'Cleared current task setting as it was deleted.')
        }
        return ok(task)
    }

    private async captureFromEntry(entry: TimeEntry): Promise<Selection> {
        const projectId = entry.projectId ?? undefined
        const taskId = entry.taskId ?? undefined
        const project = projectId ? await this.findProject(projectId) : null
        const task = projectId && taskId ? (await this.formalTasks(projectId)).find((t) => t.id === taskId) : undefined
        return {
            clientId: project?.clientId ?? undefined,
            projectId,
            taskId,
            taskName: task?.name,
            description: entry.description || undefined,
        }
    }

    /**
     * Swaps the current selection with the previous one, like `cd -`. The
     * state being left is read from the running entry when there is one.
     */
    async switchToPrevious(): Promise<Result<Selection>> {
        const target = await this.store.loadPrevious()
        if (!target) return err('No previous selection found. Set a task first to create a history.')
        if (!target.description) return err('Previous selection is incomplete (no description)')
        if (target.projectId && !(await this.findProject(target.projectId))) {
            return err(`Previous project (ID: ${target.projectId}) no longer exists`)
        }

        let live: TimeEntry | null = null
        try {
            live = await this.timer.activeEntry()
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'Could not read the active entry')
        }

        let leaving: Selection | null = null
        if (live) {
            const captured = await this.captureFromEntry(live)
            if (isEmptySelection(captured)) {
                this.events.notice('warn', 'Running time entry has no details, using last known selection')
            } else {
                leaving = captured
                this.events.notice('info', 'Current state captured from running time entry')
            }
        } else {
            this.events.notice('warn', 'No timer running, using last known selection (might be stale)')
        }
        const previous = leaving ?? (await this.store.selection())
        if (!isEmptySelection(previous)) await this.store.savePrevious(previous)

        let { taskId, taskName } = target
        if (target.projectId && taskId) {
            try {
                const tasks = await this.gateway.getTasks(target.projectId)
                if (!tasks.some((t) => t.id === taskId)) {
                    this.logger.warn({ taskId, taskName, projectId: target.projectId }, 'Previous task no longer exists')
                    this.events.emit('task:degraded', { projectId: target.projectId, taskId, taskName })
                    taskId = undefined
                    taskName = undefined
                }
            } catch (error) {
                this.logger.warn({ taskId, error: errorMessage(error) }, 'Could not validate previous task')
            }
        }

        const applied = await this.setSelection(
            {
                clientId: target.clientId,
                projectId: target.projectId,
                taskId,
                taskName,
                description: target.description,
            },
            { savePrevious: false, replace: true }
        )
        return ok(applied)
    }
}
