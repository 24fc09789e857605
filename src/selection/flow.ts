import type { Client, Project, Task } from '../api/types.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { SelectionReconciler } from './reconciler.js'

export type ProjectPick = { kind: 'project'; project: Project } | { kind: 'change-client' }
export type TaskPick = { kind: 'task'; task: Task } | { kind: 'create' } | { kind: 'back' }
export type DescriptionPick = { kind: 'description'; description: string } | { kind: 'create' } | { kind: 'back' }

/**
 * Interactive side of selection. Every method resolves to `null` when the
 * user cancels.
 */
export interface SelectionPrompter {
    pickClient(clients: Client[], currentId?: string): Promise<Client | null>
    pickProject(projects: Project[], context: { currentId?: string; clientName?: string }): Promise<ProjectPick | null>
    pickTask(tasks: Task[], context: { project: Project; currentId?: string }): Promise<TaskPick | null>
    pickDescription(
        descriptions: string[],
        context: { task: Task; current?: string }
    ): Promise<DescriptionPick | null>
    askText(message: string): Promise<string | null>
}

export type FlowLevel = 'project' | 'task'

export interface FlowResult {
    project: Project
    task: Task
    description: string
}

const BACK = Symbol('back')

type Step =
    | { level: 'project' }
    | { level: 'task'; project: Project }
    | { level: 'description'; project: Project; task: Task }
    | { level: 'done'; result: FlowResult }
    | { level: 'cancelled' }

/**
 * Walks project → task → description. "Back" returns to the previous level,
 * cancel at any level ends the walk with `null`. Nothing is committed here.
 */
export class SelectionFlow {
    constructor(
        private reconciler: SelectionReconciler,
        private prompter: SelectionPrompter,
        private events: TypedEventEmitter
    ) {}

    async run(startAt: FlowLevel = 'project'): Promise<FlowResult | null> {
        let step: Step = { level: 'project' }
        if (startAt === 'task') {
            const project = await this.reconciler.currentProject()
            if (project) {
                step = { level: 'task', project }
            } else {
                this.events.notice('info', 'No current project found, choose one first.')
            }
        }

        while (true) {
            switch (step.level) {
                case 'project': {
                    const project = await this.selectProject()
                    step = project ? { level: 'task', project } : { level: 'cancelled' }
                    break
                }
                case 'task': {
                    const task = await this.selectTask(step.project)
                    if (task === BACK) step = { level: 'project' }
                    else if (task) step = { level: 'description', project: step.project, task }
                    else step = { level: 'cancelled' }
                    break
                }
                case 'description': {
                    const description = await this.selectDescription(step.project, step.task)
                    if (description === BACK) step = { level: 'task', project: step.project }
                    else if (description !== null) {
                        step = { level: 'done', result: { project: step.project, task: step.task, description } }
                    } else step = { level: 'cancelled' }
                    break
                }
                case 'done':
                    return step.result
                case 'cancelled':
                    return null
            }
        }
    }

    async selectClient(): Promise<Client | null> {
        const clients = await this.reconciler.clients()
        if (clients.length === 0) {
            this.events.notice('warn', 'No clients found in this workspace.')
            return null
        }
        const current = await this.reconciler.currentClient()
        return this.prompter.pickClient(clients, current?.id)
    }

    /** Lists the projects of the current client; the user may switch client in place. */
    async selectProject(): Promise<Project | null> {
        while (true) {
            const projects = await this.reconciler.projects()
            if (projects.length === 0) {
                this.events.notice('warn', 'No projects found in this workspace.')
                return null
            }

            const client = await this.reconciler.currentClient()
            const visible = client ? projects.filter((p) => p.clientId === client.id) : projects
            if (visible.length === 0) {
                this.events.notice('warn', `No projects found for client: ${client?.name ?? 'unknown'}`)
                return null
            }

            const current = await this.reconciler.currentProject()
            const pick = await this.prompter.pickProject(visible, { currentId: current?.id, clientName: client?.name })
            if (!pick) return null
            if (pick.kind === 'project') return pick.project

            const chosen = await this.selectClient()
            if (chosen) {
                const changed = await this.reconciler.setClient(chosen.id)
                if (!changed.ok) this.events.notice('warn', changed.error)
            }
        }
    }

    private async selectTask(project: Project): Promise<Task | typeof BACK | null> {
        const tasks = await this.reconciler.formalTasks(project.id)
        if (tasks.length === 0) {
            this.events.notice('info', `No tasks in '${project.name}' yet, create one.`)
            return this.createTask(project)
        }

        const selection = await this.reconciler.selection()
        const pick = await this.prompter.pickTask(tasks, { project, currentId: selection.taskId })
        if (!pick) return null
        if (pick.kind === 'back') return BACK
        if (pick.kind === 'task') return pick.task
        return this.createTask(project)
    }

    private async createTask(project: Project): Promise<Task | null> {
        const name = await this.prompter.askText(`Name of the new task in '${project.name}'`)
        if (name === null) return null
        const created = await this.reconciler.createTask(name, project)
        if (!created.ok) {
            this.events.notice('warn', created.error)
            return null
        }
        return created.value
    }

    private async selectDescription(project: Project, task: Task): Promise<string | typeof BACK | null> {
        const candidates = await this.reconciler.descriptionsFor(project.id, task.id)
        const selection = await this.reconciler.selection()
        const pick = await this.prompter.pickDescription(candidates, { task, current: selection.description })
        if (!pick) return null
        if (pick.kind === 'back') return BACK
        if (pick.kind === 'description') return pick.description

        const text = await this.prompter.askText(`Description for '${task.name}'`)
        if (text === null) return null
        const description = text.trim()
        if (!description) {
            this.events.notice('warn', 'Description cannot be empty.')
            return null
        }
        return description
    }
}
