import * as clack from '@clack/prompts'
import type { Client, Project, Task, Workspace } from '../api/types.js'
import type { RecentCombination } from '../selection/candidates.js'
import type { DescriptionPick, ProjectPick, SelectionPrompter, TaskPick } from '../selection/flow.js'
import { colors, formatCombination } from './ui.js'

const CHECK = ' ✓'

function mark(label: string, isCurrent: boolean): string {
    return isCurrent ? `${label}${CHECK}` : label
}

export async function askToken(): Promise<string | null> {
    const result = await clack.password({
        message: 'Paste your API key:',
        validate(value) {
            if (!value.trim()) return 'API key cannot be empty'
        },
    })

    if (clack.isCancel(result)) return null
    return result.trim()
}

export async function pickWorkspace(workspaces: Workspace[], currentId?: string): Promise<Workspace | null> {
    const result = await clack.select({
        message: 'Select workspace',
        options: workspaces.map((w) => ({ value: w, label: mark(w.name, w.id === currentId) })),
    })

    if (clack.isCancel(result)) return null
    return result
}

export async function pickRecent(combinations: RecentCombination[]): Promise<RecentCombination | null> {
    const result = await clack.select({
        message: 'Recent combinations',
        options: combinations.map((c) => ({ value: c, label: formatCombination(c) })),
    })

    if (clack.isCancel(result)) return null
    return result
}

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message })
    if (clack.isCancel(result)) return false
    return result
}

/** Menus for the selection flow, drawn with clack. */
export class ClackSelectionPrompter implements SelectionPrompter {
    async pickClient(clients: Client[], currentId?: string): Promise<Client | null> {
        const result = await clack.select({
            message: 'Select client',
            options: clients.map((c) => ({ value: c, label: mark(c.name, c.id === currentId) })),
        })

        if (clack.isCancel(result)) return null
        return result
    }

    async pickProject(
        projects: Project[],
        context: { currentId?: string; clientName?: string }
    ): Promise<ProjectPick | null> {
        const options: clack.Option<ProjectPick>[] = projects.map((p) => ({
            value: { kind: 'project', project: p },
            label: mark(p.name, p.id === context.currentId),
        }))
        options.push({ value: { kind: 'change-client' }, label: colors.dim('Change client...') })

        const result = await clack.select({
            message: context.clientName ? `Select project (${context.clientName})` : 'Select project',
            options,
        })

        if (clack.isCancel(result)) return null
        return result
    }

    async pickTask(tasks: Task[], context: { project: Project; currentId?: string }): Promise<TaskPick | null> {
        const options: clack.Option<TaskPick>[] = tasks.map((t) => ({
            value: { kind: 'task', task: t },
            label: mark(t.name, t.id === context.currentId),
        }))
        options.push({ value: { kind: 'create' }, label: colors.dim('Create new task...') })
        options.push({ value: { kind: 'back' }, label: colors.dim('Back to projects') })

        const result = await clack.select({ message: `Select task in ${context.project.name}`, options })

        if (clack.isCancel(result)) return null
        return result
    }

    async pickDescription(
        descriptions: string[],
        context: { task: Task; current?: string }
    ): Promise<DescriptionPick | null> {
        const options: clack.Option<DescriptionPick>[] = descriptions.map((d) => ({
            value: { kind: 'description', description: d },
            label: mark(d, d === context.current),
        }))
        options.push({ value: { kind: 'create' }, label: colors.dim('New description...') })
        options.push({ value: { kind: 'back' }, label: colors.dim('Back to tasks') })

        const result = await clack.select({ message: `Select description for ${context.task.name}`, options })

        if (clack.isCancel(result)) return null
        return result
    }

    async askText(message: string): Promise<string | null> {
        const result = await clack.text({ message })
        if (clack.isCancel(result)) return null
        return result
    }
}
