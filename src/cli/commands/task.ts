import type { Container } from '../../core/container.js'
import { err } from '../../core/result.js'
import { SelectionFlow } from '../../selection/flow.js'
import { ClackSelectionPrompter, confirmAction } from '../prompts.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors, formatCurrent } from '../ui.js'

export async function taskListCommand(container: Container): Promise<CommandOutcome> {
    const { reconciler } = container
    const project = await reconciler.currentProject()
    if (!project) return report(err('No current project found. Set a project first.'), () => '')

    const tasks = await reconciler.formalTasks(project.id)
    console.log(colors.bold(`Tasks in ${project.name}:`))
    if (tasks.length === 0) {
        console.log(colors.dim('  (none)'))
        return 'ok'
    }
    const { taskId } = await reconciler.selection()
    for (const task of tasks) {
        console.log(`  ${formatCurrent(task.name, task.id === taskId)}`)
    }
    return 'ok'
}

/** Task, then description, within the current project. */
export async function taskSelectCommand(container: Container): Promise<CommandOutcome> {
    const flow = new SelectionFlow(container.reconciler, new ClackSelectionPrompter(), container.eventBus)
    const result = await flow.run('task')
    if (!result) return 'cancelled'

    await container.reconciler.setSelection({
        projectId: result.project.id,
        taskId: result.task.id,
        taskName: result.task.name,
        description: result.description,
    })
    return 'ok'
}

export async function taskSetCommand(container: Container, description: string): Promise<CommandOutcome> {
    const text = description.trim()
    if (!text) return report(err('Description cannot be empty.'), () => '')
    await container.reconciler.setDescription(text)
    return 'ok'
}

export async function taskCreateCommand(container: Container, name: string): Promise<CommandOutcome> {
    return report(await container.reconciler.createTask(name), (task) => `Task ID: ${task.id}`)
}

export async function taskDeleteCommand(
    container: Container,
    name: string,
    options: { yes?: boolean }
): Promise<CommandOutcome> {
    if (!options.yes && !(await confirmAction(`Delete task '${name}'?`))) return 'cancelled'
    return report(await container.reconciler.deleteTask(name), (task) => `Task '${task.name}' deleted`)
}
