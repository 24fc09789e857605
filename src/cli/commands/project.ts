import type { Container } from '../../core/container.js'
import { SelectionFlow } from '../../selection/flow.js'
import { ClackSelectionPrompter } from '../prompts.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors, formatCurrent } from '../ui.js'

export async function projectListCommand(container: Container): Promise<CommandOutcome> {
    const { reconciler } = container
    const [projects, clients] = [await reconciler.projects(), await reconciler.clients()]
    if (projects.length === 0) {
        console.log(colors.warn('No projects found.'))
        return 'ok'
    }
    const current = await reconciler.currentProject()
    for (const project of projects) {
        const client = clients.find((c) => c.id === project.clientId)
        const suffix = client ? colors.dim(` (${client.name})`) : ''
        console.log(`  ${formatCurrent(project.name, project.id === current?.id)}${suffix}`)
    }
    return 'ok'
}

export async function projectSelectCommand(container: Container): Promise<CommandOutcome> {
    const flow = new SelectionFlow(container.reconciler, new ClackSelectionPrompter(), container.eventBus)
    const project = await flow.selectProject()
    if (!project) return 'cancelled'
    return report(await container.reconciler.setProject(project.id), () => 'Project saved')
}

export async function projectSetCommand(container: Container, name: string): Promise<CommandOutcome> {
    return report(await container.reconciler.setProjectByName(name), () => 'Project saved')
}

/** Full walk: project, then task, then description. */
export async function projectTaskCommand(container: Container): Promise<CommandOutcome> {
    const flow = new SelectionFlow(container.reconciler, new ClackSelectionPrompter(), container.eventBus)
    const result = await flow.run('project')
    if (!result) return 'cancelled'

    await container.reconciler.setSelection({
        projectId: result.project.id,
        taskId: result.task.id,
        taskName: result.task.name,
        description: result.description,
    })
    return 'ok'
}
