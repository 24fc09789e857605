import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { elapsedMinutes } from '../../utils/time.js'
import type { CommandOutcome } from '../runtime.js'
import { colors, formatCurrent, formatSelection } from '../ui.js'

export async function infoCommand(container: Container): Promise<CommandOutcome> {
    const { reconciler, timer, breakTimer, config, gateway } = container

    const workspaces = await gateway.getWorkspaces()
    const workspace = workspaces.find((w) => w.id === config.workspaceId)
    console.log(colors.brand('Tally'))
    console.log(`Workspace:   ${workspace?.name ?? config.workspaceId}`)

    const selection = await reconciler.selection()
    const project = await reconciler.currentProject()
    const client = await reconciler.currentClient()
    for (const line of formatSelection(selection, project, client?.name)) console.log(line)

    if (project) {
        const tasks = await reconciler.formalTasks(project.id)
        console.log(colors.bold(`\nTasks in ${project.name}:`))
        if (tasks.length === 0) console.log(colors.dim('  (none)'))
        for (const task of tasks) console.log(`  ${formatCurrent(task.name, task.id === selection.taskId)}`)
    }

    console.log('')
    try {
        const active = await timer.activeEntry()
        if (active) {
            const minutes = Math.floor(elapsedMinutes(active.timeInterval.start))
            console.log(colors.success(`Tracking: ${active.description || '(no description)'} (${minutes} min)`))
        } else {
            console.log(colors.dim('Not tracking'))
        }
    } catch (error) {
        console.log(colors.warn(`Could not check the active entry: ${errorMessage(error)}`))
    }

    if (await breakTimer.isAvailable()) {
        console.log(`${breakTimer.name}: ${await breakTimer.currentState()}`)
    } else {
        console.log(colors.dim('Break timer: not available'))
    }
    return 'ok'
}
