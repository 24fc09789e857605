import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { err, ok, type Result } from '../../core/result.js'
import type { StartRequest } from '../../tracking/timer-controller.js'
import { formatDuration } from '../../utils/time.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors } from '../ui.js'

export interface StartOptions {
    description?: string
    project?: string
    task?: string
}

/** Resolves `--project`/`--task` given by name or id into a start request. */
async function resolveRequest(container: Container, options: StartOptions): Promise<Result<StartRequest>> {
    const { reconciler } = container
    const request: StartRequest = { description: options.description }

    if (options.project) {
        const project =
            (await reconciler.findProjectByName(options.project)) ?? (await reconciler.findProject(options.project))
        if (!project) return err(`Project '${options.project}' not found`)
        request.projectId = project.id
    }

    if (options.task) {
        const projectId = request.projectId ?? (await reconciler.currentProject())?.id
        if (!projectId) return err("No project specified. Use --project or run 'tally project select' first.")
        const tasks = await reconciler.formalTasks(projectId)
        const task = tasks.find((t) => t.name === options.task || t.id === options.task)
        if (!task) return err(`Task '${options.task}' not found`)
        request.projectId = projectId
        request.taskId = task.id
        request.taskName = task.name
    }

    return ok(request)
}

export async function startCommand(container: Container, options: StartOptions): Promise<CommandOutcome> {
    const request = await resolveRequest(container, options)
    if (!request.ok) return report(request, () => '')

    const started = await container.timer.start(request.value)
    return report(started, (entry) => `Time tracking started: ${entry.description ?? ''}`)
}

export async function stopCommand(container: Container): Promise<CommandOutcome> {
    const stopped = await container.timer.stop()
    return report(stopped, (entry) => {
        const duration = formatDuration(entry.timeInterval.start, entry.timeInterval.end)
        return `Time tracking stopped: ${entry.description ?? ''} (${duration})`
    })
}

/** Skips the current break-timer session, then stops the entry. */
export async function skipCommand(container: Container): Promise<CommandOutcome> {
    const { breakTimer } = container
    if (await breakTimer.isAvailable()) {
        try {
            await breakTimer.skip()
            console.log(colors.info(`${breakTimer.name} session skipped`))
        } catch (error) {
            console.log(colors.warn(`Failed to skip ${breakTimer.name}: ${errorMessage(error)}`))
        }
    }
    return stopCommand(container)
}

export async function describeCommand(container: Container, text: string): Promise<CommandOutcome> {
    const description = text.trim()
    if (!description) return report(err('Description cannot be empty.'), () => '')

    const changed = await container.timer.changeDescription(description)
    return report(changed, (entry) => (entry ? `Tracking resumed: ${entry.description ?? ''}` : 'Description saved'))
}
