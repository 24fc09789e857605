import type { Container } from '../../core/container.js'
import type { Selection } from '../../config/schema.js'
import { pickRecent } from '../prompts.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors } from '../ui.js'

function describeSelection(selection: Selection): string {
    const task = selection.taskName ?? 'no task'
    return `Switched to: ${task} - ${selection.description ?? ''}`
}

export async function switchCommand(container: Container): Promise<CommandOutcome> {
    return report(await container.reconciler.switchToPrevious(), describeSelection)
}

export async function recentCommand(container: Container): Promise<CommandOutcome> {
    const combinations = await container.reconciler.recentCombinations()
    if (combinations.length === 0) {
        console.log(colors.warn('No recent entries found.'))
        return 'cancelled'
    }

    const picked = await pickRecent(combinations)
    if (!picked) return 'cancelled'

    await container.reconciler.setSelection(
        {
            clientId: picked.clientId,
            projectId: picked.projectId,
            taskId: picked.taskId,
            taskName: picked.taskName,
            description: picked.description,
        },
        { replace: true }
    )
    return 'ok'
}
