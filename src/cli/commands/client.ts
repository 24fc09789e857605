import type { Container } from '../../core/container.js'
import { SelectionFlow } from '../../selection/flow.js'
import { ClackSelectionPrompter } from '../prompts.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors, formatCurrent } from '../ui.js'

export async function clientListCommand(container: Container): Promise<CommandOutcome> {
    const clients = await container.reconciler.clients()
    if (clients.length === 0) {
        console.log(colors.warn('No clients found.'))
        return 'ok'
    }
    const current = await container.reconciler.currentClient()
    for (const client of clients) {
        console.log(`  ${formatCurrent(client.name, client.id === current?.id)}`)
    }
    return 'ok'
}

export async function clientSelectCommand(container: Container): Promise<CommandOutcome> {
    const flow = new SelectionFlow(container.reconciler, new ClackSelectionPrompter(), container.eventBus)
    const client = await flow.selectClient()
    if (!client) return 'cancelled'
    return report(await container.reconciler.setClient(client.id), () => 'Client saved')
}

export async function clientSetCommand(container: Container, name: string): Promise<CommandOutcome> {
    return report(await container.reconciler.setClientByName(name), () => 'Client saved')
}
