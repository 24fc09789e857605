import * as clack from '@clack/prompts'
import { createGateway } from '../../api/client.js'
import type { Workspace } from '../../api/types.js'
import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { askToken, confirmAction, pickWorkspace } from '../prompts.js'
import type { CommandOutcome } from '../runtime.js'
import { colors } from '../ui.js'

interface AuthOptions {
    token?: string
    status?: boolean
}

export function maskToken(token: string): string {
    if (token.length <= 8) return '****'
    return `${token.slice(0, 4)}...${token.slice(-4)}`
}

/** Asks for an API key, checks it against the service, picks a workspace and saves both. */
export async function authCommand(container: Container, options: AuthOptions): Promise<CommandOutcome> {
    const { store, config, logger } = container
    const settings = await store.load()

    if (options.status) {
        if (settings.token && settings.workspaceId) {
            console.log(`API key:   ${maskToken(settings.token)}`)
            console.log(`Workspace: ${settings.workspaceId}`)
            console.log(colors.success('Authenticated'))
        } else {
            console.log(colors.warn('Not authenticated. Run: tally auth'))
        }
        return 'ok'
    }

    let token = options.token
    if (!token) {
        clack.intro(colors.brand('Tally Auth'))
        if (settings.token) {
            console.log(colors.dim(`Existing key: ${maskToken(settings.token)}`))
            if (!(await confirmAction('Replace existing key?'))) return 'cancelled'
        }
        token = (await askToken()) ?? undefined
        if (!token) return 'cancelled'
    }

    const gateway = createGateway({ token, workspaceId: '', baseURL: config.baseURL }, logger)
    const spinner = clack.spinner()
    spinner.start('Validating API key...')

    let workspaces: Workspace[]
    try {
        const user = await gateway.getUser()
        workspaces = await gateway.getWorkspaces()
        spinner.stop(colors.success(`Valid key${user.name ? ` for ${user.name}` : ''}`))
    } catch (error) {
        spinner.stop(colors.error('Invalid key'))
        console.error(colors.error(errorMessage(error)))
        return 'failed'
    }

    if (workspaces.length === 0) {
        console.error(colors.error('No workspaces available for this key'))
        return 'failed'
    }
    const workspace =
        workspaces.length === 1 ? workspaces[0] : await pickWorkspace(workspaces, settings.workspaceId)
    if (!workspace) return 'cancelled'

    await store.update({ token, workspaceId: workspace.id })
    clack.outro(colors.success(`Saved! Workspace: ${workspace.name}`))
    return 'ok'
}
