import type { LogLevel } from '../config/schema.js'
import { loadConfig, requireCredentials } from '../config/loader.js'
import { type Container, createContainer } from '../core/container.js'
import { ConfigurationError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { NodeFileSystem } from '../core/fs.js'
import type { Result } from '../core/result.js'
import { colors, formatError, formatNotice } from './ui.js'

export type GlobalOptions = {
    token?: string
    workspace?: string
    baseUrl?: string
    debug?: boolean
}

/** `failed` maps to exit code 1; `cancelled` prints a notice and exits 0. */
export type CommandOutcome = 'ok' | 'failed' | 'cancelled'

export interface RunOptions {
    hydrate?: boolean
    /** Skip the credential check, for commands that set credentials up. */
    anonymous?: boolean
}

export function attachNotices(events: TypedEventEmitter): void {
    events.on('notice', ({ level, message }) => console.log(formatNotice(level, message)))
    events.on('task:degraded', ({ taskId, taskName }) => {
        console.log(colors.warn(`Task '${taskName ?? taskId}' no longer exists, continuing without a task`))
    })
}

export async function openContainer(globals: GlobalOptions, options: RunOptions = {}): Promise<Container> {
    const fs = new NodeFileSystem()
    const logLevel: LogLevel | undefined = globals.debug ? 'debug' : undefined
    const config = await loadConfig({
        fs,
        cliFlags: { token: globals.token, workspaceId: globals.workspace, baseURL: globals.baseUrl, logLevel },
    })
    if (!options.anonymous) requireCredentials(config)

    const container = createContainer(config, { hydrate: options.hydrate, fs })
    attachNotices(container.eventBus)
    await container.initialize()
    return container
}

/** Prints a result and maps it to an outcome. */
export function report<T>(result: Result<T>, describe: (value: T) => string): CommandOutcome {
    if (!result.ok) {
        console.error(formatError(result.error))
        return 'failed'
    }
    console.log(colors.success(describe(result.value)))
    return 'ok'
}

export async function runCommand(
    globals: GlobalOptions,
    options: RunOptions,
    body: (container: Container) => Promise<CommandOutcome>
): Promise<void> {
    let container: Container | null = null
    try {
        container = await openContainer(globals, options)
        const outcome = await body(container)
        if (outcome === 'cancelled') console.log(colors.dim('Cancelled.'))
        if (outcome === 'failed') process.exitCode = 1
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(formatError(error.message))
            console.error(colors.dim("Run 'tally auth' or set TALLY_TOKEN and TALLY_WORKSPACE_ID."))
        } else {
            console.error(formatError(errorMessage(error)))
        }
        process.exitCode = 1
    } finally {
        await container?.shutdown()
    }
}
