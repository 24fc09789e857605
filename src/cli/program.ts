import { Command } from 'commander'
import { authCommand } from './commands/auth.js'
import { clientListCommand, clientSelectCommand, clientSetCommand } from './commands/client.js'
import { configCommand } from './commands/config-cmd.js'
import { recentCommand, switchCommand } from './commands/history.js'
import { infoCommand } from './commands/info.js'
import { type PomodoroAction, pomodoroActionCommand, pomodoroStatusCommand, pomodoroSyncCommand } from './commands/pomodoro.js'
import {
    projectListCommand,
    projectSelectCommand,
    projectSetCommand,
    projectTaskCommand,
} from './commands/project.js'
import {
    taskCreateCommand,
    taskDeleteCommand,
    taskListCommand,
    taskSelectCommand,
    taskSetCommand,
} from './commands/task.js'
import { type StartOptions, describeCommand, skipCommand, startCommand, stopCommand } from './commands/time.js'
import { watchCommand } from './commands/watch.js'
import { type GlobalOptions, runCommand } from './runtime.js'

const POMODORO_ACTIONS: PomodoroAction[] = ['start', 'stop', 'pause', 'resume', 'skip']

export function createProgram(): Command {
    const program = new Command()
    const globals = () => program.opts<GlobalOptions>()

    program
        .name('tally')
        .description('Time tracking from the terminal, with selection history and break-timer sync')
        .version('0.1.0')
        .option('--token <token>', 'API key (overrides TALLY_TOKEN and the config file)')
        .option('--workspace <id>', 'Workspace ID (overrides TALLY_WORKSPACE_ID)')
        .option('--base-url <url>', 'API base URL')
        .option('--debug', 'Enable debug logging')

    program
        .command('auth')
        .description('Configure the API key and workspace')
        .option('--status', 'Show authentication status')
        .action((options: { status?: boolean }) =>
            runCommand(globals(), { anonymous: true }, (c) =>
                authCommand(c, { token: globals().token, status: options.status })
            )
        )

    program
        .command('info')
        .description('Show workspace, current selection, active entry and break-timer state')
        .action(() => runCommand(globals(), { hydrate: true }, infoCommand))

    const start = (options: StartOptions) => runCommand(globals(), {}, (c) => startCommand(c, options))
    for (const name of ['start', 'resume']) {
        program
            .command(name)
            .description('Start a time entry with the current selection')
            .option('-d, --description <text>', 'Description of the entry')
            .option('-p, --project <name>', 'Project name or ID')
            .option('-t, --task <name>', 'Task name or ID')
            .action(start)
    }

    for (const name of ['stop', 'pause', 'complete']) {
        program
            .command(name)
            .description('Stop the active time entry')
            .action(() => runCommand(globals(), {}, stopCommand))
    }

    program
        .command('skip')
        .description('Skip the break-timer session and stop the active entry')
        .action(() => runCommand(globals(), {}, skipCommand))

    program
        .command('describe <text>')
        .description('Change the description, restarting the entry when a work session is on')
        .action((text: string) => runCommand(globals(), {}, (c) => describeCommand(c, text)))

    program
        .command('switch')
        .description('Swap the current selection with the previous one')
        .action(() => runCommand(globals(), { hydrate: true }, switchCommand))

    program
        .command('recent')
        .description('Pick one of the recent client/project/task/description combinations')
        .action(() => runCommand(globals(), { hydrate: true }, recentCommand))

    program
        .command('project-task')
        .description('Select project, task and description in one go')
        .action(() => runCommand(globals(), { hydrate: true }, projectTaskCommand))

    const client = program.command('client').description('Manage the current client')
    client
        .command('list')
        .description('List clients')
        .action(() => runCommand(globals(), { hydrate: true }, clientListCommand))
    client
        .command('select')
        .description('Pick the current client')
        .action(() => runCommand(globals(), { hydrate: true }, clientSelectCommand))
    client
        .command('set <name>')
        .description('Set the current client by name')
        .action((name: string) => runCommand(globals(), {}, (c) => clientSetCommand(c, name)))

    const project = program.command('project').description('Manage the current project')
    project
        .command('list')
        .description('List projects')
        .action(() => runCommand(globals(), { hydrate: true }, projectListCommand))
    project
        .command('select')
        .description('Pick the current project')
        .action(() => runCommand(globals(), { hydrate: true }, projectSelectCommand))
    project
        .command('set <name>')
        .description('Set the current project by name')
        .action((name: string) => runCommand(globals(), {}, (c) => projectSetCommand(c, name)))

    const task = program.command('task').description('Manage tasks of the current project')
    task.command('list')
        .description('List tasks of the current project')
        .action(() => runCommand(globals(), { hydrate: true }, taskListCommand))
    task.command('select')
        .description('Pick task and description')
        .action(() => runCommand(globals(), { hydrate: true }, taskSelectCommand))
    task.command('set <description>')
        .description('Set the description, keeping the current task')
        .action((description: string) => runCommand(globals(), {}, (c) => taskSetCommand(c, description)))
    task.command('create <name>')
        .description('Create a task in the current project')
        .action((name: string) => runCommand(globals(), {}, (c) => taskCreateCommand(c, name)))
    task.command('delete <name>')
        .description('Delete a task from the current project')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action((name: string, options: { yes?: boolean }) =>
            runCommand(globals(), {}, (c) => taskDeleteCommand(c, name, options))
        )

    const pomodoro = program.command('pomodoro').description('Control the break timer')
    for (const action of POMODORO_ACTIONS) {
        pomodoro
            .command(action)
            .description(`${action[0]?.toUpperCase() ?? ''}${action.slice(1)} the break timer`)
            .action(() => runCommand(globals(), { anonymous: true }, (c) => pomodoroActionCommand(c, action)))
    }
    pomodoro
        .command('status')
        .description('Show the break-timer state')
        .action(() => runCommand(globals(), { anonymous: true }, pomodoroStatusCommand))
    pomodoro
        .command('sync')
        .description('Start or stop the entry to match the break timer')
        .action(() => runCommand(globals(), {}, pomodoroSyncCommand))

    program
        .command('watch')
        .description('Show the running entry in the terminal until interrupted')
        .action(() => runCommand(globals(), {}, watchCommand))

    program
        .command('config [key] [value]')
        .description('Show or change configuration')
        .action((key?: string, value?: string) =>
            runCommand(globals(), { anonymous: true }, (c) => configCommand(c, key, value))
        )

    return program
}
