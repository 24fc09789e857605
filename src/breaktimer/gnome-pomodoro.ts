import { execa } from 'execa'
import { BreakTimerError, errorMessage } from '../core/errors.js'
import type { BreakState, BreakTimer } from './types.js'

const DBUS_DEST = 'org.gnome.Pomodoro'
const DBUS_PATH = '/org/gnome/Pomodoro'
const DBUS_INTERFACE = 'org.gnome.Pomodoro'

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>

const runGdbus: CommandRunner = async (file, args) => {
    const { stdout } = await execa(file, args)
    return { stdout }
}

/** Parses a gdbus variant reply such as `(<'short-break'>,)`. */
export function parseStateReply(reply: string): BreakState {
    const match = /'([^']*)'/.exec(reply)
    const raw = match?.[1]
    switch (raw) {
        case 'pomodoro':
        case 'short-break':
        case 'long-break':
            return raw
        case 'null':
        case '':
            return 'idle'
        default:
            return 'unknown'
    }
}

export class GnomePomodoroTimer implements BreakTimer {
    readonly name = 'GNOME Pomodoro'

    constructor(private run: CommandRunner = runGdbus) {}

    private baseArgs(method: string): string[] {
        return ['call', '--session', '--dest', DBUS_DEST, '--object-path', DBUS_PATH, '--method', method]
    }

    private async call(method: string, ...args: string[]): Promise<string> {
        try {
            const { stdout } = await this.run('gdbus', [...this.baseArgs(`${DBUS_INTERFACE}.${method}`), ...args])
            return stdout.trim()
        } catch (error) {
            throw new BreakTimerError(`D-Bus call ${method} failed: ${errorMessage(error)}`, { cause: error })
        }
    }

    private async property(name: string): Promise<string> {
        try {
            const { stdout } = await this.run('gdbus', [
                ...this.baseArgs('org.freedesktop.DBus.Properties.Get'),
                DBUS_INTERFACE,
                name,
            ])
            return stdout.trim()
        } catch (error) {
            throw new BreakTimerError(`D-Bus property ${name} unavailable: ${errorMessage(error)}`, { cause: error })
        }
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.property('State')
            return true
        } catch {
            return false
        }
    }

    async currentState(): Promise<BreakState> {
        try {
            return parseStateReply(await this.property('State'))
        } catch {
            return 'unknown'
        }
    }

    async isRunning(): Promise<boolean> {
        return (await this.currentState()) === 'pomodoro'
    }

    async start(): Promise<void> {
        await this.call('Start')
    }

    async stop(): Promise<void> {
        await this.call('Stop')
    }

    async pause(): Promise<void> {
        await this.call('Pause')
    }

    async resume(): Promise<void> {
        await this.call('Resume')
    }

    async skip(): Promise<void> {
        await this.call('Skip')
    }
}

/** Used when the break-timer integration is switched off in the settings. */
export class DisabledBreakTimer implements BreakTimer {
    readonly name = 'none'

    async isAvailable(): Promise<boolean> {
        return false
    }

    async currentState(): Promise<BreakState> {
        return 'unknown'
    }

    async isRunning(): Promise<boolean> {
        return false
    }

    private unavailable(): never {
        throw new BreakTimerError('Break-timer integration is disabled')
    }

    async start(): Promise<void> {
        this.unavailable()
    }

    async stop(): Promise<void> {
        this.unavailable()
    }

    async pause(): Promise<void> {
        this.unavailable()
    }

    async resume(): Promise<void> {
        this.unavailable()
    }

    async skip(): Promise<void> {
        this.unavailable()
    }
}
