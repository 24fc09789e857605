import type { BreakState, BreakTimer } from '../../src/breaktimer/types.js'

export class FakeBreakTimer implements BreakTimer {
    readonly name = 'Fake Pomodoro'
    available = true
    state: BreakState = 'idle'
    actions: string[] = []

    async isAvailable(): Promise<boolean> {
        return this.available
    }

    async currentState(): Promise<BreakState> {
        return this.available ? this.state : 'unknown'
    }

    async isRunning(): Promise<boolean> {
        return (await this.currentState()) === 'pomodoro'
    }

    async start(): Promise<void> {
        this.actions.push('start')
        this.state = 'pomodoro'
    }

    async stop(): Promise<void> {
        this.actions.push('stop')
        this.state = 'idle'
    }

    async pause(): Promise<void> {
        this.actions.push('pause')
        this.state = 'idle'
    }

    async resume(): Promise<void> {
        this.actions.push('resume')
        this.state = 'pomodoro'
    }

    async skip(): Promise<void> {
        this.actions.push('skip')
        this.state = 'short-break'
    }
}
