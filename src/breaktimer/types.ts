export type BreakState = 'idle' | 'pomodoro' | 'short-break' | 'long-break' | 'unknown'

export const BREAK_STATES: readonly BreakState[] = ['short-break', 'long-break']

export function isBreakState(state: BreakState): boolean {
    return BREAK_STATES.includes(state)
}

/** Idle and unknown both leave open whether a resume signal was deliberate. */
export function isAmbiguousState(state: BreakState): boolean {
    return state === 'idle' || state === 'unknown'
}

export interface BreakTimer {
    readonly name: string
    isAvailable(): Promise<boolean>
    currentState(): Promise<BreakState>
    /** True while a work session (not a break) is on. */
    isRunning(): Promise<boolean>
    start(): Promise<void>
    stop(): Promise<void>
    pause(): Promise<void>
    resume(): Promise<void>
    skip(): Promise<void>
}
