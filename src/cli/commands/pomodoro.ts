import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { err, ok } from '../../core/result.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors } from '../ui.js'

export type PomodoroAction = 'start' | 'stop' | 'pause' | 'resume' | 'skip'

const PAST_TENSE: Record<PomodoroAction, string> = {
    start: 'started',
    stop: 'stopped',
    pause: 'paused',
    resume: 'resumed',
    skip: 'skipped',
}

export async function pomodoroActionCommand(container: Container, action: PomodoroAction): Promise<CommandOutcome> {
    const { breakTimer } = container
    if (!(await breakTimer.isAvailable())) {
        return report(err(`${breakTimer.name} is not available`), () => '')
    }
    try {
        await breakTimer[action]()
    } catch (error) {
        return report(err(errorMessage(error)), () => '')
    }
    return report(ok(action), () => `${breakTimer.name} ${PAST_TENSE[action]}`)
}

export async function pomodoroStatusCommand(container: Container): Promise<CommandOutcome> {
    const { breakTimer } = container
    if (!(await breakTimer.isAvailable())) {
        console.log(colors.warn(`${breakTimer.name} is not available`))
        return 'ok'
    }
    const state = await breakTimer.currentState()
    console.log(`${breakTimer.name}: ${colors.bold(state)}`)
    return 'ok'
}

export async function pomodoroSyncCommand(container: Container): Promise<CommandOutcome> {
    return report(await container.timer.syncWithBreakTimer(), (message) => message)
}
