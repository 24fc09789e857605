import type { Gateway, TimeEntry } from '../api/types.js'
import { isAmbiguousState, isBreakState, type BreakTimer } from '../breaktimer/types.js'
import { RESTART_COOLDOWN_MS } from '../config/defaults.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { err, ok, type Result } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { SettingsStore } from '../store/settings-store.js'
import type { WorkspaceSource } from '../workspace/source.js'

/** What was running before a switch, so the same things can be brought back afterwards. */
export interface ResumePlan {
    wasTracking: boolean
    wasBreakRunning: boolean
}

export const IDLE_PLAN: ResumePlan = { wasTracking: false, wasBreakRunning: false }

export interface StartRequest {
    description?: string
    projectId?: string
    taskId?: string
    /** Name of `taskId`, kept when the task cannot be validated. */
    taskName?: string
}

export interface StartOptions {
    /** Set for restarts the program itself triggers right after stopping. */
    bypassCooldown?: boolean
}

export interface TimerControllerDeps {
    gateway: Gateway
    store: SettingsStore
    source: WorkspaceSource
    breakTimer: BreakTimer
    events: TypedEventEmitter
    logger: Logger
}

export class TimerController {
    private gateway: Gateway
    private store: SettingsStore
    private source: WorkspaceSource
    private breakTimer: BreakTimer
    private events: TypedEventEmitter
    private logger: Logger

    constructor(deps: TimerControllerDeps) {
        this.gateway = deps.gateway
        this.store = deps.store
        this.source = deps.source
        this.breakTimer = deps.breakTimer
        this.events = deps.events
        this.logger = deps.logger
    }

    async activeEntry(): Promise<TimeEntry | null> {
        return this.gateway.getActiveEntry()
    }

    async isTracking(): Promise<boolean> {
        try {
            return (await this.gateway.getActiveEntry()) !== null
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'Could not check for an active time entry')
            return false
        }
    }

    private async breakTimerRunning(): Promise<boolean> {
        if (!(await this.breakTimer.isAvailable())) return false
        return this.breakTimer.isRunning()
    }

    async start(request: StartRequest = {}, options: StartOptions = {}): Promise<Result<TimeEntry>> {
        const settings = await this.store.load()

        const description = request.description ?? settings.description
        if (!description) {
            return err("No description specified. Use --description or run 'tally task select' first.")
        }
        const projectId = request.projectId ?? settings.projectId
        if (!projectId) {
            return err("No project specified. Use --project or run 'tally project select' first.")
        }

        let active: TimeEntry | null
        try {
            active = await this.gateway.getActiveEntry()
        } catch (error) {
            return err(`Could not check for an active time entry: ${errorMessage(error)}`)
        }
        if (active) return err('Time tracking is already active')

        let taskId = request.taskId ?? settings.taskId
        let taskName = request.taskName ?? (taskId === settings.taskId ? settings.taskName : undefined)
        if (taskId) {
            try {
                const task = (await this.gateway.getTasks(projectId)).find((t) => t.id === taskId)
                if (task) {
                    taskName = task.name
                } else {
                    this.logger.warn({ taskId, taskName, projectId }, 'Task no longer exists in project, starting without it')
                    this.events.emit('task:degraded', { projectId, taskId, taskName })
                    taskId = undefined
                    taskName = undefined
                }
            } catch (error) {
                this.logger.warn({ taskId, error: errorMessage(error) }, 'Could not validate task, keeping it')
                this.events.notice('warn', `Could not validate task: ${errorMessage(error)}`)
            }
        }
        await this.store.update({ description, projectId, taskId, taskName })

        if (await this.breakTimer.isAvailable()) {
            const state = await this.breakTimer.currentState()
            if (isBreakState(state)) {
                return err(`${this.breakTimer.name} is in ${state} state, not starting the time entry`)
            }
            if (!options.bypassCooldown && isAmbiguousState(state) && settings.lastStopTime !== undefined) {
                const sinceStop = Date.now() - settings.lastStopTime
                if (sinceStop < RESTART_COOLDOWN_MS) {
                    return err(`Ignoring start ${(sinceStop / 1000).toFixed(1)}s after stop (likely a spurious resume)`)
                }
            }
        }

        let entry: TimeEntry
        try {
            entry = await this.gateway.startEntry({ description, projectId, taskId })
        } catch (error) {
            return err(`Error starting time entry: ${errorMessage(error)}`)
        }

        await this.store.update({ currentEntryId: entry.id, lastStopTime: undefined })
        this.source.invalidateTimeEntries()
        this.events.emit('timer:started', { entry })
        return ok(entry)
    }

    async stop(): Promise<Result<TimeEntry>> {
        let active: TimeEntry | null
        try {
            active = await this.gateway.getActiveEntry()
        } catch (error) {
            return err(`Could not check for an active time entry: ${errorMessage(error)}`)
        }
        if (!active) return err('No active time entry found')

        try {
            const stopped = (await this.gateway.stopEntry()) ?? active
            await this.store.update({ currentEntryId: undefined, lastStopTime: Date.now() })
            this.source.invalidateTimeEntries()
            this.events.emit('timer:stopped', { entry: stopped })
            return ok(stopped)
        } catch (error) {
            // forget the entry anyway so the next start is not blocked by stale local state
            await this.store.update({ currentEntryId: undefined, lastStopTime: Date.now() })
            return err(`Error stopping time entry: ${errorMessage(error)}`)
        }
    }

    /** Stops the entry and pauses the break timer, reporting what was running. */
    async suspend(): Promise<ResumePlan> {
        const wasTracking = await this.isTracking()
        const wasBreakRunning = await this.breakTimerRunning()

        if (wasTracking) {
            this.events.notice('info', 'Stopping current timer due to task/description change...')
            const stopped = await this.stop()
            if (!stopped.ok) this.events.notice('warn', stopped.error)
        }
        if (wasBreakRunning) {
            await this.tryBreakTimer('pause')
        }
        return { wasTracking, wasBreakRunning }
    }

    /**
     * Brings back what `suspend` stopped. The break timer goes first: `start`
     * refuses to run while it still reports a break.
     */
    async resume(plan: ResumePlan): Promise<Result<TimeEntry | null>> {
        if (!plan.wasTracking && !plan.wasBreakRunning) return ok(null)

        if (plan.wasBreakRunning && (await this.breakTimer.isAvailable())) {
            await this.tryBreakTimer('resume')
        }
        const started = await this.start({}, { bypassCooldown: true })
        if (!started.ok) return err(`Failed to restart the time entry: ${started.error}`)
        return ok(started.value)
    }

    /**
     * Restarts only when both the entry and the break timer were running;
     * with the break timer off the user starts again explicitly.
     */
    async changeDescription(description: string): Promise<Result<TimeEntry | null>> {
        const wasTracking = await this.isTracking()
        const wasBreakRunning = await this.breakTimerRunning()

        if (wasTracking) {
            const stopped = await this.stop()
            if (!stopped.ok) this.events.notice('warn', `Failed to stop current entry, continuing: ${stopped.error}`)
            if (wasBreakRunning) await this.tryBreakTimer('pause')
        }

        await this.store.update({ description })
        this.events.notice('success', `Description updated to: ${description}`)

        if (wasTracking && wasBreakRunning) {
            return this.resume({ wasTracking, wasBreakRunning })
        }
        if (wasTracking) {
            this.events.notice('info', "Use 'tally start' to begin tracking with the new description.")
        }
        return ok(null)
    }

    /** Starts or stops the entry so it matches whether a work session is on. */
    async syncWithBreakTimer(): Promise<Result<string>> {
        if (!(await this.breakTimer.isAvailable())) return err(`${this.breakTimer.name} integration not available`)

        const breakRunning = await this.breakTimer.isRunning()
        const tracking = await this.isTracking()

        if (breakRunning && !tracking) {
            const started = await this.start()
            return started.ok ? ok('Break timer is running, time entry started') : err(started.error)
        }
        if (!breakRunning && tracking) {
            const stopped = await this.stop()
            return stopped.ok ? ok('Break timer is not running, time entry stopped') : err(stopped.error)
        }
        return ok('Break timer and time entry are in sync')
    }

    private async tryBreakTimer(action: 'pause' | 'resume'): Promise<void> {
        try {
            await this.breakTimer[action]()
            this.events.notice('info', `${this.breakTimer.name} ${action === 'pause' ? 'paused' : 'resumed'}`)
        } catch (error) {
            this.logger.warn({ action, error: errorMessage(error) }, 'Break timer call failed')
            this.events.notice('warn', `Failed to ${action} ${this.breakTimer.name}: ${errorMessage(error)}`)
        }
    }
}
