import type { TimeEntry } from '../api/types.js'
import { MONITOR_ERROR_LOG_EVERY, MONITOR_POLL_INTERVAL_MS, MONITOR_TICK_MS } from '../config/defaults.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { elapsedSeconds, formatClock } from '../utils/time.js'

export interface MonitorView {
    tracking: boolean
    label: string
    elapsed: string
    /** Consecutive failed polls since the last good one. */
    errors: number
}

export interface StatusMonitorOptions {
    pollIntervalMs?: number
    tickMs?: number
    render: (view: MonitorView) => void
}

type ActiveEntryReader = () => Promise<TimeEntry | null>

/**
 * Polls the active entry on a slow interval and renders on a fast one. The
 * elapsed clock runs from the last good poll, so a failing poll keeps the
 * previous state on screen.
 */
export class StatusMonitor {
    private entry: TimeEntry | null = null
    private errorCount = 0
    private pollTimer: ReturnType<typeof setInterval> | null = null
    private tickTimer: ReturnType<typeof setInterval> | null = null
    private pollIntervalMs: number
    private tickMs: number
    private render: (view: MonitorView) => void

    constructor(
        private readActiveEntry: ActiveEntryReader,
        private logger: Logger,
        options: StatusMonitorOptions
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? MONITOR_POLL_INTERVAL_MS
        this.tickMs = options.tickMs ?? MONITOR_TICK_MS
        this.render = options.render
    }

    get running(): boolean {
        return this.pollTimer !== null
    }

    get consecutiveErrors(): number {
        return this.errorCount
    }

    async poll(): Promise<void> {
        try {
            this.entry = await this.readActiveEntry()
            this.errorCount = 0
        } catch (error) {
            this.errorCount++
            // 1st, 11th, 21st...
            if ((this.errorCount - 1) % MONITOR_ERROR_LOG_EVERY === 0) {
                this.logger.warn({ errors: this.errorCount, error: errorMessage(error) }, 'Status poll failed')
            }
        }
    }

    view(now: number = Date.now()): MonitorView {
        if (!this.entry) {
            return { tracking: false, label: 'Not tracking', elapsed: formatClock(0), errors: this.errorCount }
        }
        return {
            tracking: true,
            label: this.entry.description || '(no description)',
            elapsed: formatClock(elapsedSeconds(this.entry.timeInterval.start, now)),
            errors: this.errorCount,
        }
    }

    async start(): Promise<void> {
        if (this.running) return
        await this.poll()
        this.render(this.view())

        this.pollTimer = setInterval(() => {
            this.poll().catch((error: unknown) => {
                this.logger.error({ error: errorMessage(error) }, 'Status poll crashed')
            })
        }, this.pollIntervalMs)
        this.tickTimer = setInterval(() => this.render(this.view()), this.tickMs)
    }

    stop(): void {
        if (this.pollTimer) clearInterval(this.pollTimer)
        if (this.tickTimer) clearInterval(this.tickTimer)
        this.pollTimer = null
        this.tickTimer = null
    }
}
