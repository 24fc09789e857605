import { afterEach, describe, expect, it, vi } from 'vitest'
import { pino } from 'pino'
import type { TimeEntry } from '../../../src/api/types.js'
import { type MonitorView, StatusMonitor } from '../../../src/monitor/status-monitor.js'

const RUNNING: TimeEntry = {
    id: 'entry-1',
    description: 'Fix login',
    projectId: 'p-web',
    timeInterval: { start: '2026-03-02T09:00:00Z', end: null },
}

describe('StatusMonitor', () => {
    afterEach(() => {
        vi.useRealTimers()
    })

    it('shows the elapsed time of the running entry', async () => {
        const monitor = new StatusMonitor(async () => RUNNING, pino({ level: 'silent' }), { render: () => {} })
        await monitor.poll()

        expect(monitor.view(Date.parse('2026-03-02T10:02:05Z'))).toEqual({
            tracking: true,
            label: 'Fix login',
            elapsed: '1:02:05',
            errors: 0,
        })
    })

    it('shows an idle view when nothing runs', async () => {
        const monitor = new StatusMonitor(async () => null, pino({ level: 'silent' }), { render: () => {} })
        await monitor.poll()
        expect(monitor.view()).toEqual({ tracking: false, label: 'Not tracking', elapsed: '0:00:00', errors: 0 })
    })

    it('keeps the last good state and logs only every tenth failure', async () => {
        const logger = pino({ level: 'silent' })
        const warn = vi.spyOn(logger, 'warn')
        let fail = false
        const monitor = new StatusMonitor(
            async () => {
                if (fail) throw new Error('offline')
                return RUNNING
            },
            logger,
            { render: () => {} }
        )

        await monitor.poll()
        fail = true
        for (let i = 0; i < 12; i++) await monitor.poll()

        expect(monitor.consecutiveErrors).toBe(12)
        expect(warn).toHaveBeenCalledTimes(2)
        expect(monitor.view().label).toBe('Fix login')

        fail = false
        await monitor.poll()
        expect(monitor.consecutiveErrors).toBe(0)
    })

    it('renders every tick and polls on the slow interval', async () => {
        vi.useFakeTimers()
        const reader = vi.fn(async () => RUNNING)
        const views: MonitorView[] = []
        const monitor = new StatusMonitor(reader, pino({ level: 'silent' }), {
            pollIntervalMs: 30_000,
            tickMs: 1_000,
            render: (view) => views.push(view),
        })

        await monitor.start()
        await vi.advanceTimersByTimeAsync(30_000)
        monitor.stop()

        expect(reader).toHaveBeenCalledTimes(2)
        expect(views).toHaveLength(31)
        expect(monitor.running).toBe(false)
    })
})
