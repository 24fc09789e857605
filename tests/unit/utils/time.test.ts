import { describe, expect, it } from 'vitest'
import { elapsedSeconds, formatClock, formatDuration, utcTimestamp } from '../../../src/utils/time.js'

describe('time helpers', () => {
    it('formats UTC timestamps without milliseconds', () => {
        expect(utcTimestamp(new Date('2026-03-02T09:15:30.456Z'))).toBe('2026-03-02T09:15:30Z')
    })

    it('counts whole elapsed seconds and never goes negative', () => {
        const now = Date.parse('2026-03-02T09:01:30.900Z')
        expect(elapsedSeconds('2026-03-02T09:00:00Z', now)).toBe(90)
        expect(elapsedSeconds('2026-03-02T10:00:00Z', now)).toBe(0)
        expect(elapsedSeconds('not a date', now)).toBe(0)
    })

    it('formats a clock', () => {
        expect(formatClock(0)).toBe('0:00:00')
        expect(formatClock(3725)).toBe('1:02:05')
    })

    it('formats durations', () => {
        expect(formatDuration('2026-03-02T09:00:00Z', null)).toBe('In progress')
        expect(formatDuration('2026-03-02T09:00:00Z', '2026-03-02T09:45:00Z')).toBe('45m')
        expect(formatDuration('2026-03-02T09:00:00Z', '2026-03-02T11:05:00Z')).toBe('2h 5m')
        expect(formatDuration('2026-03-02T09:00:00Z', '2026-03-02T09:00:00Z')).toBe('Unknown')
    })
})
