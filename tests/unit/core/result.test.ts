import { describe, it, expect } from 'vitest'
import { ok, err, type Result } from '../../../src/core/result.js'

function parseLimit(raw: string): Result<number> {
    const value = Number(raw)
    return Number.isInteger(value) && value > 0 ? ok(value) : err(`Invalid limit: ${raw}`)
}

describe('Result', () => {
    it('carries the value on success', () => {
        expect(parseLimit('50')).toEqual({ ok: true, value: 50 })
    })

    it('carries the message on failure', () => {
        expect(parseLimit('many')).toEqual({ ok: false, error: 'Invalid limit: many' })
    })

    it('narrows on the ok flag', () => {
        const result = parseLimit('7')
        const doubled = result.ok ? result.value * 2 : 0
        expect(doubled).toBe(14)
    })
})
