import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

const ENTRY = { id: 'entry-1', description: 'Fix login', timeInterval: { start: '2026-03-02T09:00:00Z', end: null } }

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('timer:started', handler)
        emitter.emit('timer:started', { entry: ENTRY })

        expect(handler.mock.calls[0]).toEqual([{ entry: ENTRY }])
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('timer:stopped', h1)
        emitter.on('timer:stopped', h2)
        emitter.emit('timer:stopped', { entry: null })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('client:auto-updated', handler)
        emitter.off('client:auto-updated', handler)
        emitter.emit('client:auto-updated', { client: { id: 'c-acme', name: 'Acme' } })

        expect(handler).not.toHaveBeenCalled()
    })

    it('notice is shorthand for the notice event', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('notice', handler)
        emitter.notice('warn', 'Careful')

        expect(handler).toHaveBeenCalledWith({ level: 'warn', message: 'Careful' })
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('notice', handler)
        emitter.removeAll()
        emitter.notice('info', 'ignored')

        expect(handler).not.toHaveBeenCalled()
    })

    it('swallows handler exceptions', () => {
        const emitter = new TypedEventEmitter()
        const badHandler = vi.fn(() => {
            throw new Error('boom')
        })
        const goodHandler = vi.fn()

        emitter.on('task:degraded', badHandler)
        emitter.on('task:degraded', goodHandler)
        emitter.emit('task:degraded', { projectId: 'p-web', taskId: 't-gone' })

        expect(badHandler).toHaveBeenCalledTimes(1)
        expect(goodHandler).toHaveBeenCalledTimes(1)
    })
})
