import type { Client, TimeEntry } from '../api/types.js'
import type { Selection } from '../config/schema.js'

export type NoticeLevel = 'info' | 'warn' | 'success'

export type EventMap = {
    'selection:changed': { previous: Selection; current: Selection }
    'client:auto-updated': { client: Client }
    'task:degraded': { projectId: string; taskId: string; taskName?: string }
    'timer:started': { entry: TimeEntry }
    'timer:stopped': { entry: TimeEntry | null }
    notice: { level: NoticeLevel; message: string }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    private setFor<K extends keyof EventMap>(event: K): Set<EventHandler<EventMap[K]>> {
        const existing: HandlerSets[K] = this.handlers[event]
        if (existing) return existing
        const created = new Set<EventHandler<EventMap[K]>>()
        this.handlers[event] = created as HandlerSets[K]
        return created
    }

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.setFor(event).add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: HandlerSets[K] = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    notice(level: NoticeLevel, message: string): void {
        this.emit('notice', { level, message })
    }

    removeAll(): void {
        this.handlers = {}
    }
}
