import { pino } from 'pino'
import type { Client, Project, Task, TimeEntry } from '../../src/api/types.js'
import type { Settings } from '../../src/config/schema.js'
import { TypedEventEmitter } from '../../src/core/events.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { SelectionReconciler } from '../../src/selection/reconciler.js'
import { SettingsStore } from '../../src/store/settings-store.js'
import { TimerController } from '../../src/tracking/timer-controller.js'
import { DirectWorkspaceSource, type WorkspaceSource } from '../../src/workspace/source.js'
import { FakeBreakTimer } from './fake-break-timer.js'
import { FakeGateway } from './fake-gateway.js'

export const CONFIG_DIR = '/home/test/.config/tally'

export function workspaceFixture(): { clients: Client[]; projects: Project[]; tasks: Task[]; entries: TimeEntry[] } {
    return {
        clients: [
            { id: 'c-acme', name: 'Acme' },
            { id: 'c-globex', name: 'Globex' },
        ],
        projects: [
            { id: 'p-web', name: 'Acme Website', clientId: 'c-acme' },
            { id: 'p-api', name: 'Globex API', clientId: 'c-globex' },
            { id: 'p-internal', name: 'Internal', clientId: null },
        ],
        tasks: [
            { id: 't-bug', name: 'Bugfix', projectId: 'p-web' },
            { id: 't-design', name: 'Design', projectId: 'p-web' },
            { id: 't-docs', name: 'Docs', projectId: 'p-api' },
        ],
        entries: [
            closedEntry('e-4', 'Fix login', 'p-web', 't-bug', '2026-03-01T15:00:00Z'),
            closedEntry('e-3', 'Mockups', 'p-web', 't-design', '2026-03-01T13:00:00Z'),
            closedEntry('e-2', 'Standup', 'p-web', null, '2026-03-01T10:00:00Z'),
            closedEntry('e-1', 'Write guide', 'p-api', 't-docs', '2026-03-01T09:00:00Z'),
        ],
    }
}

export function closedEntry(
    id: string,
    description: string,
    projectId: string | null,
    taskId: string | null,
    start: string
): TimeEntry {
    const end = new Date(Date.parse(start) + 30 * 60_000).toISOString().replace(/\.\d{3}Z$/, 'Z')
    return { id, description, projectId, taskId, timeInterval: { start, end } }
}

export interface Harness {
    fs: MockFileSystem
    store: SettingsStore
    gateway: FakeGateway
    source: WorkspaceSource
    breakTimer: FakeBreakTimer
    events: TypedEventEmitter
    timer: TimerController
    reconciler: SelectionReconciler
    notices: string[]
}

export async function createHarness(settings: Settings = {}, source?: (gateway: FakeGateway) => WorkspaceSource): Promise<Harness> {
    const logger = pino({ level: 'silent' })
    const fs = new MockFileSystem()
    const store = new SettingsStore(fs, logger, CONFIG_DIR)
    await store.save(settings)

    const gateway = new FakeGateway(workspaceFixture())
    const workspace = source ? source(gateway) : new DirectWorkspaceSource(gateway, 100)
    const breakTimer = new FakeBreakTimer()
    const events = new TypedEventEmitter()
    const notices: string[] = []
    events.on('notice', ({ message }) => notices.push(message))

    const timer = new TimerController({ gateway, store, source: workspace, breakTimer, events, logger })
    const reconciler = new SelectionReconciler({ store, source: workspace, gateway, timer, events, logger })
    return { fs, store, gateway, source: workspace, breakTimer, events, timer, reconciler, notices }
}
