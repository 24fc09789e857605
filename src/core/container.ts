import { createGateway } from '../api/client.js'
import type { Gateway } from '../api/types.js'
import { DisabledBreakTimer, GnomePomodoroTimer } from '../breaktimer/gnome-pomodoro.js'
import type { BreakTimer } from '../breaktimer/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { SelectionReconciler } from '../selection/reconciler.js'
import { SettingsStore } from '../store/settings-store.js'
import { TimerController } from '../tracking/timer-controller.js'
import { DirectWorkspaceSource, WorkspaceSnapshot, type WorkspaceSource } from '../workspace/source.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    store: SettingsStore
    gateway: Gateway
    source: WorkspaceSource
    breakTimer: BreakTimer
    timer: TimerController
    reconciler: SelectionReconciler
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

export interface ContainerOptions {
    /** Load the whole workspace up front; interactive commands want this. */
    hydrate?: boolean
    fs?: FileSystem
    logger?: Logger
    gateway?: Gateway
    breakTimer?: BreakTimer
}

export function createContainer(config: ResolvedConfig, options: ContainerOptions = {}): Container {
    const logger = options.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = options.fs ?? new NodeFileSystem()
    const store = new SettingsStore(fs, logger, config.configDir)
    const gateway =
        options.gateway ??
        createGateway({ token: config.token, workspaceId: config.workspaceId, baseURL: config.baseURL }, logger)
    const snapshot = options.hydrate ? new WorkspaceSnapshot(gateway, logger, config.entriesLimit) : null
    const source: WorkspaceSource = snapshot ?? new DirectWorkspaceSource(gateway, config.entriesLimit)
    const breakTimer =
        options.breakTimer ?? (config.breakTimer === 'gnome-pomodoro' ? new GnomePomodoroTimer() : new DisabledBreakTimer())
    const timer = new TimerController({ gateway, store, source, breakTimer, events: eventBus, logger })
    const reconciler = new SelectionReconciler({ store, source, gateway, timer, events: eventBus, logger })

    eventBus.on('selection:changed', ({ previous, current }) => logger.debug({ previous, current }, 'selection:changed'))
    eventBus.on('timer:started', ({ entry }) => logger.debug({ entryId: entry.id }, 'timer:started'))
    eventBus.on('timer:stopped', ({ entry }) => logger.debug({ entryId: entry?.id }, 'timer:stopped'))

    return {
        config,
        logger,
        eventBus,
        fs,
        store,
        gateway,
        source,
        breakTimer,
        timer,
        reconciler,

        async initialize() {
            if (snapshot) await snapshot.loadAll(config.entriesLimit)
        },

        async shutdown() {
            eventBus.removeAll()
            logger.flush()
        },
    }
}
