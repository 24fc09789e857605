import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'token' | 'workspaceId' | 'configDir'> = {
    baseURL: 'https://api.clockify.me/api/v1',
    logLevel: 'warn',
    breakTimer: 'gnome-pomodoro',
    entriesLimit: 100,
}

export const CONFIG_FILE_NAME = 'config.json'
export const PREVIOUS_FILE_NAME = 'previous.json'

/** A start within this window after a stop, while the break timer is idle, is treated as spurious. */
export const RESTART_COOLDOWN_MS = 10_000
export const RECENT_COMBINATIONS_LIMIT = 5
export const MONITOR_POLL_INTERVAL_MS = 30_000
export const MONITOR_TICK_MS = 1_000
/** Log monitor failures on the 1st, 11th, 21st... consecutive error only. */
export const MONITOR_ERROR_LOG_EVERY = 10

export function defaultConfigDir(): string {
    if (process.env.TALLY_CONFIG_DIR) return process.env.TALLY_CONFIG_DIR
    return path.join(process.env.HOME ?? '~', '.config', 'tally')
}

export function configFilePath(configDir: string): string {
    return path.join(configDir, CONFIG_FILE_NAME)
}

export function previousFilePath(configDir: string): string {
    return path.join(configDir, PREVIOUS_FILE_NAME)
}
