import type { FileSystem } from '../core/fs.js'
import { ConfigurationError } from '../core/errors.js'
import { DEFAULT_CONFIG, configFilePath, defaultConfigDir } from './defaults.js'
import { type LogLevel, LogLevelSchema, type ResolvedConfig, type Settings, SettingsSchema } from './schema.js'

export interface CliFlags {
    token?: string
    workspaceId?: string
    baseURL?: string
    logLevel?: LogLevel
}

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: CliFlags
    configDir?: string
}

async function loadSettingsFile(fs: FileSystem, filePath: string): Promise<Settings> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return SettingsSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function envFlags(): CliFlags {
    const env: CliFlags = {}
    if (process.env.TALLY_TOKEN) env.token = process.env.TALLY_TOKEN
    if (process.env.TALLY_WORKSPACE_ID) env.workspaceId = process.env.TALLY_WORKSPACE_ID
    if (process.env.TALLY_BASE_URL) env.baseURL = process.env.TALLY_BASE_URL
    const level = LogLevelSchema.safeParse(process.env.TALLY_LOG_LEVEL)
    if (level.success) env.logLevel = level.data
    return env
}

function pick<T>(...values: (T | undefined)[]): T | undefined {
    return values.find((value) => value !== undefined)
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, configDir = defaultConfigDir() } = options

    const file = await loadSettingsFile(fs, configFilePath(configDir))
    const env = envFlags()

    // Priority: CLI flags > env vars > config file > defaults
    return {
        token: pick(cliFlags.token, env.token, file.token) ?? '',
        workspaceId: pick(cliFlags.workspaceId, env.workspaceId, file.workspaceId) ?? '',
        baseURL: pick(cliFlags.baseURL, env.baseURL, file.baseURL) ?? DEFAULT_CONFIG.baseURL,
        logLevel: pick(cliFlags.logLevel, env.logLevel, file.logLevel) ?? DEFAULT_CONFIG.logLevel,
        breakTimer: file.breakTimer ?? DEFAULT_CONFIG.breakTimer,
        entriesLimit: file.entriesLimit ?? DEFAULT_CONFIG.entriesLimit,
        configDir,
    }
}

export function missingCredentials(config: ResolvedConfig): string[] {
    const missing: string[] = []
    if (!config.token) missing.push('token')
    if (!config.workspaceId) missing.push('workspaceId')
    return missing
}

export function requireCredentials(config: ResolvedConfig): void {
    const missing = missingCredentials(config)
    if (missing.length > 0) throw new ConfigurationError(missing)
}
