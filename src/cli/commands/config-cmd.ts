import type { Container } from '../../core/container.js'
import { BreakTimerKindSchema, LogLevelSchema, type Settings, SettingsSchema } from '../../config/schema.js'
import { err } from '../../core/result.js'
import { type CommandOutcome, report } from '../runtime.js'
import { colors } from '../ui.js'
import { maskToken } from './auth.js'

const EDITABLE = {
    baseURL: SettingsSchema.shape.baseURL,
    logLevel: LogLevelSchema,
    breakTimer: BreakTimerKindSchema,
    entriesLimit: SettingsSchema.shape.entriesLimit,
} as const

type EditableKey = keyof typeof EDITABLE

function isEditable(key: string): key is EditableKey {
    return key in EDITABLE
}

function parseValue(key: EditableKey, raw: string): Partial<Settings> | string {
    switch (key) {
        case 'baseURL': {
            const parsed = EDITABLE.baseURL.safeParse(raw)
            return parsed.success ? { baseURL: parsed.data } : parsed.error.issues[0]?.message ?? 'invalid'
        }
        case 'logLevel': {
            const parsed = EDITABLE.logLevel.safeParse(raw)
            return parsed.success ? { logLevel: parsed.data } : parsed.error.issues[0]?.message ?? 'invalid'
        }
        case 'breakTimer': {
            const parsed = EDITABLE.breakTimer.safeParse(raw)
            return parsed.success ? { breakTimer: parsed.data } : parsed.error.issues[0]?.message ?? 'invalid'
        }
        case 'entriesLimit': {
            const parsed = EDITABLE.entriesLimit.safeParse(Number(raw))
            return parsed.success ? { entriesLimit: parsed.data } : parsed.error.issues[0]?.message ?? 'invalid'
        }
    }
}

export async function configCommand(container: Container, key?: string, value?: string): Promise<CommandOutcome> {
    const { config, store } = container
    const display: Record<string, unknown> = {
        ...config,
        token: config.token ? maskToken(config.token) : '(not set)',
    }

    if (!key) {
        console.log(JSON.stringify(display, null, 2))
        return 'ok'
    }

    if (value === undefined) {
        if (key in display) {
            console.log(`${key}: ${JSON.stringify(display[key])}`)
        } else {
            console.log(colors.warn(`Config key '${key}' not found`))
        }
        return 'ok'
    }

    if (!isEditable(key)) {
        return report(err(`'${key}' cannot be set here. Editable keys: ${Object.keys(EDITABLE).join(', ')}`), () => '')
    }
    const update = parseValue(key, value)
    if (typeof update === 'string') return report(err(`Invalid value for ${key}: ${update}`), () => '')

    await store.update(update)
    console.log(colors.success(`${key} set to ${value}`))
    return 'ok'
}
