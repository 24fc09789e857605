import path from 'node:path'
import type { z } from 'zod'
import { configFilePath, defaultConfigDir, previousFilePath } from '../config/defaults.js'
import { SELECTION_KEYS, type Selection, SelectionSchema, type Settings, SettingsSchema } from '../config/schema.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'

export function isEmptySelection(selection: Selection | null | undefined): boolean {
    if (!selection) return true
    return SELECTION_KEYS.every((key) => !selection[key])
}

export function pickSelection(settings: Settings): Selection {
    const selection: Selection = {}
    for (const key of SELECTION_KEYS) {
        const value = settings[key]
        if (value) selection[key] = value
    }
    return selection
}

/**
 * Whole-document JSON persistence for the durable settings (credentials,
 * current selection, active entry bookkeeping) and the single-slot previous
 * selection. Every mutation re-reads and rewrites the entire document; two
 * processes writing at once race and the last writer wins.
 */
export class SettingsStore {
    readonly settingsPath: string
    readonly previousPath: string

    constructor(
        private fs: FileSystem,
        private logger: Logger,
        configDir: string = defaultConfigDir()
    ) {
        this.settingsPath = configFilePath(configDir)
        this.previousPath = previousFilePath(configDir)
    }

    private async readDocument<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
        try {
            if (!(await this.fs.exists(filePath))) return null
            const raw = await this.fs.readJSON<unknown>(filePath)
            return schema.parse(raw)
        } catch (error) {
            this.logger.warn({ file: filePath, error }, 'Failed to load document, using defaults')
            return null
        }
    }

    private async writeDocument(filePath: string, data: unknown): Promise<void> {
        await this.fs.mkdir(path.dirname(filePath))
        await this.fs.writeJSON(filePath, data)
        this.logger.debug({ file: filePath }, 'store:saved')
    }

    async load(): Promise<Settings> {
        return (await this.readDocument(this.settingsPath, SettingsSchema)) ?? {}
    }

    async save(settings: Settings): Promise<void> {
        await this.writeDocument(this.settingsPath, settings)
        // the token lives here
        await this.fs.chmod(this.settingsPath, 0o600)
    }

    /** Keys given as `undefined` are removed from the document. */
    async update(partial: Partial<Settings>): Promise<Settings> {
        const current = await this.load()
        const updated: Settings = { ...current, ...partial }
        // JSON serialization drops the undefined keys
        await this.save(updated)
        return updated
    }

    async selection(): Promise<Selection> {
        return pickSelection(await this.load())
    }

    async loadPrevious(): Promise<Selection | null> {
        const previous = await this.readDocument(this.previousPath, SelectionSchema)
        return isEmptySelection(previous) ? null : previous
    }

    async savePrevious(selection: Selection): Promise<void> {
        await this.writeDocument(this.previousPath, pickSelection(selection))
    }
}
