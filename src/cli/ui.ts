import pc from 'picocolors'
import type { Project, TimeEntry } from '../api/types.js'
import type { Selection } from '../config/schema.js'
import type { NoticeLevel } from '../core/events.js'
import type { RecentCombination } from '../selection/candidates.js'
import { formatDuration } from '../utils/time.js'

export const colors = {
    brand: (text: string) => pc.cyan(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    info: (text: string) => pc.blue(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatNotice(level: NoticeLevel, message: string): string {
    switch (level) {
        case 'success':
            return colors.success(message)
        case 'warn':
            return colors.warn(message)
        default:
            return colors.info(message)
    }
}

export function formatCurrent(name: string, isCurrent: boolean): string {
    return isCurrent ? `${name} ${colors.success('(current)')}` : name
}

export function formatSelection(selection: Selection, project: Project | null, clientName?: string): string[] {
    return [
        `Client:      ${clientName ?? colors.dim('(none)')}`,
        `Project:     ${project?.name ?? selection.projectId ?? colors.dim('(none)')}`,
        `Task:        ${selection.taskName ?? colors.dim('(none, description-only)')}`,
        `Description: ${selection.description ?? colors.dim('(none)')}`,
    ]
}

export function formatEntry(entry: TimeEntry): string {
    const duration = formatDuration(entry.timeInterval.start, entry.timeInterval.end)
    return `${entry.description || colors.dim('(no description)')} ${colors.dim(`[${duration}]`)}`
}

export function formatCombination(combination: RecentCombination): string {
    const parts = [combination.clientName, combination.projectName, combination.taskName].filter(Boolean)
    return `${parts.join(' / ')} ${colors.dim('-')} ${combination.description}`
}
