/** ISO-8601 UTC timestamp with whole seconds and a trailing `Z`. */
export function utcTimestamp(date: Date = new Date()): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

export function elapsedSeconds(start: string, now: number = Date.now()): number {
    const started = Date.parse(start)
    if (Number.isNaN(started)) return 0
    return Math.max(0, Math.floor((now - started) / 1000))
}

export function elapsedMinutes(start: string, now: number = Date.now()): number {
    const started = Date.parse(start)
    if (Number.isNaN(started)) return 0
    return (now - started) / 60000
}

/** `H:MM:SS` clock used by the status monitor. */
export function formatClock(totalSeconds: number): string {
    const hours = Math.floor(totalSeconds / 3600)
    const minutes = Math.floor((totalSeconds % 3600) / 60)
    const seconds = totalSeconds % 60
    return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`
}

export function formatDuration(start: string, end?: string | null): string {
    if (!end) return 'In progress'
    const total = Math.floor((Date.parse(end) - Date.parse(start)) / 1000)
    if (Number.isNaN(total) || total <= 0) return 'Unknown'
    const hours = Math.floor(total / 3600)
    const minutes = Math.floor((total % 3600) / 60)
    return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`
}
