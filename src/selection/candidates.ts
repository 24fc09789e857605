import type { Client, Project, TimeEntry } from '../api/types.js'

export interface RecentCombination {
    clientId?: string
    clientName?: string
    projectId: string
    projectName: string
    taskId?: string
    taskName?: string
    description: string
    /** Start of the newest entry carrying this combination. */
    timestamp: string
}

/**
 * Distinct non-empty descriptions used in a project with the given task, plus
 * those of entries that carry no task at all. Sorted alphabetically.
 */
export function descriptionCandidates(entries: TimeEntry[], projectId: string, taskId?: string): string[] {
    const found = new Set<string>()
    for (const entry of entries) {
        const description = entry.description?.trim()
        if (entry.projectId !== projectId || !description) continue
        if (!entry.taskId || entry.taskId === taskId) found.add(description)
    }
    return [...found].sort((a, b) => a.localeCompare(b))
}

/**
 * Walks entries newest first and keeps the first occurrence of every
 * (client, project, task, description) tuple, up to `limit`. Task names are
 * left for the caller to fill in.
 */
export function collectRecentCombinations(
    entries: TimeEntry[],
    projects: Project[],
    clients: Client[],
    limit: number
): RecentCombination[] {
    const projectById = new Map(projects.map((p) => [p.id, p]))
    const clientById = new Map(clients.map((c) => [c.id, c]))
    const seen = new Set<string>()
    const combinations: RecentCombination[] = []

    for (const entry of entries) {
        if (combinations.length >= limit) break

        const description = entry.description?.trim()
        if (!description || !entry.projectId) continue
        const timestamp = entry.timeInterval.start || entry.timeInterval.end
        if (!timestamp) continue
        const project = projectById.get(entry.projectId)
        if (!project) continue

        const clientId = project.clientId ?? undefined
        const taskId = entry.taskId ?? undefined
        const key = JSON.stringify([clientId ?? null, project.id, taskId ?? null, description])
        if (seen.has(key)) continue
        seen.add(key)

        combinations.push({
            clientId,
            clientName: clientId ? clientById.get(clientId)?.name : undefined,
            projectId: project.id,
            projectName: project.name,
            taskId,
            description,
            timestamp,
        })
    }

    return combinations
}
