import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { pino } from 'pino'
import { HttpGateway } from '../../../src/api/client.js'
import { GatewayError } from '../../../src/core/errors.js'

const mockLogger = pino({ level: 'silent' })

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

function createGateway() {
    return new HttpGateway({ token: 'test-secret', workspaceId: 'ws-1', baseURL: 'https://api.test/v1/' }, mockLogger)
}

describe('HttpGateway', () => {
    const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>()

    beforeEach(() => {
        fetchMock.mockReset()
        vi.stubGlobal('fetch', fetchMock)
    })

    afterEach(() => {
        vi.unstubAllGlobals()
    })

    it('sends the API key and validates the response', async () => {
        fetchMock.mockResolvedValueOnce(json([{ id: 'p-web', name: 'Acme Website', clientId: 'c-acme', color: '#fff' }]))

        const projects = await createGateway().getProjects()

        expect(projects).toEqual([{ id: 'p-web', name: 'Acme Website', clientId: 'c-acme' }])
        const [url, init] = fetchMock.mock.calls[0] ?? []
        expect(url).toBe('https://api.test/v1/workspaces/ws-1/projects')
        expect(init?.method).toBe('GET')
        expect(init?.headers).toEqual({ 'X-Api-Key': 'test-secret', 'Content-Type': 'application/json' })
    })

    it('looks up the user once and returns the first running entry', async () => {
        fetchMock.mockImplementation(async (url) => {
            if (url.endsWith('/user')) return json({ id: 'user-1', name: 'Test User' })
            return json([{ id: 'entry-9', description: 'Fix login', timeInterval: { start: '2026-03-02T09:00:00Z' } }])
        })
        const gateway = createGateway()

        const active = await gateway.getActiveEntry()
        await gateway.getActiveEntry()

        expect(active?.id).toBe('entry-9')
        expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
            'https://api.test/v1/user',
            'https://api.test/v1/workspaces/ws-1/user/user-1/time-entries?in-progress=true',
            'https://api.test/v1/workspaces/ws-1/user/user-1/time-entries?in-progress=true',
        ])
    })

    it('returns null when nothing is running', async () => {
        fetchMock.mockImplementation(async (url) => (url.endsWith('/user') ? json({ id: 'user-1' }) : json([])))
        expect(await createGateway().getActiveEntry()).toBeNull()
    })

    it('posts a new entry with a whole-second UTC start', async () => {
        fetchMock.mockResolvedValueOnce(
            json({ id: 'entry-1', description: 'Fix login', projectId: 'p-web', timeInterval: { start: '2026-03-02T09:00:00Z' } })
        )

        await createGateway().startEntry({ description: 'Fix login', projectId: 'p-web' })

        const [url, init] = fetchMock.mock.calls[0] ?? []
        expect(url).toBe('https://api.test/v1/workspaces/ws-1/time-entries')
        expect(init?.method).toBe('POST')
        const body: unknown = JSON.parse(String(init?.body))
        expect(body).toEqual({
            start: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/),
            description: 'Fix login',
            projectId: 'p-web',
        })
    })

    it('treats an empty reply as null', async () => {
        fetchMock.mockImplementation(async (url) =>
            url.endsWith('/user') ? json({ id: 'user-1' }) : new Response(null, { status: 204 })
        )
        expect(await createGateway().stopEntry()).toBeNull()
    })

    it('turns HTTP failures into a GatewayError', async () => {
        fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401, statusText: 'Unauthorized' }))

        const failure = createGateway().getUser()

        await expect(failure).rejects.toBeInstanceOf(GatewayError)
        await expect(failure).rejects.toThrow('API request failed: HTTP 401 Unauthorized for GET user - bad key')
    })

    it('turns network failures into a GatewayError', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))
        await expect(createGateway().getClients()).rejects.toThrow('API request failed: fetch failed')
    })

    it('rejects a response of the wrong shape', async () => {
        fetchMock.mockResolvedValueOnce(json({ unexpected: true }))
        await expect(createGateway().getClients()).rejects.toThrow(
            'API request failed: unexpected response from workspaces/ws-1/clients'
        )
    })

    it('reports a failed delete as false', async () => {
        fetchMock.mockResolvedValueOnce(new Response('nope', { status: 404, statusText: 'Not Found' }))
        expect(await createGateway().deleteTask('p-web', 't-bug')).toBe(false)
    })
})
