import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { pino } from 'pino'
import { configCommand } from '../../../src/cli/commands/config-cmd.js'
import { recentCommand, switchCommand } from '../../../src/cli/commands/history.js'
import { startCommand, stopCommand } from '../../../src/cli/commands/time.js'
import { pickRecent } from '../../../src/cli/prompts.js'
import { attachNotices } from '../../../src/cli/runtime.js'
import type { ResolvedConfig } from '../../../src/config/schema.js'
import { type Container, createContainer } from '../../../src/core/container.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { FakeBreakTimer } from '../../helpers/fake-break-timer.js'
import { FakeGateway } from '../../helpers/fake-gateway.js'
import { CONFIG_DIR, workspaceFixture } from '../../helpers/workspace.js'

vi.mock('../../../src/cli/prompts.js', async (importOriginal) => ({
    ...(await importOriginal<typeof import('../../../src/cli/prompts.js')>()),
    pickRecent: vi.fn(),
}))

const CONFIG: ResolvedConfig = {
    token: 'test-secret',
    workspaceId: 'ws-1',
    baseURL: 'https://api.test/v1',
    logLevel: 'silent',
    breakTimer: 'none',
    entriesLimit: 100,
    configDir: CONFIG_DIR,
}

function buildContainer(): { container: Container; gateway: FakeGateway } {
    const gateway = new FakeGateway(workspaceFixture())
    const container = createContainer(CONFIG, {
        fs: new MockFileSystem(),
        gateway,
        breakTimer: new FakeBreakTimer(),
        logger: pino({ level: 'silent' }),
    })
    return { container, gateway }
}

describe('commands', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('starts by project and task name, then stops', async () => {
        const { container, gateway } = buildContainer()

        const started = await startCommand(container, { description: 'Fix login', project: 'Acme Website', task: 'Bugfix' })
        expect(started).toBe('ok')
        expect(gateway.callsTo('startEntry')).toEqual([[{ description: 'Fix login', projectId: 'p-web', taskId: 't-bug' }]])

        expect(await stopCommand(container)).toBe('ok')
        expect(gateway.openEntries).toHaveLength(0)
    })

    it('fails for an unknown project', async () => {
        const { container, gateway } = buildContainer()
        expect(await startCommand(container, { description: 'Fix login', project: 'Nope' })).toBe('failed')
        expect(gateway.callsTo('startEntry')).toHaveLength(0)
        expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1)
    })

    it('switch fails without history', async () => {
        const { container } = buildContainer()
        expect(await switchCommand(container)).toBe('failed')
    })

    it('recent applies the picked combination with its absent client', async () => {
        const { container } = buildContainer()
        await container.store.save({
            clientId: 'c-acme',
            projectId: 'p-web',
            taskId: 't-bug',
            taskName: 'Bugfix',
            description: 'Fix login',
        })
        vi.mocked(pickRecent).mockResolvedValue({
            projectId: 'p-internal',
            projectName: 'Internal',
            description: 'Planning',
            timestamp: '2026-03-01T08:00:00Z',
        })

        expect(await recentCommand(container)).toBe('ok')
        expect(await container.store.selection()).toEqual({ projectId: 'p-internal', description: 'Planning' })
    })

    it('prints notices from the event bus', async () => {
        const { container } = buildContainer()
        attachNotices(container.eventBus)
        container.eventBus.notice('info', 'Hello there')
        expect(vi.mocked(console.log)).toHaveBeenCalledTimes(1)
    })

    it('config set validates and saves editable keys', async () => {
        const { container } = buildContainer()

        expect(await configCommand(container, 'entriesLimit', '50')).toBe('ok')
        expect((await container.store.load()).entriesLimit).toBe(50)

        expect(await configCommand(container, 'logLevel', 'loud')).toBe('failed')
        expect(await configCommand(container, 'token', 'other')).toBe('failed')
        expect((await container.store.load()).logLevel).toBeUndefined()
    })
})
