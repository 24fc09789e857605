import { describe, expect, it } from 'vitest'
import { pino } from 'pino'
import type { ResolvedConfig } from '../../../src/config/schema.js'
import { createContainer } from '../../../src/core/container.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { FakeBreakTimer } from '../../helpers/fake-break-timer.js'
import { FakeGateway } from '../../helpers/fake-gateway.js'
import { CONFIG_DIR, workspaceFixture } from '../../helpers/workspace.js'

const CONFIG: ResolvedConfig = {
    token: 'test-secret',
    workspaceId: 'ws-1',
    baseURL: 'https://api.test/v1',
    logLevel: 'debug',
    breakTimer: 'none',
    entriesLimit: 100,
    configDir: CONFIG_DIR,
}

const DOMAIN_EVENTS = new Set(['timer:started', 'timer:stopped', 'selection:changed'])

interface LogLine {
    msg: string
    entryId?: string
    current?: { description?: string }
}

function isLogLine(value: unknown): value is LogLine {
    return typeof value === 'object' && value !== null && 'msg' in value && typeof value.msg === 'string'
}

function captureLogs() {
    const lines: LogLine[] = []
    const logger = pino(
        { level: 'debug' },
        {
            write(chunk: string) {
                const parsed: unknown = JSON.parse(chunk)
                if (isLogLine(parsed)) lines.push(parsed)
            },
        }
    )
    return { logger, lines }
}

describe('createContainer', () => {
    it('logs timer and selection events at debug level', async () => {
        const { logger, lines } = captureLogs()
        const container = createContainer(CONFIG, {
            fs: new MockFileSystem(),
            gateway: new FakeGateway(workspaceFixture()),
            breakTimer: new FakeBreakTimer(),
            logger,
        })
        await container.store.save({ projectId: 'p-web', description: 'Fix login' })

        await container.timer.start()
        await container.timer.stop()
        await container.reconciler.setDescription('Review')

        const events = lines.filter((l) => DOMAIN_EVENTS.has(l.msg))
        expect(events.map((l) => l.msg)).toEqual(['timer:started', 'timer:stopped', 'selection:changed'])
        expect(events[0]?.entryId).toBe('entry-1')
        expect(events[2]?.current?.description).toBe('Review')
    })

    it('stops logging events after shutdown', async () => {
        const { logger, lines } = captureLogs()
        const container = createContainer(CONFIG, {
            fs: new MockFileSystem(),
            gateway: new FakeGateway(workspaceFixture()),
            breakTimer: new FakeBreakTimer(),
            logger,
        })
        await container.store.save({ projectId: 'p-web', description: 'Fix login' })

        await container.shutdown()
        await container.timer.start()

        expect(lines.some((l) => l.msg === 'timer:started')).toBe(false)
    })
})
