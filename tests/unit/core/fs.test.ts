import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'

describe('MockFileSystem', () => {
    it('stores JSON pretty printed with two spaces', async () => {
        const fs = new MockFileSystem()
        await fs.writeJSON('/cfg/config.json', { projectId: 'p-web' })
        expect(await fs.readText('/cfg/config.json')).toBe('{\n  "projectId": "p-web"\n}')
        expect(await fs.readJSON('/cfg/config.json')).toEqual({ projectId: 'p-web' })
    })

    it('rejects reads of missing files', async () => {
        const fs = new MockFileSystem()
        await expect(fs.readText('/cfg/previous.json')).rejects.toThrow('ENOENT: /cfg/previous.json')
    })

    it('tracks existence across write and remove', async () => {
        const fs = new MockFileSystem()
        expect(await fs.exists('/cfg/config.json')).toBe(false)
        await fs.writeText('/cfg/config.json', '{}')
        expect(await fs.exists('/cfg/config.json')).toBe(true)
        await fs.remove('/cfg/config.json')
        expect(await fs.exists('/cfg/config.json')).toBe(false)
    })

    it('preloads files and lists them', () => {
        const fs = new MockFileSystem()
        fs.setFile('/cfg/config.json', '{}')
        fs.setFile('/cfg/previous.json', '{}')
        expect([...fs.getFiles().keys()]).toEqual(['/cfg/config.json', '/cfg/previous.json'])
    })
})
