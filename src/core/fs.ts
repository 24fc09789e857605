import { chmod, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    writeJSON(path: string, data: unknown): Promise<void>
    exists(path: string): Promise<boolean>
    mkdir(path: string): Promise<void>
    chmod(path: string, mode: number): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf8')
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async writeText(path: string, content: string): Promise<void> {
        await writeFile(path, content, 'utf8')
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        await this.writeText(path, `${JSON.stringify(data, null, 2)}\n`)
    }

    async exists(path: string): Promise<boolean> {
        try {
            await stat(path)
            return true
        } catch {
            return false
        }
    }

    async mkdir(path: string): Promise<void> {
        await mkdir(path, { recursive: true })
    }

    async chmod(path: string, mode: number): Promise<void> {
        await chmod(path, mode)
    }

    async remove(path: string): Promise<void> {
        await rm(path, { recursive: true, force: true })
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) throw new Error(`ENOENT: ${path}`)
        return content
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async writeText(path: string, content: string): Promise<void> {
        this.files.set(path, content)
    }

    async writeJSON(path: string, data: unknown): Promise<void> {
        this.files.set(path, JSON.stringify(data, null, 2))
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path)
    }

    async mkdir(_path: string): Promise<void> {}

    async chmod(_path: string, _mode: number): Promise<void> {}

    async remove(path: string): Promise<void> {
        this.files.delete(path)
    }

    setFile(path: string, content: string): void {
        this.files.set(path, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }
}
