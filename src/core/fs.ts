import { appendFile, chmod, mkdir, readFile, rm, stat } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    /** Single append on an O_APPEND descriptor; `mode` applies only when the file is created. */
    appendText(path: string, content: string, mode?: number): Promise<void>
    exists(path: string): Promise<boolean>
    size(path: string): Promise<number>
    mkdir(path: string, mode?: number): Promise<void>
    chmod(path: string, mode: number): Promise<void>
    remove(path: string): Promise<void>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf-8')
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async appendText(path: string, content: string, mode?: number): Promise<void> {
        await appendFile(path, content, { encoding: 'utf-8', mode })
    }

    async exists(path: string): Promise<boolean> {
        try {
            await stat(path)
            return true
        } catch {
            return false
        }
    }

    async size(path: string): Promise<number> {
        return (await stat(path)).size
    }

    async mkdir(path: string, mode?: number): Promise<void> {
        await mkdir(path, { recursive: true, mode })
    }

    async chmod(path: string, mode: number): Promise<void> {
        await chmod(path, mode)
    }

    async remove(path: string): Promise<void> {
        await rm(path, { force: true })
    }
}

function fsError(code: string, op: string, path: string): Error {
    return Object.assign(new Error(`${code}: ${op} '${path}'`), { code })
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private modes = new Map<string, number>()
    private dirs = new Set<string>()
    private denied = new Set<string>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) throw fsError('ENOENT', 'open', path)
        return content
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async appendText(path: string, content: string, mode?: number): Promise<void> {
        this.assertWritable(path, 'open')
        const existing = this.files.get(path)
        if (existing === undefined && mode !== undefined) this.modes.set(path, mode)
        this.files.set(path, (existing ?? '') + content)
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path) || this.dirs.has(path)
    }

    async size(path: string): Promise<number> {
        const content = this.files.get(path)
        if (content === undefined) throw fsError('ENOENT', 'stat', path)
        return Buffer.byteLength(content)
    }

    async mkdir(path: string, _mode?: number): Promise<void> {
        this.assertWritable(path, 'mkdir')
        this.dirs.add(path)
    }

    async chmod(path: string, mode: number): Promise<void> {
        this.modes.set(path, mode)
    }

    async remove(path: string): Promise<void> {
        this.assertWritable(path, 'unlink')
        this.files.delete(path)
        this.modes.delete(path)
    }

    setFile(path: string, content: string): void {
        this.files.set(path, content)
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }

    getMode(path: string): number | undefined {
        return this.modes.get(path)
    }

    /** Makes every write under `path` fail with EACCES. */
    deny(path: string): void {
        this.denied.add(path)
    }

    private assertWritable(path: string, op: string): void {
        for (const prefix of this.denied) {
            if (path === prefix || path.startsWith(`${prefix}/`)) throw fsError('EACCES', op, path)
        }
    }
}
