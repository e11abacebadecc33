import fs from "fs"
import path from "path"
import crypto from "crypto"
import type Keyv from "keyv"

const isMissing = (e: unknown) => e instanceof Error && "code" in e && e.code === "ENOENT"

/**
 * Keyv store adapter keeping one JSON document per key under `dir`.
 *
 * Writes go to a sibling temp file that is renamed over the target, so a
 * reader only ever sees the previous or the next full document.
 */
export class JsonFileStore implements Keyv.Store<string | undefined> {
    namespace?: string
    private readonly swept = new Set<string>()

    constructor(readonly dir: string) { }

    fileOf(key: string): string {
        const prefix = this.namespace ? `${this.namespace}:` : ""
        const name = key.startsWith(prefix) ? key.slice(prefix.length) : key
        if (!/^[\w-]+$/.test(name)) throw new Error(`invalid document key "${name}"`)
        return path.join(this.dir, `${name}.json`)
    }

    async get(key: string): Promise<string | undefined> {
        try {
            return await fs.promises.readFile(this.fileOf(key), "utf8")
        } catch (e) {
            if (isMissing(e)) return undefined
            throw e
        }
    }

    async set(key: string, value: string | undefined): Promise<void> {
        const file = this.fileOf(key)
        await fs.promises.mkdir(this.dir, { recursive: true })
        // a temp file from a write that died before its rename
        if (!this.swept.has(file)) {
            await this.sweep(f => f.startsWith(path.basename(file) + ".") && f.endsWith(".tmp"))
            this.swept.add(file)
        }
        const tmp = `${file}.${crypto.randomBytes(6).toString("hex")}.tmp`
        try {
            await fs.promises.writeFile(tmp, value ?? "", "utf8")
            await fs.promises.rename(tmp, file)
        } catch (e) {
            await fs.promises.rm(tmp, { force: true })
            throw e
        }
    }

    async delete(key: string): Promise<boolean> {
        try {
            await fs.promises.unlink(this.fileOf(key))
            return true
        } catch (e) {
            if (isMissing(e)) return false
            throw e
        }
    }

    async clear(): Promise<void> {
        await this.sweep(f => f.endsWith(".json") || f.endsWith(".tmp"))
    }

    async has(key: string): Promise<boolean> {
        return (await this.get(key)) !== undefined
    }

    private async sweep(match: (file: string) => boolean): Promise<void> {
        let files: string[]
        try {
            files = await fs.promises.readdir(this.dir)
        } catch (e) {
            if (isMissing(e)) return
            throw e
        }
        await Promise.all(files.filter(match).map(f => fs.promises.rm(path.join(this.dir, f), { force: true })))
    }
}
