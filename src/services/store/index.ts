import { Db } from "../../utils/database/keyv"
import { CorruptStore, NotFound, ValidationError } from "../../utils/errors"
import { scoped } from "../../utils/log"
import { parseDoc, parsers, Parser } from "./schema"
import { Fields, Patch, RecordKind, RecordMap } from "./types"

const log = scoped("store")

class Collection<T extends { id: number }> {
    private queue: Promise<unknown> = Promise.resolve()

    private constructor(
        readonly kind: RecordKind,
        private readonly db: Db,
        private readonly parse: Parser<T>,
        private nextId: number,
        private records: T[],
    ) { }

    static async load<T extends { id: number }>(kind: RecordKind, db: Db, parse: Parser<T>): Promise<Collection<T>> {
        let raw: unknown
        try {
            raw = await db.get(kind)
        } catch (e) {
            if (e instanceof SyntaxError) throw new CorruptStore(kind, e.message, e)
            throw e
        }
        if (raw === undefined) return new Collection(kind, db, parse, 1, [])
        const doc = parseDoc(raw, parse)
        if (typeof doc === "string") throw new CorruptStore(kind, doc)
        return new Collection(kind, db, parse, doc.nextId, doc.records)
    }

    get size() {
        return this.records.length
    }

    find(id: number): T | null {
        const r = this.records.find(x => x.id === id)
        return r ? structuredClone(r) : null
    }

    list(): T[] {
        return structuredClone(this.records)
    }

    create(fields: Omit<T, "id">): Promise<T> {
        return this.locked(async () => {
            const rec = this.check({ ...fields, id: this.nextId })
            await this.commit(this.nextId + 1, [...this.records, rec])
            return structuredClone(rec)
        })
    }

    modify(id: number, fn: (cur: T) => Partial<Omit<T, "id">> | null): Promise<T> {
        return this.locked(async () => {
            const i = this.records.findIndex(r => r.id === id)
            if (i < 0) throw new NotFound(this.kind, id)
            const cur = this.records[i]
            const patch = fn(structuredClone(cur))
            if (!patch) return structuredClone(cur)
            const next = this.check({ ...cur, ...patch, id: cur.id })
            const records = this.records.slice()
            records[i] = next
            await this.commit(this.nextId, records)
            return structuredClone(next)
        })
    }

    updateWhere(match: (r: T) => boolean, patch: Partial<Omit<T, "id">>): Promise<T[]> {
        return this.locked(async () => {
            const changed: T[] = []
            const records = this.records.map(r => {
                if (!match(r)) return r
                const next = this.check({ ...r, ...patch, id: r.id })
                changed.push(next)
                return next
            })
            if (!changed.length) return []
            await this.commit(this.nextId, records)
            return structuredClone(changed)
        })
    }

    delete(id: number): Promise<true> {
        return this.locked(async () => {
            const records = this.records.filter(r => r.id !== id)
            if (records.length === this.records.length) throw new NotFound(this.kind, id)
            await this.commit(this.nextId, records)
            return true as const
        })
    }

    private check(candidate: unknown): T {
        const rec = this.parse(candidate)
        if (!rec) throw new ValidationError(this.kind, "record does not match its schema")
        return rec
    }

    // The in-memory copy only moves forward once the document is on disk.
    private async commit(nextId: number, records: T[]) {
        await this.db.set(this.kind, { nextId, records })
        this.nextId = nextId
        this.records = records
    }

    private locked<R>(fn: () => Promise<R>): Promise<R> {
        const run = this.queue.then(fn)
        // the caller still receives the rejection; the chain only needs to settle
        this.queue = run.then(() => undefined, () => undefined)
        return run
    }
}

type Collections = { [K in RecordKind]: Collection<RecordMap[K]> }

/**
 * Typed CRUD over the four persisted collections. Each collection is one
 * document, loaded in full by {@link RecordStore.open} and rewritten in full
 * on every mutation. Mutations within a collection run one at a time.
 */
export class RecordStore {
    private constructor(private readonly cols: Collections) { }

    static async open(db: Db): Promise<RecordStore> {
        const [task, habit, note, reminder] = await Promise.all([
            Collection.load("task", db, parsers.task),
            Collection.load("habit", db, parsers.habit),
            Collection.load("note", db, parsers.note),
            Collection.load("reminder", db, parsers.reminder),
        ])
        log("opened", { tasks: task.size, habits: habit.size, notes: note.size, reminders: reminder.size })
        return new RecordStore({ task, habit, note, reminder })
    }

    private col<K extends RecordKind>(kind: K): Collection<RecordMap[K]> {
        return this.cols[kind]
    }

    create<K extends RecordKind>(kind: K, fields: Fields<K>): Promise<RecordMap[K]> {
        return this.col(kind).create(fields)
    }

    get<K extends RecordKind>(kind: K, id: number): RecordMap[K] {
        const r = this.col(kind).find(id)
        if (!r) throw new NotFound(kind, id)
        return r
    }

    find<K extends RecordKind>(kind: K, id: number): RecordMap[K] | null {
        return this.col(kind).find(id)
    }

    list<K extends RecordKind>(kind: K): RecordMap[K][] {
        return this.col(kind).list()
    }

    update<K extends RecordKind>(kind: K, id: number, patch: Patch<K>): Promise<RecordMap[K]> {
        return this.col(kind).modify(id, () => patch)
    }

    /** Read-modify-write under the collection lock; `fn` returning null skips the write. */
    modify<K extends RecordKind>(kind: K, id: number, fn: (cur: RecordMap[K]) => Patch<K> | null): Promise<RecordMap[K]> {
        return this.col(kind).modify(id, fn)
    }

    updateWhere<K extends RecordKind>(kind: K, match: (r: RecordMap[K]) => boolean, patch: Patch<K>): Promise<RecordMap[K][]> {
        return this.col(kind).updateWhere(match, patch)
    }

    delete<K extends RecordKind>(kind: K, id: number): Promise<true> {
        return this.col(kind).delete(id)
    }
}
