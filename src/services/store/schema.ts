import { isDay } from "../../utils/days"
import { CollectionDoc, Habit, Note, RecordKind, RecordMap, Reminder, Task } from "./types"

export type Parser<T> = (x: unknown) => T | null

const isObj = (x: unknown): x is Record<string, unknown> => typeof x === "object" && x !== null && !Array.isArray(x)
export const isId = (x: unknown): x is number => typeof x === "number" && Number.isSafeInteger(x) && x > 0
export const isTime = (x: unknown): x is number => typeof x === "number" && Number.isFinite(x) && x >= 0

function parseTask(x: unknown): Task | null {
    if (!isObj(x)) return null
    const { id, title, done, createdAt, dueAt } = x
    if (!isId(id) || typeof title !== "string" || typeof done !== "boolean" || !isTime(createdAt)) return null
    if (dueAt === undefined) return { id, title, done, createdAt }
    if (!isTime(dueAt)) return null
    return { id, title, done, createdAt, dueAt }
}

function parseHabit(x: unknown): Habit | null {
    if (!isObj(x)) return null
    const { id, name, completions } = x
    if (!isId(id) || typeof name !== "string" || !Array.isArray(completions)) return null
    const days = new Set<string>()
    for (const d of completions) {
        if (!isDay(d) || days.has(d)) return null
        days.add(d)
    }
    // kept sorted on disk
    return { id, name, completions: [...days].sort() }
}

function parseNote(x: unknown): Note | null {
    if (!isObj(x)) return null
    const { id, text, createdAt } = x
    if (!isId(id) || typeof text !== "string" || !isTime(createdAt)) return null
    return { id, text, createdAt }
}

function parseReminder(x: unknown): Reminder | null {
    if (!isObj(x)) return null
    const { id, message, fireAt, fired } = x
    if (!isId(id) || typeof message !== "string" || !isTime(fireAt) || typeof fired !== "boolean") return null
    return { id, message, fireAt, fired }
}

export const parsers: { [K in RecordKind]: Parser<RecordMap[K]> } = {
    task: parseTask,
    habit: parseHabit,
    note: parseNote,
    reminder: parseReminder,
}

export function parseDoc<T extends { id: number }>(raw: unknown, parse: Parser<T>): CollectionDoc<T> | string {
    if (!isObj(raw)) return "document is not an object"
    const { nextId, records } = raw
    if (!isId(nextId)) return "nextId is missing or invalid"
    if (!Array.isArray(records)) return "records is not an array"
    const out: T[] = []
    const seen = new Set<number>()
    for (const [i, r] of records.entries()) {
        const rec = parse(r)
        if (!rec) return `record at index ${i} is invalid`
        if (seen.has(rec.id)) return `duplicate id ${rec.id}`
        if (rec.id >= nextId) return `id ${rec.id} is not below nextId ${nextId}`
        seen.add(rec.id)
        out.push(rec)
    }
    return { nextId, records: out }
}
