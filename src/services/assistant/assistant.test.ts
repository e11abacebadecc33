import fs from "fs"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { createDb, Db } from "../../utils/database/keyv"
import { CorruptStore, InvalidTransition, NotFound, ValidationError } from "../../utils/errors"
import { Assistant } from "."
import { describeError } from "./messages"

const MORNING = Date.UTC(2026, 9, 18, 9, 0, 0)

let dir: string
let db: Db
let now: number
let app: Assistant

beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "assistant-"))
    db = createDb(dir)
    now = MORNING
    app = await Assistant.open({ db, clock: () => now })
})

afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true })
})

describe("Assistant tasks", () => {
    it("runs a task through its life", async () => {
        const t = await app.createTask("Write report")
        expect(t).toEqual({ id: 1, title: "Write report", done: false, createdAt: MORNING })
        expect((await app.setTaskDone(1, true)).done).toBe(true)
        expect((await app.toggleTask(1)).done).toBe(false)
        expect(await app.deleteTask(1)).toBe(true)
        expect(() => app.getTask(1)).toThrow(NotFound)
    })

    it("trims titles and refuses blank ones before they reach the store", async () => {
        const set = vi.spyOn(db, "set")
        await expect(app.createTask("   ")).rejects.toBeInstanceOf(ValidationError)
        expect(set).not.toHaveBeenCalled()
        expect((await app.createTask("  buy milk ")).title).toBe("buy milk")
        await expect(app.renameTask(1, "")).rejects.toBeInstanceOf(ValidationError)
    })

    it("filters by state and due date", async () => {
        await app.createTask("a", MORNING + 1000)
        await app.createTask("b")
        await app.createTask("c", MORNING + 5000)
        await app.setTaskDone(3, true)
        expect(app.listTasks({ done: false }).map(t => t.title)).toEqual(["a", "b"])
        expect(app.listTasks({ dueBefore: MORNING + 2000 }).map(t => t.title)).toEqual(["a"])
        expect(() => app.listTasks({ dueBefore: Number.NaN })).toThrow("dueBefore: must be a non-negative timestamp in ms")
    })

    it("lists what is due on a UTC day, earliest first", async () => {
        await app.createTask("late", Date.UTC(2026, 9, 18, 22, 0))
        await app.createTask("tomorrow", Date.UTC(2026, 9, 19, 0, 0))
        await app.createTask("early", Date.UTC(2026, 9, 18, 0, 0))
        expect(app.tasksDueOn().map(t => t.title)).toEqual(["early", "late"])
        expect(app.tasksDueOn("2026-10-19").map(t => t.title)).toEqual(["tomorrow"])
    })
})

describe("Assistant habits", () => {
    it("marks today by default and reports the streak", async () => {
        const h = await app.createHabit("meditate")
        await app.markHabit(h.id, "2026-10-16")
        await app.markHabit(h.id, "2026-10-17")
        await app.markHabit(h.id)
        await app.markHabit(h.id)
        expect(app.habitStreak(h.id)).toBe(3)
        expect(app.habitSummary(h.id)).toEqual({ streak: 3, longest: 3, doneToday: true, total: 3 })
        expect(app.listHabits()).toEqual([
            { id: 1, name: "meditate", completions: ["2026-10-16", "2026-10-17", "2026-10-18"], streak: 3 },
        ])
    })

    it("drops the streak to zero when today is unmarked", async () => {
        const h = await app.createHabit("run")
        await app.markHabit(h.id)
        await app.unmarkHabit(h.id)
        expect(app.habitStreak(h.id)).toBe(0)
    })
})

describe("Assistant notes", () => {
    it("adds notes and replaces their whole text", async () => {
        const n = await app.addNote("first draft\n")
        now += 60_000
        const r = await app.replaceNoteText(n.id, "second draft")
        expect(r).toEqual({ id: 1, text: "second draft", createdAt: MORNING })
        expect(app.listNotes()).toHaveLength(1)
        await expect(app.addNote(" ")).rejects.toBeInstanceOf(ValidationError)
    })
})

describe("Assistant reminders", () => {
    it("delivers each due reminder once", async () => {
        await app.addReminder("stretch", MORNING + 60_000)
        expect(await app.pollReminders()).toEqual([])
        now += 60_000
        expect((await app.pollReminders()).map(r => r.message)).toEqual(["stretch"])
        expect(await app.pollReminders()).toEqual([])
        await app.rescheduleReminder(1, now + 1000)
        expect((await app.pollReminders(now + 1000)).map(r => r.id)).toEqual([1])
    })

    it("validates reminder input", async () => {
        await expect(app.addReminder("", MORNING)).rejects.toBeInstanceOf(ValidationError)
        await expect(app.addReminder("x", Number.NaN)).rejects.toThrow("fireAt: must be a non-negative timestamp in ms")
    })
})

describe("Assistant timer", () => {
    it("runs a countdown off the injected clock", () => {
        app.startTimer(60)
        now += 30_000
        expect(app.tickTimer()).toEqual({ state: "running", durationSeconds: 60, remainingSeconds: 30 })
        app.pauseTimer()
        now += 120_000
        app.resumeTimer()
        now += 31_000
        expect(app.tickTimer()).toEqual({ state: "completed", durationSeconds: 60, remainingSeconds: 0 })
        expect(app.resetTimer().state).toBe("idle")
    })

    it("starts a focus pomodoro from the configured length", () => {
        expect(app.startPomodoro("focus")).toEqual({ state: "running", durationSeconds: 1500, remainingSeconds: 1500 })
    })

    it("rejects bad durations and illegal transitions", () => {
        expect(() => app.startTimer(-5)).toThrow(ValidationError)
        expect(() => app.pauseTimer()).toThrow(InvalidTransition)
        expect(app.timer().state).toBe("idle")
    })
})

describe("Assistant.open", () => {
    it("surfaces a corrupt store instead of starting empty", async () => {
        await fs.promises.writeFile(path.join(dir, "note.json"), "{{")
        const err = await Assistant.open({ dataDir: dir }).catch((e: unknown) => e)
        expect(err).toBeInstanceOf(CorruptStore)
        expect(describeError(err)).toMatch(/^Saved data could not be read and was left untouched\. note store is corrupt: /)
    })

    it("reloads what an earlier session saved", async () => {
        await app.createTask("persist me")
        const again = await Assistant.open({ dataDir: dir })
        expect(again.listTasks().map(t => t.title)).toEqual(["persist me"])
    })
})

describe("describeError", () => {
    it("words each error kind for display", () => {
        expect(describeError(new NotFound("task", 4))).toBe("Not found: task 4 not found")
        expect(describeError(new ValidationError("title", "must not be empty"))).toBe("Invalid input: title: must not be empty")
        expect(describeError(new InvalidTransition("idle", "pause"))).toBe("Timer: cannot pause a timer that is idle")
        expect(describeError(new Error("plain"))).toBe("plain")
    })
})
